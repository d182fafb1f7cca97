#!/usr/bin/env node
import { Command } from "commander";
import { promises as fs } from "node:fs";
import path from "node:path";
import process from "node:process";
import { createInterface } from "node:readline/promises";
import { loadOrCreateConfig, getRuntimePaths, ensureRuntimeDirs, saveConfig } from "./config.js";
import { createChatgate, openPersistedSessions } from "./app.js";
import { Db } from "./core/db.js";
import { commandExists } from "./core/utils.js";
import { parseUserImport, validatePhone } from "./core/users.js";
import type { ChatgateConfig, RuntimePaths } from "./config.js";
import type { HealthCheckResult, NewUser, Session } from "./types.js";

function resolveProjectRoot(input?: string): string {
  return input ? path.resolve(input) : process.cwd();
}

async function getConfigAndDb(projectRoot: string): Promise<{ db: Db; paths: RuntimePaths; cfg: ChatgateConfig }> {
  const paths = getRuntimePaths(projectRoot);
  await ensureRuntimeDirs(paths);
  const cfg = await loadOrCreateConfig(paths);
  const db = new Db(paths.dbPath);
  await db.migrate();
  return { db, paths, cfg };
}

async function doctorChecks(paths: RuntimePaths, cfg: ChatgateConfig): Promise<HealthCheckResult[]> {
  const checks: HealthCheckResult[] = [];
  for (const bin of [cfg.signal.command, "java"]) {
    const ok = await commandExists(bin);
    checks.push({ name: `binary:${bin}`, ok, details: ok ? "ok" : "missing" });
  }

  try {
    await fs.access(paths.configPath);
    checks.push({ name: "config", ok: true, details: paths.configPath });
  } catch {
    checks.push({ name: "config", ok: false, details: "missing config.toml" });
  }

  const hasKey = Boolean(process.env[cfg.notifier.apiKeyEnv]);
  checks.push({
    name: "notifier",
    ok: hasKey,
    details: hasKey ? "resend configured" : `${cfg.notifier.apiKeyEnv} is not set; confirmation emails disabled`
  });

  checks.push({
    name: "signal:account",
    ok: Boolean(cfg.signal.account),
    details: cfg.signal.account ?? "not set; signal-cli default account is used"
  });
  return checks;
}

function printChecks(checks: HealthCheckResult[]): boolean {
  let hasFail = false;
  for (const check of checks) {
    process.stdout.write(`${check.ok ? "[OK]" : "[WARN]"} ${check.name}: ${check.details}\n`);
    if (!check.ok) {
      hasFail = true;
    }
  }
  return hasFail;
}

async function addUser(db: Db, user: NewUser): Promise<void> {
  validatePhone(user.phone);
  const activeOnPhone = await db.findActiveUsersByPhone(user.phone);
  if (activeOnPhone.length > 0) {
    throw new Error(`An active user already uses phone ${user.phone}`);
  }
  const created = await db.addUser(user);
  process.stdout.write(`Added ${created.name} (${created.phone}, code ${created.clientCode}) as ${created.id}\n`);
}

async function simulate(projectRoot: string, initialPhone: string | undefined): Promise<void> {
  const { db, cfg } = await getConfigAndDb(projectRoot);
  const { dispatcher } = createChatgate(cfg, db);
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  try {
    process.stdout.write("Chatgate simulator. Type 'quit' to exit, 'switch' to change phone number.\n");
    let phone = initialPhone?.trim() || (await rl.question("Phone number to simulate: ")).trim();
    validatePhone(phone);
    process.stdout.write(`Simulating as ${phone}\n\n`);

    for (;;) {
      let input: string;
      try {
        input = (await rl.question("You: ")).trim();
      } catch {
        // stdin closed (Ctrl-D)
        break;
      }
      if (!input) {
        continue;
      }
      if (input.toLowerCase() === "quit") {
        break;
      }
      if (input.toLowerCase() === "switch") {
        const next = (await rl.question("New phone number: ")).trim();
        validatePhone(next);
        phone = next;
        process.stdout.write(`Switched to ${phone}\n\n`);
        continue;
      }
      const reply = await dispatcher.route(phone, input);
      process.stdout.write(`Agent: ${reply}\n\n`);
    }
  } finally {
    rl.close();
    await db.close();
  }
}

const program = new Command();

program
  .name("chatgate")
  .description("Authenticating chat gateway for Signal")
  .option("-p, --project-root <path>", "Project root path")
  .showHelpAfterError();

program
  .command("setup")
  .option("--signal-account <phone>", "Signal account the daemon receives on")
  .option("--sessions <sqlite|memory>", "Session store backend")
  .action(async (opts, cmd) => {
    const projectRoot = resolveProjectRoot(cmd.parent?.opts().projectRoot);
    const { db, paths, cfg } = await getConfigAndDb(projectRoot);
    if (opts.signalAccount) {
      validatePhone(opts.signalAccount);
      cfg.signal.account = opts.signalAccount;
    }
    if (opts.sessions) {
      if (opts.sessions !== "sqlite" && opts.sessions !== "memory") {
        throw new Error(`Unknown session backend '${opts.sessions}'. Use: sqlite, memory`);
      }
      cfg.sessions.backend = opts.sessions;
    }
    await saveConfig(paths, cfg);
    await db.close();
    printChecks(await doctorChecks(paths, cfg));
    process.stdout.write("Setup complete. Add users with 'chatgate user add' and start 'chatgated'.\n");
  });

program
  .command("doctor")
  .action(async (_, cmd) => {
    const projectRoot = resolveProjectRoot(cmd.parent?.opts().projectRoot);
    const paths = getRuntimePaths(projectRoot);
    await ensureRuntimeDirs(paths);
    const cfg = await loadOrCreateConfig(paths);
    if (printChecks(await doctorChecks(paths, cfg))) {
      process.exitCode = 1;
    }
  });

program
  .command("simulate")
  .description("Chat with the dispatcher from the terminal")
  .option("--phone <phone>", "Sender phone in E.164 format")
  .action(async (opts, cmd) => {
    const projectRoot = resolveProjectRoot(cmd.parent?.opts().projectRoot);
    await simulate(projectRoot, opts.phone);
  });

const userCommand = program.command("user").description("Directory management");

userCommand
  .command("add")
  .requiredOption("--phone <phone>", "Phone in E.164 format")
  .requiredOption("--client-code <code>", "Company-issued client code")
  .requiredOption("--company <id>", "Company id")
  .requiredOption("--name <name>", "Display name")
  .requiredOption("--email <email>", "Email for confirmations")
  .action(async (opts, cmd) => {
    const projectRoot = resolveProjectRoot(cmd.parent?.parent?.opts().projectRoot);
    const { db } = await getConfigAndDb(projectRoot);
    try {
      await addUser(db, {
        phone: opts.phone,
        clientCode: opts.clientCode,
        companyId: opts.company,
        name: opts.name,
        email: opts.email
      });
    } finally {
      await db.close();
    }
  });

userCommand
  .command("import <file>")
  .description("Add users from a JSON array")
  .action(async (file: string, _, cmd) => {
    const projectRoot = resolveProjectRoot(cmd.parent?.parent?.opts().projectRoot);
    const users = parseUserImport(JSON.parse(await fs.readFile(path.resolve(file), "utf8")));
    const { db } = await getConfigAndDb(projectRoot);
    try {
      for (const user of users) {
        if ((await db.findActiveUsersByPhone(user.phone)).length > 0) {
          throw new Error(`An active user already uses phone ${user.phone}; nothing imported`);
        }
      }
      for (const user of users) {
        await addUser(db, user);
      }
    } finally {
      await db.close();
    }
    process.stdout.write(`Imported ${users.length} users\n`);
  });

userCommand
  .command("list")
  .action(async (_, cmd) => {
    const projectRoot = resolveProjectRoot(cmd.parent?.parent?.opts().projectRoot);
    const { db } = await getConfigAndDb(projectRoot);
    const users = await db.listUsers();
    await db.close();
    console.table(
      users.map((u) => ({
        id: u.id,
        phone: u.phone,
        clientCode: u.clientCode,
        company: u.companyId,
        name: u.name,
        email: u.email,
        active: u.isActive
      }))
    );
  });

userCommand
  .command("deactivate")
  .requiredOption("--phone <phone>", "Phone in E.164 format")
  .action(async (opts, cmd) => {
    validatePhone(opts.phone);
    const projectRoot = resolveProjectRoot(cmd.parent?.parent?.opts().projectRoot);
    const { db } = await getConfigAndDb(projectRoot);
    try {
      const users = await db.findActiveUsersByPhone(opts.phone);
      if (users.length === 0) {
        throw new Error(`No active user with phone ${opts.phone}`);
      }
      for (const user of users) {
        await db.setUserActive(user.id, false);
      }
    } finally {
      await db.close();
    }
    process.stdout.write(`Deactivated ${opts.phone}\n`);
  });

const sessionCommand = program.command("session").description("Conversation sessions");

sessionCommand
  .command("list")
  .action(async (_, cmd) => {
    const projectRoot = resolveProjectRoot(cmd.parent?.parent?.opts().projectRoot);
    const { db, cfg } = await getConfigAndDb(projectRoot);
    let sessions: Session[];
    try {
      sessions = await openPersistedSessions(cfg, db).list();
    } finally {
      await db.close();
    }
    console.table(
      sessions.map((s) => ({
        sender: s.senderAddress,
        state: s.authState,
        userId: s.userId ?? "-",
        updated: s.lastUpdated
      }))
    );
  });

sessionCommand
  .command("clear")
  .description("Log a sender out; the next message starts over")
  .requiredOption("--sender <address>", "Sender address")
  .action(async (opts, cmd) => {
    const projectRoot = resolveProjectRoot(cmd.parent?.parent?.opts().projectRoot);
    const { db, cfg } = await getConfigAndDb(projectRoot);
    try {
      await openPersistedSessions(cfg, db).clear(opts.sender);
    } finally {
      await db.close();
    }
    process.stdout.write(`Session cleared for ${opts.sender}\n`);
  });

program.parseAsync(process.argv).catch((err) => {
  process.stderr.write(`Error: ${String(err)}\n`);
  process.exit(1);
});
