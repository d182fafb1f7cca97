import { promises as fs } from "node:fs";
import path from "node:path";
import TOML from "@iarna/toml";

export type SessionBackend = "sqlite" | "memory";

export interface ChatgateConfig {
  signal: {
    command: string;
    dataDir: string;
    receiveTimeoutSec: number;
    account?: string;
  };
  directory: {
    lookupTimeoutMs: number;
  };
  sessions: {
    backend: SessionBackend;
  };
  notifier: {
    apiKeyEnv: string;
    from: string;
    appName: string;
    timeoutMs: number;
  };
  routing: {
    defaultHandler: string;
    logoutKeyword: string;
    responseChunkSize: number;
  };
}

export interface RuntimePaths {
  projectRoot: string;
  chatgateDir: string;
  dbPath: string;
  configPath: string;
  signalDir: string;
}

export function getRuntimePaths(projectRoot: string): RuntimePaths {
  const chatgateDir = path.join(projectRoot, ".chatgate");
  return {
    projectRoot,
    chatgateDir,
    dbPath: path.join(chatgateDir, "chatgate.db"),
    configPath: path.join(chatgateDir, "config.toml"),
    signalDir: path.join(chatgateDir, "signal-cli")
  };
}

export function defaultConfig(projectRoot: string): ChatgateConfig {
  return {
    signal: {
      command: "signal-cli",
      dataDir: path.join(projectRoot, ".chatgate", "signal-cli"),
      receiveTimeoutSec: 5
    },
    directory: {
      lookupTimeoutMs: 5000
    },
    sessions: {
      backend: "sqlite"
    },
    notifier: {
      apiKeyEnv: "RESEND_API_KEY",
      from: "Chatgate <noreply@example.com>",
      appName: "Chatgate",
      timeoutMs: 10_000
    },
    routing: {
      defaultHandler: "assistant",
      logoutKeyword: "logout",
      responseChunkSize: 3000
    }
  };
}

export async function ensureRuntimeDirs(paths: RuntimePaths): Promise<void> {
  await fs.mkdir(paths.chatgateDir, { recursive: true });
  await fs.mkdir(paths.signalDir, { recursive: true });
}

export async function loadConfig(paths: RuntimePaths): Promise<ChatgateConfig> {
  const raw = await fs.readFile(paths.configPath, "utf8");
  return normalizeConfig(TOML.parse(raw), paths.projectRoot);
}

export async function saveConfig(paths: RuntimePaths, cfg: ChatgateConfig): Promise<void> {
  const raw = TOML.stringify(cfg as unknown as TOML.JsonMap);
  await fs.writeFile(paths.configPath, raw, "utf8");
}

export async function loadOrCreateConfig(paths: RuntimePaths): Promise<ChatgateConfig> {
  try {
    return await loadConfig(paths);
  } catch (err) {
    if (!isMissingFile(err)) {
      throw err;
    }
    const cfg = defaultConfig(paths.projectRoot);
    await saveConfig(paths, cfg);
    return cfg;
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Section, key: string): Section {
  const value = raw[key];
  return isSection(value) ? value : {};
}

function str(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

function positive(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : fallback;
}

/** Fills absent sections from defaults and replaces values of the wrong type or range. */
export function normalizeConfig(raw: Section, projectRoot: string): ChatgateConfig {
  const defaults = defaultConfig(projectRoot);
  const signal = section(raw, "signal");
  const directory = section(raw, "directory");
  const sessions = section(raw, "sessions");
  const notifier = section(raw, "notifier");
  const routing = section(raw, "routing");

  const account = typeof signal.account === "string" && signal.account.trim() ? signal.account.trim() : undefined;

  return {
    signal: {
      command: str(signal.command, defaults.signal.command),
      dataDir: str(signal.dataDir, defaults.signal.dataDir),
      receiveTimeoutSec: positive(signal.receiveTimeoutSec, defaults.signal.receiveTimeoutSec),
      ...(account ? { account } : {})
    },
    directory: {
      lookupTimeoutMs: positive(directory.lookupTimeoutMs, defaults.directory.lookupTimeoutMs)
    },
    sessions: {
      backend: sessions.backend === "memory" ? "memory" : "sqlite"
    },
    notifier: {
      apiKeyEnv: str(notifier.apiKeyEnv, defaults.notifier.apiKeyEnv),
      from: str(notifier.from, defaults.notifier.from),
      appName: str(notifier.appName, defaults.notifier.appName),
      timeoutMs: positive(notifier.timeoutMs, defaults.notifier.timeoutMs)
    },
    routing: {
      defaultHandler: str(routing.defaultHandler, defaults.routing.defaultHandler).toLowerCase(),
      logoutKeyword: str(routing.logoutKeyword, defaults.routing.logoutKeyword),
      responseChunkSize: Math.floor(positive(routing.responseChunkSize, defaults.routing.responseChunkSize))
    }
  };
}
