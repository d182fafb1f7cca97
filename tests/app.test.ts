import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createChatgate, openPersistedSessions } from "../src/app.js";
import { defaultConfig } from "../src/config.js";
import { Db } from "../src/core/db.js";
import { MemorySessionStore, SqliteSessionStore } from "../src/core/sessionStore.js";
import { AUTH_REPLIES } from "../src/handlers/authHandler.js";
import { FakeNotifier } from "./fakes.js";

describe("createChatgate", () => {
  let db: Db;

  beforeEach(async () => {
    db = new Db(":memory:");
    await db.migrate();
    await db.addUser({
      phone: "+442071234567",
      clientCode: "GLX-2001",
      companyId: "globex_inc",
      name: "Carol Davis",
      email: "carol@example.com"
    });
  });

  afterEach(async () => {
    await db.close();
  });

  it("registers the built-in task handlers", () => {
    const { registry } = createChatgate(defaultConfig("/srv/a"), db, { notifier: new FakeNotifier() });

    expect(registry.names()).toEqual(["account", "assistant", "help"]);
  });

  it("picks the session backend from config", () => {
    const cfg = defaultConfig("/srv/a");
    expect(createChatgate(cfg, db, { notifier: new FakeNotifier() }).sessions).toBeInstanceOf(SqliteSessionStore);

    cfg.sessions.backend = "memory";
    expect(createChatgate(cfg, db, { notifier: new FakeNotifier() }).sessions).toBeInstanceOf(MemorySessionStore);
  });

  it("runs a full client code verification against the database", async () => {
    const notifier = new FakeNotifier();
    const { dispatcher, sessions } = createChatgate(defaultConfig("/srv/a"), db, { notifier });

    expect(await dispatcher.route("+15550009999", "Hello")).toBe(AUTH_REPLIES.promptClientCode);
    expect(await dispatcher.route("+15550009999", "GLX-2001")).toContain("Welcome, *Carol Davis*");
    expect(await dispatcher.route("+15550009999", "/account")).toBe(
      "👤 *Carol Davis*\nCompany: globex_inc\nEmail: c***l@example.com"
    );

    const session = await sessions.get("+15550009999");
    expect(session.authState).toBe("VERIFIED");
    expect(notifier.sent.map((user) => user.email)).toEqual(["carol@example.com"]);
  });

  it("skips confirmation emails when the api key is missing", async () => {
    const { dispatcher } = createChatgate(defaultConfig("/srv/a"), db, { env: {} });

    await dispatcher.route("+15550009999", "Hello");

    expect(await dispatcher.route("+15550009999", "GLX-2001")).toBe(AUTH_REPLIES.verifiedByCode("Carol Davis"));
  });

  it("opens the sqlite sessions for offline session commands", async () => {
    const cfg = defaultConfig("/srv/a");
    await db.upsertSessionRow({
      sender_address: "+15550009999",
      auth_state: "REJECTED",
      user_id: null,
      updated_at: "2024-01-01T00:00:00.000Z"
    });

    const sessions = openPersistedSessions(cfg, db);
    expect((await sessions.list()).map((session) => session.authState)).toEqual(["REJECTED"]);

    await sessions.clear("+15550009999");
    expect(await db.getSessionRow("+15550009999")).toBeUndefined();
  });

  it("refuses offline session commands for the memory backend", () => {
    const cfg = defaultConfig("/srv/a");
    cfg.sessions.backend = "memory";

    expect(() => openPersistedSessions(cfg, db)).toThrow(
      "Sessions use the memory backend and live only inside the running daemon"
    );
  });
});
