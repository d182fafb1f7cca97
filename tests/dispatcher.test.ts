import { describe, expect, it } from "vitest";
import { DISPATCH_REPLIES, Dispatcher } from "../src/core/dispatcher.js";
import { SessionStoreError, TransientFailureError } from "../src/core/errors.js";
import { MemorySessionStore, SqliteSessionStore } from "../src/core/sessionStore.js";
import { AUTH_REPLIES, AuthenticationHandler } from "../src/handlers/authHandler.js";
import { HandlerRegistry } from "../src/handlers/handler.js";
import { AccountHandler, AssistantHandler, HelpHandler } from "../src/handlers/taskHandlers.js";
import type { SessionRow } from "../src/core/db.js";
import type { SessionStore } from "../src/core/sessionStore.js";
import type { TaskContext, TaskHandler } from "../src/handlers/handler.js";
import type { AgentResponse, Session } from "../src/types.js";
import { FakeDirectory, FakeNotifier } from "./fakes.js";

class RecordingHandler implements TaskHandler {
  calls: Array<{ message: string; context: TaskContext }> = [];

  constructor(
    readonly name: string,
    private readonly response: AgentResponse = { replyText: `${name}-reply` }
  ) {}

  async handle(message: string, context: TaskContext): Promise<AgentResponse> {
    this.calls.push({ message, context });
    return this.response;
  }
}

class ThrowingHandler implements TaskHandler {
  readonly name = "broken";

  async handle(): Promise<AgentResponse> {
    throw new Error("database password leaked in stack trace");
  }
}

class SpyAuth extends AuthenticationHandler {
  calls = 0;

  override async authenticate(...args: Parameters<AuthenticationHandler["authenticate"]>) {
    this.calls += 1;
    return await super.authenticate(...args);
  }
}

function setup(options: { store?: SessionStore; notifier?: FakeNotifier; handlers?: TaskHandler[] } = {}) {
  const directory = new FakeDirectory();
  const notifier = options.notifier ?? new FakeNotifier();
  const store = options.store ?? new MemorySessionStore();
  const auth = new SpyAuth(directory, notifier);
  const registry = new HandlerRegistry(options.handlers ?? [new AssistantHandler("logout")]);
  const dispatcher = new Dispatcher(store, auth, registry, { defaultHandler: "assistant", logoutKeyword: "logout" });
  return { directory, notifier, store, auth, registry, dispatcher };
}

describe("Dispatcher", () => {
  it("verifies a directory phone on the first message", async () => {
    const { dispatcher, store, notifier } = setup();

    const reply = await dispatcher.route("+15551234567", "Hi");

    expect(reply).toBe(AUTH_REPLIES.verifiedByPhone("Alice Johnson"));
    expect(await store.get("+15551234567")).toMatchObject({ authState: "VERIFIED", userId: "U1" });
    expect(notifier.sent).toEqual([]);
  });

  it("walks an unknown sender through the client code fallback", async () => {
    const { dispatcher, store, notifier } = setup();

    const prompt = await dispatcher.route("+19999999999", "Hello");
    expect(prompt).toBe(AUTH_REPLIES.promptClientCode);
    expect(await store.get("+19999999999")).toMatchObject({ authState: "AWAITING_CLIENT_CODE", userId: null });

    const confirmed = await dispatcher.route("+19999999999", "GLX-2001");
    expect(confirmed).toContain("Verified! Welcome, *Carol Davis*.");
    expect(confirmed).toContain("A confirmation email has been sent to *c***l@example.com*.");
    expect(await store.get("+19999999999")).toMatchObject({ authState: "VERIFIED", userId: "U3" });
    expect(notifier.sent.map((user) => user.id)).toEqual(["U3"]);
  });

  it("rejects an invalid client code and stays rejected", async () => {
    const { dispatcher, store, directory } = setup();

    await dispatcher.route("+19999999999", "Hello");
    const rejected = await dispatcher.route("+19999999999", "INVALID");
    expect(rejected).toBe(AUTH_REPLIES.rejected);
    expect(await store.get("+19999999999")).toMatchObject({ authState: "REJECTED", userId: null });

    const again = await dispatcher.route("+19999999999", "GLX-2001");
    expect(again).toBe(AUTH_REPLIES.rejected);
    expect((await store.get("+19999999999")).authState).toBe("REJECTED");
    expect(directory.codeLookups).toEqual(["INVALID"]);
  });

  it("resets to the implicit initial state on logout", async () => {
    const { dispatcher, store, directory } = setup();
    await dispatcher.route("+15551234567", "Hi");

    const reply = await dispatcher.route("+15551234567", "  LOGOUT ");
    expect(reply).toBe(DISPATCH_REPLIES.loggedOut);
    expect(await store.get("+15551234567")).toMatchObject({ authState: "UNVERIFIED", userId: null });

    await dispatcher.route("+15551234567", "Hi again");
    expect(directory.phoneLookups).toEqual(["+15551234567", "+15551234567"]);
  });

  it("clears a session through the out-of-band logout", async () => {
    const { dispatcher, store } = setup();
    await dispatcher.route("+19999999999", "Hello");
    await dispatcher.route("+19999999999", "INVALID");

    await dispatcher.logout("+19999999999");

    expect((await store.get("+19999999999")).authState).toBe("UNVERIFIED");
    expect(await dispatcher.route("+19999999999", "Hello")).toBe(AUTH_REPLIES.promptClientCode);
  });

  it("sends verified traffic to the default handler without re-authenticating", async () => {
    const assistant = new RecordingHandler("assistant");
    const { dispatcher, store, auth } = setup({ handlers: [assistant] });
    await dispatcher.route("+15551234567", "Hi");
    const before = await store.get("+15551234567");

    const reply = await dispatcher.route("+15551234567", "what is my balance?");

    expect(reply).toBe("assistant-reply");
    expect(auth.calls).toBe(1);
    expect(assistant.calls).toHaveLength(1);
    expect(assistant.calls[0].message).toBe("what is my balance?");
    expect(assistant.calls[0].context.userId).toBe("U1");
    expect(assistant.calls[0].context.session).toMatchObject({ authState: "VERIFIED", userId: "U1" });
    expect(await store.get("+15551234567")).toEqual(before);
  });

  it("selects a handler named by a slash command", async () => {
    const assistant = new RecordingHandler("assistant");
    const billing = new RecordingHandler("billing");
    const { dispatcher } = setup({ handlers: [assistant, billing] });
    await dispatcher.route("+15551234567", "Hi");

    const reply = await dispatcher.route("+15551234567", "/Billing   last invoice ");

    expect(reply).toBe("billing-reply");
    expect(billing.calls[0].message).toBe("last invoice");
    expect(assistant.calls).toEqual([]);
  });

  it("answers unknown commands with a fallback reply", async () => {
    const { dispatcher, store } = setup();
    await dispatcher.route("+15551234567", "Hi");

    const reply = await dispatcher.route("+15551234567", "/refund 42");

    expect(reply).toBe(DISPATCH_REPLIES.unknownCommand("refund"));
    expect((await store.get("+15551234567")).authState).toBe("VERIFIED");
  });

  it("hides task handler errors behind the generic reply", async () => {
    const { dispatcher } = setup({ handlers: [new AssistantHandler("logout"), new ThrowingHandler()] });
    await dispatcher.route("+15551234567", "Hi");

    const reply = await dispatcher.route("+15551234567", "/broken");

    expect(reply).toBe(DISPATCH_REPLIES.transient);
  });

  it("clears the session when a task handler ends it", async () => {
    const closing = new RecordingHandler("assistant", { replyText: "bye", endSession: true });
    const { dispatcher, store } = setup({ handlers: [closing] });
    await dispatcher.route("+15551234567", "Hi");

    expect(await dispatcher.route("+15551234567", "done")).toBe("bye");
    expect((await store.get("+15551234567")).authState).toBe("UNVERIFIED");
  });

  it("does not transition when the directory is unavailable", async () => {
    const { dispatcher, store, directory } = setup();
    await dispatcher.route("+19999999999", "Hello");
    directory.failWith = new TransientFailureError("lookup timed out");

    const reply = await dispatcher.route("+19999999999", "GLX-2001");

    expect(reply).toBe(DISPATCH_REPLIES.transient);
    expect((await store.get("+19999999999")).authState).toBe("AWAITING_CLIENT_CODE");

    directory.failWith = null;
    expect(await dispatcher.route("+19999999999", "GLX-2001")).toContain("Carol Davis");
  });

  it("resets a corrupt session and reruns the phone lookup", async () => {
    const rows = new Map<string, SessionRow>([
      ["+15551234567", { sender_address: "+15551234567", auth_state: "VERIFIED", user_id: null, updated_at: "2024-01-01T00:00:00.000Z" }]
    ]);
    const store = new SqliteSessionStore({
      getSessionRow: async (sender) => rows.get(sender),
      upsertSessionRow: async (row) => {
        rows.set(row.sender_address, row);
      },
      deleteSessionRow: async (sender) => {
        rows.delete(sender);
      },
      listSessionRows: async () => [...rows.values()]
    });
    const { dispatcher, directory } = setup({ store });

    const reply = await dispatcher.route("+15551234567", "Hi");

    expect(reply).toBe(AUTH_REPLIES.verifiedByPhone("Alice Johnson"));
    expect(directory.phoneLookups).toEqual(["+15551234567"]);
    expect(rows.get("+15551234567")).toMatchObject({ auth_state: "VERIFIED", user_id: "U1" });
  });

  it("propagates session store failures to the transport", async () => {
    const store = new SqliteSessionStore({
      getSessionRow: async () => {
        throw new Error("SQLITE_BUSY");
      },
      upsertSessionRow: async () => {},
      deleteSessionRow: async () => {},
      listSessionRows: async () => []
    });
    const { dispatcher } = setup({ store });

    await expect(dispatcher.route("+15551234567", "Hi")).rejects.toBeInstanceOf(SessionStoreError);
  });

  it("serializes concurrent messages from one sender", async () => {
    const { dispatcher, store, notifier } = setup();

    const replies = await Promise.all([
      dispatcher.route("+19999999999", "Hello"),
      dispatcher.route("+19999999999", "GLX-2001"),
      dispatcher.route("+19999999999", "GLX-2001"),
      dispatcher.route("+19999999999", "GLX-2001")
    ]);

    expect(replies[0]).toBe(AUTH_REPLIES.promptClientCode);
    expect(replies[1]).toContain("Carol Davis");
    expect(replies[2]).toContain("Task-based features are coming soon");
    expect(replies[3]).toContain("Task-based features are coming soon");
    expect(notifier.sent).toHaveLength(1);
    expect(await store.get("+19999999999")).toMatchObject({ authState: "VERIFIED", userId: "U3" });
  });

  it("verifies redelivered client codes exactly once", async () => {
    const store = new MemorySessionStore();
    const pending: Session = {
      senderAddress: "+19999999999",
      authState: "AWAITING_CLIENT_CODE",
      userId: null,
      lastUpdated: "2024-01-01T00:00:00.000Z"
    };
    await store.put("+19999999999", pending);
    const { dispatcher, notifier, auth } = setup({ store });

    await Promise.all(Array.from({ length: 5 }, () => dispatcher.route("+19999999999", "GLX-2001")));

    expect(auth.calls).toBe(1);
    expect(notifier.sent).toHaveLength(1);
  });

  it("keeps senders independent", async () => {
    const { dispatcher, store } = setup();

    await Promise.all([dispatcher.route("+15551234567", "Hi"), dispatcher.route("+19999999999", "Hello")]);

    expect((await store.get("+15551234567")).authState).toBe("VERIFIED");
    expect((await store.get("+19999999999")).authState).toBe("AWAITING_CLIENT_CODE");
  });

  it("refuses to start without its default handler", () => {
    const directory = new FakeDirectory();
    expect(
      () =>
        new Dispatcher(
          new MemorySessionStore(),
          new AuthenticationHandler(directory, new FakeNotifier()),
          new HandlerRegistry([new AccountHandler(directory)]),
          { defaultHandler: "assistant", logoutKeyword: "logout" }
        )
    ).toThrow("no handler registered for 'assistant'");
  });

  it("lists registered handlers through /help", async () => {
    const registry = new HandlerRegistry();
    const directory = new FakeDirectory();
    registry.register(new AssistantHandler("logout")).register(new HelpHandler(() => registry.names()));
    const dispatcher = new Dispatcher(
      new MemorySessionStore(),
      new AuthenticationHandler(directory, new FakeNotifier()),
      registry,
      { defaultHandler: "assistant", logoutKeyword: "logout" }
    );
    await dispatcher.route("+15551234567", "Hi");

    expect(await dispatcher.route("+15551234567", "/help")).toBe("Available commands:\n• /assistant\n• /help");
  });
});
