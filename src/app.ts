import { ResendNotifier } from "./adapters/notifier.js";
import { Dispatcher } from "./core/dispatcher.js";
import { SqliteDirectory } from "./core/directory.js";
import { MemorySessionStore, SqliteSessionStore } from "./core/sessionStore.js";
import { AuthenticationHandler } from "./handlers/authHandler.js";
import { HandlerRegistry } from "./handlers/handler.js";
import { AccountHandler, AssistantHandler, HelpHandler } from "./handlers/taskHandlers.js";
import type { ChatgateConfig } from "./config.js";
import type { Db } from "./core/db.js";
import type { DirectoryLookup } from "./core/directory.js";
import type { SessionStore } from "./core/sessionStore.js";
import type { Notifier } from "./adapters/notifier.js";

export interface Chatgate {
  dispatcher: Dispatcher;
  directory: DirectoryLookup;
  sessions: SessionStore;
  registry: HandlerRegistry;
}

export interface ChatgateOverrides {
  notifier?: Notifier;
  sessions?: SessionStore;
  env?: NodeJS.ProcessEnv;
}

function createSessionStore(cfg: ChatgateConfig, db: Db): SessionStore {
  return cfg.sessions.backend === "memory" ? new MemorySessionStore() : new SqliteSessionStore(db);
}

/**
 * Session store for CLI commands that run outside the daemon. The memory
 * backend lives only inside the daemon process, so there is nothing to open.
 */
export function openPersistedSessions(cfg: ChatgateConfig, db: Db): SessionStore {
  if (cfg.sessions.backend === "memory") {
    throw new Error(
      "Sessions use the memory backend and live only inside the running daemon; restart chatgated to reset them"
    );
  }
  return new SqliteSessionStore(db);
}

export function createChatgate(cfg: ChatgateConfig, db: Db, overrides: ChatgateOverrides = {}): Chatgate {
  const env = overrides.env ?? process.env;
  const directory = new SqliteDirectory(db, cfg.directory.lookupTimeoutMs);
  const notifier =
    overrides.notifier ??
    new ResendNotifier({
      apiKey: env[cfg.notifier.apiKeyEnv],
      from: cfg.notifier.from,
      appName: cfg.notifier.appName,
      timeoutMs: cfg.notifier.timeoutMs
    });
  const sessions = overrides.sessions ?? createSessionStore(cfg, db);

  const registry = new HandlerRegistry();
  registry
    .register(new AssistantHandler(cfg.routing.logoutKeyword))
    .register(new HelpHandler(() => registry.names()))
    .register(new AccountHandler(directory));

  const dispatcher = new Dispatcher(sessions, new AuthenticationHandler(directory, notifier), registry, {
    defaultHandler: cfg.routing.defaultHandler,
    logoutKeyword: cfg.routing.logoutKeyword
  });

  return { dispatcher, directory, sessions, registry };
}
