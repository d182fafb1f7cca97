import { Logger } from "./logger.js";
import { KeyedMutex } from "./keyedMutex.js";
import { routeTextInput } from "./router.js";
import { initialSession } from "./sessionStore.js";
import { CorruptSessionError, TransientFailureError, UnregisteredCapabilityError } from "./errors.js";
import type { RouteDecision } from "./router.js";
import type { SessionStore } from "./sessionStore.js";
import type { AuthenticationHandler, AuthTransition } from "../handlers/authHandler.js";
import type { HandlerRegistry, TaskHandler } from "../handlers/handler.js";
import type { AgentResponse, Session, VerifiedSession } from "../types.js";

export interface DispatcherOptions {
  defaultHandler: string;
  logoutKeyword: string;
}

export const DISPATCH_REPLIES = {
  transient: "⚠️ Something went wrong on our side. Please try again in a moment.",
  loggedOut: "👋 You have been logged out. Send any message to start again.",
  unknownCommand: (name: string): string =>
    `Sorry, I can't help with */${name}* yet. Send */help* to see what I can do.`
} as const;

/**
 * Front door for inbound traffic. Every message runs get → handle → put under
 * a per-sender lock, so two messages from one sender never interleave while
 * different senders proceed in parallel.
 *
 * Session store failures reject the returned promise: the message counts as
 * undelivered and is safe to redeliver.
 */
export class Dispatcher {
  private readonly logger = new Logger("dispatcher");
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly store: SessionStore,
    private readonly auth: AuthenticationHandler,
    private readonly registry: HandlerRegistry,
    private readonly options: DispatcherOptions
  ) {
    this.registry.require(options.defaultHandler);
  }

  async route(senderAddress: string, messageText: string): Promise<string> {
    const response = await this.dispatch(senderAddress, messageText);
    return response.replyText;
  }

  async dispatch(senderAddress: string, messageText: string): Promise<AgentResponse> {
    return await this.locks.runExclusive(senderAddress, async () => {
      const decision = routeTextInput(messageText, this.options.logoutKeyword);
      if (decision.type === "logout") {
        await this.store.clear(senderAddress);
        this.logger.info("sender logged out", { senderAddress });
        return { replyText: DISPATCH_REPLIES.loggedOut, endSession: true };
      }

      const session = await this.loadSession(senderAddress);
      if (session.authState !== "VERIFIED") {
        return await this.authenticate(senderAddress, messageText, session);
      }
      return await this.runTask(senderAddress, decision, session);
    });
  }

  async logout(senderAddress: string): Promise<void> {
    await this.locks.runExclusive(senderAddress, async () => {
      await this.store.clear(senderAddress);
      this.logger.info("session cleared", { senderAddress });
    });
  }

  private async loadSession(senderAddress: string): Promise<Session> {
    try {
      return await this.store.get(senderAddress);
    } catch (err) {
      if (!(err instanceof CorruptSessionError)) {
        throw err;
      }
      this.logger.error("corrupt session reset to initial state", { senderAddress, error: err.message });
      await this.store.clear(senderAddress);
      return initialSession(senderAddress);
    }
  }

  private async authenticate(senderAddress: string, messageText: string, session: Session): Promise<AgentResponse> {
    let transition: AuthTransition;
    try {
      transition = await this.auth.authenticate(messageText, session);
    } catch (err) {
      if (err instanceof TransientFailureError) {
        this.logger.warn("authentication deferred by transient failure", {
          senderAddress,
          authState: session.authState,
          error: String(err)
        });
        return { replyText: DISPATCH_REPLIES.transient };
      }
      throw err;
    }

    await this.store.put(senderAddress, transition.session);
    this.logger.debug("auth transition", {
      senderAddress,
      from: session.authState,
      to: transition.session.authState
    });
    return transition.response;
  }

  private async runTask(
    senderAddress: string,
    decision: Exclude<RouteDecision, { type: "logout" }>,
    session: VerifiedSession
  ): Promise<AgentResponse> {
    const handlerName = decision.type === "command" ? decision.handler : this.options.defaultHandler;
    const payload = decision.payload;

    let handler: TaskHandler;
    try {
      handler = this.registry.require(handlerName);
    } catch (err) {
      if (err instanceof UnregisteredCapabilityError) {
        this.logger.warn("no handler for capability", { senderAddress, capability: err.capability });
        return { replyText: DISPATCH_REPLIES.unknownCommand(err.capability) };
      }
      throw err;
    }

    let response: AgentResponse;
    try {
      response = await handler.handle(payload, {
        senderAddress,
        session: { ...session },
        userId: session.userId
      });
    } catch (err) {
      this.logger.error("task handler failed", { senderAddress, handler: handler.name, error: String(err) });
      return { replyText: DISPATCH_REPLIES.transient };
    }

    if (response.endSession) {
      await this.store.clear(senderAddress);
      this.logger.info("session ended by handler", { senderAddress, handler: handler.name });
    }
    return response;
  }
}
