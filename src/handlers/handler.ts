import { UnregisteredCapabilityError } from "../core/errors.js";
import type { AgentResponse, Session, VerifiedSession } from "../types.js";

export interface HandlerContext {
  senderAddress: string;
  session: Readonly<Session>;
}

export interface TaskContext extends HandlerContext {
  session: Readonly<VerifiedSession>;
  userId: string;
}

export interface MessageHandler<C extends HandlerContext = HandlerContext> {
  readonly name: string;
  handle(message: string, context: C): Promise<AgentResponse>;
}

/** Handler for verified traffic. It may only request `endSession`; the session itself is read-only. */
export type TaskHandler = MessageHandler<TaskContext>;

export class HandlerRegistry {
  private readonly handlers = new Map<string, TaskHandler>();

  constructor(handlers: TaskHandler[] = []) {
    for (const handler of handlers) {
      this.register(handler);
    }
  }

  register(handler: TaskHandler): this {
    const key = handler.name.toLowerCase();
    if (this.handlers.has(key)) {
      throw new Error(`Handler '${handler.name}' is already registered`);
    }
    this.handlers.set(key, handler);
    return this;
  }

  require(name: string): TaskHandler {
    const handler = this.handlers.get(name.toLowerCase());
    if (!handler) {
      throw new UnregisteredCapabilityError(name);
    }
    return handler;
  }

  names(): string[] {
    return [...this.handlers.keys()].sort();
  }
}
