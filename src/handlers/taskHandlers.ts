import { maskEmail } from "../core/utils.js";
import type { DirectoryLookup } from "../core/directory.js";
import type { AgentResponse } from "../types.js";
import type { TaskContext, TaskHandler } from "./handler.js";

// Placeholder for verified traffic until real task handlers are registered.
export class AssistantHandler implements TaskHandler {
  readonly name = "assistant";

  constructor(private readonly logoutKeyword: string) {}

  async handle(): Promise<AgentResponse> {
    return {
      replyText: [
        "👋 You are verified. Task-based features are coming soon.",
        "",
        `Send */help* to list what I can do, or *${this.logoutKeyword}* to end your session.`
      ].join("\n")
    };
  }
}

export class HelpHandler implements TaskHandler {
  readonly name = "help";

  constructor(private readonly listHandlers: () => string[]) {}

  async handle(): Promise<AgentResponse> {
    const commands = this.listHandlers().map((name) => `• /${name}`);
    return {
      replyText: ["Available commands:", ...commands].join("\n")
    };
  }
}

export class AccountHandler implements TaskHandler {
  readonly name = "account";

  constructor(private readonly directory: DirectoryLookup) {}

  async handle(_message: string, context: TaskContext): Promise<AgentResponse> {
    const user = await this.directory.findById(context.userId);
    if (!user) {
      return {
        replyText: "Your account is no longer active. Please contact our support team.",
        endSession: true
      };
    }
    return {
      replyText: [
        `👤 *${user.name}*`,
        `Company: ${user.companyId}`,
        `Email: ${maskEmail(user.email)}`
      ].join("\n")
    };
  }
}
