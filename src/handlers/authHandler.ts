import { Logger } from "../core/logger.js";
import { maskEmail, nowIso } from "../core/utils.js";
import type { DirectoryLookup } from "../core/directory.js";
import type { Notifier } from "../adapters/notifier.js";
import type { AgentResponse, Session, UserRecord } from "../types.js";
import type { HandlerContext, MessageHandler } from "./handler.js";

export interface AuthTransition {
  session: Session;
  response: AgentResponse;
  user: UserRecord | null;
}

export const AUTH_REPLIES = {
  verifiedByPhone: (name: string): string =>
    `✅ Welcome back, *${name}*! You are verified.\n\nHow can I help you today?`,
  verifiedByCode: (name: string): string => `✅ Verified! Welcome, *${name}*.`,
  confirmationSent: (email: string): string => `A confirmation email has been sent to *${maskEmail(email)}*.`,
  promptClientCode:
    "🔍 I couldn't find an account linked to this phone number.\n\nPlease reply with your *Client Code* so I can look you up.",
  emptyClientCode: "Please reply with your *Client Code* to continue.",
  rejected:
    "❌ Sorry, I couldn't verify your identity with that Client Code.\n\nPlease contact our support team for help.",
  alreadyVerified: "You are already verified. How can I help you today?"
} as const;

/**
 * Authentication state machine for unverified senders.
 *
 * UNVERIFIED looks the sender address up as a phone number. A miss moves to
 * AWAITING_CLIENT_CODE, where the next message (trimmed) is matched exactly
 * against client codes. A code match verifies the sender and sends a
 * confirmation email; a code miss is REJECTED, which stays put until logout.
 *
 * Directory failures propagate untouched so the caller can leave the session
 * as it was. Notification failures never undo a verification.
 */
export class AuthenticationHandler implements MessageHandler {
  readonly name = "auth";
  private readonly logger = new Logger("auth");

  constructor(
    private readonly directory: DirectoryLookup,
    private readonly notifier: Notifier
  ) {}

  async handle(message: string, context: HandlerContext): Promise<AgentResponse> {
    const transition = await this.authenticate(message, context.session);
    return transition.response;
  }

  async authenticate(message: string, session: Readonly<Session>): Promise<AuthTransition> {
    switch (session.authState) {
      case "UNVERIFIED":
        return await this.checkPhone(session.senderAddress);
      case "AWAITING_CLIENT_CODE":
        return await this.checkClientCode(session, message.trim());
      case "REJECTED":
        return {
          session: { ...session },
          response: { replyText: AUTH_REPLIES.rejected },
          user: null
        };
      case "VERIFIED":
        return {
          session: { ...session },
          response: { replyText: AUTH_REPLIES.alreadyVerified },
          user: null
        };
    }
  }

  private async checkPhone(senderAddress: string): Promise<AuthTransition> {
    const user = await this.directory.findByPhone(senderAddress);
    if (user) {
      this.logger.info("sender verified by phone", { senderAddress, userId: user.id });
      return {
        session: verified(senderAddress, user),
        response: { replyText: AUTH_REPLIES.verifiedByPhone(user.name), notificationSent: false },
        user
      };
    }

    this.logger.info("phone not in directory, requesting client code", { senderAddress });
    return {
      session: { senderAddress, authState: "AWAITING_CLIENT_CODE", userId: null, lastUpdated: nowIso() },
      response: { replyText: AUTH_REPLIES.promptClientCode },
      user: null
    };
  }

  private async checkClientCode(session: Readonly<Session>, code: string): Promise<AuthTransition> {
    const { senderAddress } = session;
    if (!code) {
      return {
        session: { ...session },
        response: { replyText: AUTH_REPLIES.emptyClientCode },
        user: null
      };
    }

    const user = await this.directory.findByClientCode(code);
    if (!user) {
      this.logger.info("client code not in directory, rejecting sender", { senderAddress });
      return {
        session: { senderAddress, authState: "REJECTED", userId: null, lastUpdated: nowIso() },
        response: { replyText: AUTH_REPLIES.rejected },
        user: null
      };
    }

    this.logger.info("sender verified by client code", { senderAddress, userId: user.id });
    const notificationSent = await this.notify(user);
    const lines: string[] = [AUTH_REPLIES.verifiedByCode(user.name)];
    if (notificationSent) {
      lines.push(AUTH_REPLIES.confirmationSent(user.email));
    }
    return {
      session: verified(senderAddress, user),
      response: { replyText: lines.join("\n\n"), notificationSent },
      user
    };
  }

  private async notify(user: UserRecord): Promise<boolean> {
    try {
      return await this.notifier.sendConfirmation(user);
    } catch (err) {
      this.logger.warn("confirmation notifier threw", { userId: user.id, error: String(err) });
      return false;
    }
  }
}

function verified(senderAddress: string, user: UserRecord): Session {
  return { senderAddress, authState: "VERIFIED", userId: user.id, lastUpdated: nowIso() };
}
