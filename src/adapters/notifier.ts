import { Resend } from "resend";
import { Logger } from "../core/logger.js";
import { withTimeout } from "../core/utils.js";
import type { UserRecord } from "../types.js";

/** Confirmation channel for senders verified by client code. Resolves false instead of rejecting. */
export interface Notifier {
  sendConfirmation(user: UserRecord): Promise<boolean>;
}

export interface ResendNotifierConfig {
  apiKey?: string;
  from: string;
  appName: string;
  timeoutMs: number;
}

export function buildConfirmationEmail(user: UserRecord, appName: string): { subject: string; text: string } {
  return {
    subject: `Chat verification confirmed - ${appName}`,
    text: [
      `Hello ${user.name},`,
      "",
      `Your identity has been verified on ${appName} via chat.`,
      "",
      "If you did not initiate this verification, please contact support immediately.",
      "",
      "Best regards,",
      `The ${appName} Team`
    ].join("\n")
  };
}

export class ResendNotifier implements Notifier {
  private readonly logger = new Logger("notifier");
  private readonly resend?: Resend;

  constructor(private readonly cfg: ResendNotifierConfig) {
    if (cfg.apiKey) {
      this.resend = new Resend(cfg.apiKey);
    }
  }

  async sendConfirmation(user: UserRecord): Promise<boolean> {
    if (!this.resend) {
      this.logger.warn("resend is not configured; confirmation skipped", { userId: user.id });
      return false;
    }
    const { subject, text } = buildConfirmationEmail(user, this.cfg.appName);
    try {
      const result = await withTimeout(
        this.resend.emails.send({
          from: this.cfg.from,
          to: [user.email],
          subject,
          text
        }),
        this.cfg.timeoutMs,
        "confirmation email"
      );
      if (result.error) {
        this.logger.warn("confirmation email rejected", { userId: user.id, error: result.error.message });
        return false;
      }
      this.logger.info("confirmation email sent", { userId: user.id, emailId: result.data?.id });
      return true;
    } catch (err) {
      this.logger.warn("confirmation email failed", { userId: user.id, error: String(err) });
      return false;
    }
  }
}
