import { runCommand } from "../core/utils.js";

export interface SignalInboundEvent {
  source: string;
  isSyncSent: boolean;
  text: string;
  signalMessageId: string;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function objectAt(value: unknown, key: string): JsonObject | undefined {
  if (!isObject(value)) {
    return undefined;
  }
  const inner = value[key];
  return isObject(inner) ? inner : undefined;
}

function stringAt(value: JsonObject | undefined, key: string): string | undefined {
  const inner = value?.[key];
  return typeof inner === "string" && inner ? inner : undefined;
}

function numberAt(value: JsonObject | undefined, key: string): number | undefined {
  const inner = value?.[key];
  return typeof inner === "number" ? inner : undefined;
}

function parseJsonLines(input: string): unknown[] {
  const out: unknown[] = [];
  for (const line of input.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }
    try {
      out.push(JSON.parse(trimmed));
    } catch {
      // signal-cli interleaves plain-text warnings with JSON lines
    }
  }
  return out;
}

export function normalizeEvent(raw: unknown): SignalInboundEvent | null {
  const envelope = objectAt(raw, "envelope") ?? (isObject(raw) ? raw : undefined);
  const source = stringAt(envelope, "sourceNumber") ?? stringAt(envelope, "source") ?? stringAt(envelope, "sourceUuid");
  if (!source) {
    return null;
  }

  const sentMessage = objectAt(objectAt(envelope, "syncMessage"), "sentMessage");
  const dataMessage = objectAt(envelope, "dataMessage") ?? sentMessage;
  if (!dataMessage) {
    return null;
  }

  const timestamp = numberAt(dataMessage, "timestamp") ?? numberAt(envelope, "timestamp") ?? Date.now();
  return {
    source,
    isSyncSent: dataMessage === sentMessage,
    text: stringAt(dataMessage, "message") ?? "",
    signalMessageId: String(timestamp)
  };
}

export class SignalCliAdapter {
  constructor(
    private readonly command: string,
    private readonly dataDir: string,
    private readonly account?: string
  ) {}

  async receive(timeoutSec: number): Promise<SignalInboundEvent[]> {
    const args = ["-o", "json", "--config", this.dataDir];
    if (this.account) {
      args.push("-a", this.account);
    }
    args.push("receive", "--timeout", String(timeoutSec));
    const result = await runCommand(this.command, args, { timeoutMs: timeoutSec * 1000 + 3000 });
    if (result.code !== 0 && !result.stdout.trim()) {
      if (result.stderr.trim()) {
        throw new Error(`signal-cli receive failed: ${result.stderr.trim()}`);
      }
      return [];
    }

    const events: SignalInboundEvent[] = [];
    for (const item of parseJsonLines(result.stdout)) {
      const normalized = normalizeEvent(item);
      if (normalized) {
        events.push(normalized);
      }
    }
    return events;
  }

  async sendMessage(recipient: string, text: string): Promise<void> {
    const args = ["--config", this.dataDir];
    if (this.account) {
      args.push("-a", this.account);
    }
    args.push("send", "-m", text, recipient);
    const result = await runCommand(this.command, args, { timeoutMs: 20_000 });
    if (result.code !== 0) {
      throw new Error(`signal-cli send failed: ${result.stderr || result.stdout}`);
    }
  }
}
