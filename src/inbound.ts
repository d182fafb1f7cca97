import { DISPATCH_REPLIES } from "./core/dispatcher.js";
import { Logger } from "./core/logger.js";
import { chunkText } from "./core/utils.js";
import type { Dispatcher } from "./core/dispatcher.js";
import type { SignalCliAdapter, SignalInboundEvent } from "./adapters/signalCliAdapter.js";

const logger = new Logger("inbound");

export interface InboundContext {
  dispatcher: Pick<Dispatcher, "route">;
  signal: Pick<SignalCliAdapter, "sendMessage">;
  responseChunkSize: number;
}

export async function processInboundEvent(event: SignalInboundEvent, ctx: InboundContext): Promise<void> {
  // Messages this account sent from another linked device.
  if (event.isSyncSent) {
    return;
  }
  if (!event.text.trim()) {
    return;
  }

  let reply: string;
  try {
    reply = await ctx.dispatcher.route(event.source, event.text);
  } catch (err) {
    logger.error("message left undelivered", {
      source: event.source,
      signalMessageId: event.signalMessageId,
      error: String(err)
    });
    reply = DISPATCH_REPLIES.transient;
  }

  for (const chunk of chunkText(reply, ctx.responseChunkSize)) {
    await ctx.signal.sendMessage(event.source, chunk);
  }
}

/**
 * Handles one receive batch. Each sender's events run in arrival order, reply
 * included, so replies reach a sender in the order of their messages. Senders
 * run in parallel.
 */
export async function processInboundBatch(events: SignalInboundEvent[], ctx: InboundContext): Promise<void> {
  const bySender = new Map<string, SignalInboundEvent[]>();
  for (const event of events) {
    const queue = bySender.get(event.source);
    if (queue) {
      queue.push(event);
    } else {
      bySender.set(event.source, [event]);
    }
  }

  await Promise.all(
    [...bySender.values()].map(async (queue) => {
      for (const event of queue) {
        try {
          await processInboundEvent(event, ctx);
        } catch (err) {
          logger.error("reply delivery failed", {
            source: event.source,
            signalMessageId: event.signalMessageId,
            error: String(err)
          });
        }
      }
    })
  );
}
