import type { Logger } from "pino";
import { errorMessage } from "../errors.js";
import type { OutboundMessage } from "../types.js";
import { AsyncQueue } from "./queue.js";

export type OutboundHandler = (message: OutboundMessage) => Promise<void>;

/** Delivers finished summaries to the channels without blocking the pipeline. */
export class MessageBus {
  private outboundQueue = new AsyncQueue<OutboundMessage>();
  private outboundHandlers: OutboundHandler[] = [];
  private running = false;
  private loop: Promise<void> | null = null;

  constructor(private logger: Logger) {}

  publishOutbound(message: OutboundMessage) {
    this.outboundQueue.push(message);
  }

  onOutbound(handler: OutboundHandler) {
    this.outboundHandlers.push(handler);
  }

  pending() {
    return { outbound: this.outboundQueue.size };
  }

  start() {
    if (this.running) {
      return;
    }
    this.running = true;
    this.loop = this.runLoop();
  }

  // Messages already queued are still delivered before the loop exits.
  async stop() {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.outboundQueue.close();
    await this.loop;
    this.loop = null;
  }

  private async runLoop() {
    for (;;) {
      const message = await this.outboundQueue.next();
      if (message === undefined) {
        return;
      }
      for (const handler of this.outboundHandlers) {
        try {
          await handler(message);
        } catch (error) {
          this.logger.error(
            { messageId: message.id, chatId: message.chatId, error: errorMessage(error) },
            "outbound handler error"
          );
        }
      }
    }
  }
}
