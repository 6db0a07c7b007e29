import type { Logger } from "pino";

export interface Channel {
  readonly name: string;
  start: (logger: Logger) => Promise<void>;
  stop: () => Promise<void>;
  send: (payload: { chatId: string; content: string }) => Promise<void>;
}
