import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { Config } from "../config/schema.js";

export const createLogger = (
  config: Pick<Config, "logLevel">,
  destination?: DestinationStream
): Logger => {
  const options = {
    level: config.logLevel,
    base: { service: "chat-digest" }
  };
  return destination ? pino(options, destination) : pino(options);
};

// One-shot commands print their result on stdout, so their logs go to stderr.
export const stderrDestination = (): DestinationStream => pino.destination({ dest: 2, sync: true });

export const createSilentLogger = (): Logger => pino({ level: "silent" });
