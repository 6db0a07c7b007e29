import path from "node:path";
import { z } from "zod";
import { isValidTimeZone } from "../util/time.js";

const ProviderAuthSchema = z
  .discriminatedUnion("type", [
    z.object({
      type: z.literal("bearer")
    }),
    z.object({
      type: z.literal("oauth"),
      tokenUrl: z.string().url(),
      clientId: z.string().min(1),
      clientSecret: z.string().min(1),
      scope: z.string().min(1).default("GIGACHAT_API_PERS"),
      refreshSkewMs: z.number().int().nonnegative().default(60_000)
    })
  ])
  .default({ type: "bearer" });

export const ConfigSchema = z
  .object({
    dataDir: z.string().default("./data"),
    sqlitePath: z.string().optional(),
    logLevel: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    summary: z
      .object({
        intervalMs: z.number().int().positive().default(60 * 60 * 1000),
        runOnStart: z.boolean().default(false),
        maxPromptChars: z.number().int().positive().default(10_000),
        maxMessageChars: z.number().int().positive().default(300),
        systemPrompt: z.string().optional(),
        deliveryChatId: z.string().min(1).default("digest")
      })
      .default({}),
    provider: z
      .object({
        apiKey: z.string().optional(),
        baseUrl: z.string().url().default("https://api.openai.com/v1"),
        model: z.string().min(1).default("gpt-4o-mini"),
        temperature: z.number().min(0).max(2).default(0.2),
        timeoutMs: z.number().int().positive().default(30_000),
        auth: ProviderAuthSchema
      })
      .default({}),
    webhook: z
      .object({
        enabled: z.boolean().default(true),
        host: z.string().default("127.0.0.1"),
        port: z.number().int().min(0).max(65_535).default(8788),
        path: z.string().default("/webhook"),
        authToken: z.string().optional(),
        maxBodyBytes: z.number().int().positive().default(1_000_000),
        outboxMaxPerChat: z.number().int().positive().default(50),
        outboxMaxChats: z.number().int().positive().default(100),
        outboxChatTtlMs: z.number().int().positive().default(24 * 60 * 60 * 1000)
      })
      .default({}),
    dashboard: z
      .object({
        enabled: z.boolean().default(true),
        host: z.string().default("127.0.0.1"),
        port: z.number().int().min(0).max(65_535).default(8789),
        authToken: z.string().optional(),
        timeZone: z
          .string()
          .refine(isValidTimeZone, { message: "Unknown time zone" })
          .default("UTC"),
        maxMessages: z.number().int().positive().default(500)
      })
      .default({})
  })
  // The database lives under `dataDir` unless `sqlitePath` names it directly.
  .transform(({ sqlitePath, ...config }) => ({
    ...config,
    sqlitePath: sqlitePath ?? path.join(config.dataDir, "chat-digest.db")
  }));

export type Config = z.infer<typeof ConfigSchema>;
export type ProviderAuthConfig = Config["provider"]["auth"];
