import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { ConfigSchema, type Config } from "./schema.js";

type RawSection = Record<string, unknown>;

const isRecord = (value: unknown): value is RawSection =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const section = (source: RawSection, key: string): RawSection => {
  const value = source[key];
  return isRecord(value) ? value : {};
};

const parseNumber = (value?: string) => (value ? Number(value) : undefined);

const parseBoolean = (value?: string) => (value ? value === "true" : undefined);

const stripUndefined = (value: RawSection): RawSection =>
  Object.fromEntries(Object.entries(value).filter(([, item]) => item !== undefined));

const readJsonIfExists = (filePath: string): RawSection => {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  const raw = fs.readFileSync(filePath, "utf-8");
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    throw new Error(`Invalid config: ${filePath} is not valid JSON`);
  }
};

const readProviderAuthEnv = (env: NodeJS.ProcessEnv): RawSection | undefined => {
  const tokenUrl = env.DIGEST_PROVIDER_OAUTH_URL;
  if (!tokenUrl) {
    return undefined;
  }
  return stripUndefined({
    type: "oauth",
    tokenUrl,
    clientId: env.DIGEST_PROVIDER_CLIENT_ID,
    clientSecret: env.DIGEST_PROVIDER_CLIENT_SECRET,
    scope: env.DIGEST_PROVIDER_OAUTH_SCOPE
  });
};

export const loadConfig = (
  options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}
): Config => {
  const root = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  if (!options.env) {
    dotenv.config({ path: path.join(root, ".env") });
  }
  const fileConfig = readJsonIfExists(path.join(root, "config.json"));

  const envConfig = {
    top: stripUndefined({
      dataDir: env.DIGEST_DATA_DIR,
      sqlitePath: env.DIGEST_SQLITE_PATH,
      logLevel: env.DIGEST_LOG_LEVEL
    }),
    summary: stripUndefined({
      intervalMs: parseNumber(env.DIGEST_SUMMARY_INTERVAL_MS),
      runOnStart: parseBoolean(env.DIGEST_SUMMARY_RUN_ON_START),
      maxPromptChars: parseNumber(env.DIGEST_SUMMARY_MAX_PROMPT_CHARS),
      maxMessageChars: parseNumber(env.DIGEST_SUMMARY_MAX_MESSAGE_CHARS),
      deliveryChatId: env.DIGEST_SUMMARY_DELIVERY_CHAT_ID
    }),
    provider: stripUndefined({
      apiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
      model: env.OPENAI_MODEL,
      temperature: parseNumber(env.OPENAI_TEMPERATURE),
      timeoutMs: parseNumber(env.DIGEST_PROVIDER_TIMEOUT_MS ?? env.OPENAI_TIMEOUT_MS),
      auth: readProviderAuthEnv(env)
    }),
    webhook: stripUndefined({
      enabled: parseBoolean(env.DIGEST_WEBHOOK_ENABLED),
      host: env.DIGEST_WEBHOOK_HOST,
      port: parseNumber(env.DIGEST_WEBHOOK_PORT),
      path: env.DIGEST_WEBHOOK_PATH,
      authToken: env.DIGEST_WEBHOOK_AUTH_TOKEN,
      maxBodyBytes: parseNumber(env.DIGEST_WEBHOOK_MAX_BODY_BYTES)
    }),
    dashboard: stripUndefined({
      enabled: parseBoolean(env.DIGEST_DASHBOARD_ENABLED),
      host: env.DIGEST_DASHBOARD_HOST,
      port: parseNumber(env.DIGEST_DASHBOARD_PORT),
      authToken: env.DIGEST_DASHBOARD_AUTH_TOKEN,
      timeZone: env.DIGEST_DASHBOARD_TIME_ZONE
    })
  };

  const parsed = ConfigSchema.safeParse({
    ...fileConfig,
    ...envConfig.top,
    summary: { ...section(fileConfig, "summary"), ...envConfig.summary },
    provider: {
      ...section(fileConfig, "provider"),
      ...envConfig.provider
    },
    webhook: { ...section(fileConfig, "webhook"), ...envConfig.webhook },
    dashboard: { ...section(fileConfig, "dashboard"), ...envConfig.dashboard }
  });

  if (!parsed.success) {
    throw new Error(`Invalid config: ${parsed.error.message}`);
  }

  return parsed.data;
};
