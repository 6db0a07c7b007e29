import path from "node:path";
import fs from "node:fs";
import { loadConfig } from "./config/load.js";
import type { Config } from "./config/schema.js";

export type PreflightOptions = {
  config?: Config;
};

export type PreflightReport = {
  sqlitePath: string;
  databasePresent: boolean;
  providerAuth: Config["provider"]["auth"]["type"];
  providerCredentialsPresent: boolean;
  providerBaseUrl: string;
  model: string;
  webhookEnabled: boolean;
  dashboardEnabled: boolean;
  warnings: string[];
};

export const runPreflightChecks = (options: PreflightOptions = {}): PreflightReport => {
  const config = options.config ?? loadConfig();
  const sqlitePath = path.resolve(config.sqlitePath);
  const databasePresent = fs.existsSync(sqlitePath);
  const { auth } = config.provider;
  const providerCredentialsPresent =
    auth.type === "oauth"
      ? Boolean(auth.clientId.trim() && auth.clientSecret.trim())
      : Boolean(config.provider.apiKey?.trim());

  const warnings: string[] = [];
  if (!databasePresent) {
    warnings.push(`Database does not exist yet and will be created: ${sqlitePath}`);
  }
  if (!providerCredentialsPresent) {
    warnings.push(
      auth.type === "oauth"
        ? "OAuth client credentials are not set."
        : "OPENAI_API_KEY is not set."
    );
  }
  if (config.webhook.enabled && !config.webhook.authToken?.trim()) {
    warnings.push("Webhook is enabled without DIGEST_WEBHOOK_AUTH_TOKEN.");
  }
  if (config.dashboard.enabled && !config.dashboard.authToken?.trim()) {
    warnings.push("Dashboard is enabled without DIGEST_DASHBOARD_AUTH_TOKEN.");
  }
  if (config.summary.maxMessageChars > config.summary.maxPromptChars) {
    warnings.push("summary.maxMessageChars exceeds summary.maxPromptChars.");
  }

  return {
    sqlitePath,
    databasePresent,
    providerAuth: auth.type,
    providerCredentialsPresent,
    providerBaseUrl: config.provider.baseUrl,
    model: config.provider.model,
    webhookEnabled: config.webhook.enabled,
    dashboardEnabled: config.dashboard.enabled,
    warnings
  };
};
