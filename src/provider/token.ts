import { z } from "zod";
import { ApiError, errorMessage } from "../errors.js";
import type { Config, ProviderAuthConfig } from "../config/schema.js";
import { newId } from "../util/ids.js";

export interface AccessTokenSource {
  getToken(signal?: AbortSignal): Promise<string>;
  /** Drops a cached token the provider has rejected; the next call fetches a new one. */
  invalidate?(): void;
}

const TokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    expires_at: z.number().optional(),
    expires_in: z.number().optional()
  })
  .passthrough();

const DEFAULT_TOKEN_TTL_MS = 30 * 60 * 1000;

export class StaticTokenSource implements AccessTokenSource {
  constructor(private apiKey: string | undefined) {}

  async getToken(): Promise<string> {
    const key = this.apiKey?.trim();
    if (!key) {
      throw new ApiError(null, "OPENAI_API_KEY is missing.");
    }
    return key;
  }
}

type OAuthSettings = Extract<ProviderAuthConfig, { type: "oauth" }>;

/**
 * Client-credentials exchange with a cached access token. The token is reused until
 * `refreshSkewMs` before it expires; `expires_at` (epoch ms) and `expires_in`
 * (seconds) are both understood.
 */
export class OAuthTokenSource implements AccessTokenSource {
  private cached: { token: string; expiresAtMs: number } | null = null;

  constructor(
    private settings: OAuthSettings,
    private timeoutMs: number,
    private fetchImpl: typeof fetch = fetch,
    private now: () => number = Date.now
  ) {}

  async getToken(signal?: AbortSignal): Promise<string> {
    if (this.cached && this.now() < this.cached.expiresAtMs - this.settings.refreshSkewMs) {
      return this.cached.token;
    }
    this.cached = await this.requestToken(signal);
    return this.cached.token;
  }

  invalidate() {
    this.cached = null;
  }

  private authorizationHeader() {
    const secret = this.settings.clientSecret.trim();
    if (secret.startsWith("Basic ")) {
      return secret;
    }
    const encoded = Buffer.from(`${this.settings.clientId}:${secret}`).toString("base64");
    return `Basic ${encoded}`;
  }

  private async requestToken(signal?: AbortSignal) {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    let response: Response;
    try {
      response = await this.fetchImpl(this.settings.tokenUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
          RqUID: newId(),
          Authorization: this.authorizationHeader()
        },
        body: new URLSearchParams({ scope: this.settings.scope }).toString(),
        signal: controller.signal
      });
    } catch (error) {
      throw new ApiError(null, `Token request failed: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }

    if (!response.ok) {
      throw new ApiError(response.status, `Token request rejected: ${await response.text()}`);
    }

    const parsed = TokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ApiError(response.status, `Invalid token response: ${parsed.error.message}`);
    }

    const issuedAt = this.now();
    const expiresAtMs =
      parsed.data.expires_at ??
      (parsed.data.expires_in !== undefined
        ? issuedAt + parsed.data.expires_in * 1000
        : issuedAt + DEFAULT_TOKEN_TTL_MS);
    return { token: parsed.data.access_token, expiresAtMs };
  }
}

export const createTokenSource = (
  config: Config,
  fetchImpl: typeof fetch = fetch
): AccessTokenSource =>
  config.provider.auth.type === "oauth"
    ? new OAuthTokenSource(config.provider.auth, config.provider.timeoutMs, fetchImpl)
    : new StaticTokenSource(config.provider.apiKey);
