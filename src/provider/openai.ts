import { z } from "zod";
import { ApiError, errorMessage } from "../errors.js";
import type { Config } from "../config/schema.js";
import type { ChatMessage } from "../types.js";
import type { AccessTokenSource } from "./token.js";

const OpenAIMessageSchema = z.object({
  content: z
    .union([
      z.string(),
      z.array(
        z.object({
          type: z.string().optional(),
          text: z.string().optional()
        })
      )
    ])
    .nullable()
    .optional()
});

const OpenAIResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: OpenAIMessageSchema
      })
    )
    .min(1)
});

const withTimeout = async <T>(
  promise: Promise<T>,
  timeoutMs: number,
  message: string
): Promise<T> => {
  let timer: NodeJS.Timeout | null = null;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ApiError(null, message));
    }, timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
};

const toMessageContent = (value: z.infer<typeof OpenAIMessageSchema>["content"]) => {
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) {
    const text = value
      .flatMap((part) => (typeof part.text === "string" ? [part.text] : []))
      .join("\n")
      .trim();
    return text || undefined;
  }
  return undefined;
};

export type ChatRequest = {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  signal?: AbortSignal;
};

export interface LlmProvider {
  chat(req: ChatRequest): Promise<{ content?: string }>;
}

export class OpenAICompatibleProvider implements LlmProvider {
  constructor(
    private config: Pick<Config, "provider">,
    private tokens: AccessTokenSource,
    private fetchImpl: typeof fetch = fetch
  ) {}

  async chat(req: ChatRequest): Promise<{ content?: string }> {
    const { timeoutMs, baseUrl } = this.config.provider;
    const token = await this.tokens.getToken(req.signal);
    if (req.signal?.aborted) {
      throw new ApiError(null, "Provider request was cancelled");
    }

    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    req.signal?.addEventListener("abort", onAbort, { once: true });

    let response: Response;
    try {
      response = await this.fetchImpl(`${baseUrl.replace(/\/$/, "")}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${token}`
        },
        body: JSON.stringify({
          model: req.model,
          messages: req.messages,
          temperature: req.temperature ?? this.config.provider.temperature
        }),
        signal: controller.signal
      });
    } catch (error) {
      if (req.signal?.aborted) {
        throw new ApiError(null, "Provider request was cancelled");
      }
      if (error instanceof Error && error.name === "AbortError") {
        throw new ApiError(null, `Provider request timed out after ${timeoutMs}ms`);
      }
      throw new ApiError(null, `Provider request failed: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timer);
      req.signal?.removeEventListener("abort", onAbort);
    }

    if (!response.ok) {
      if (response.status === 401) {
        this.tokens.invalidate?.();
      }
      const text = await withTimeout(
        response.text(),
        timeoutMs,
        `Provider response read timed out after ${timeoutMs}ms`
      );
      throw new ApiError(response.status, text);
    }

    let rawData: unknown;
    try {
      rawData = await withTimeout(
        response.json(),
        timeoutMs,
        `Provider response parse timed out after ${timeoutMs}ms`
      );
    } catch (error) {
      if (error instanceof ApiError) {
        throw error;
      }
      throw new ApiError(response.status, `Invalid provider response: ${errorMessage(error)}`);
    }
    const parsed = OpenAIResponseSchema.safeParse(rawData);
    if (!parsed.success) {
      throw new ApiError(response.status, `Invalid provider response: ${parsed.error.message}`);
    }
    const message = parsed.data.choices[0]?.message;
    return {
      content: message ? toMessageContent(message.content) : undefined
    };
  }
}
