import { ApiError, errorMessage } from "../errors.js";
import type { LlmProvider } from "../provider/openai.js";
import { buildSummaryMessages } from "./prompt.js";

export type SummarizeOptions = {
  signal?: AbortSignal;
};

export interface Summarizer {
  summarize(prompt: string, options?: SummarizeOptions): Promise<string>;
}

export type ProviderSummarizerOptions = {
  model: string;
  temperature?: number;
  systemPrompt?: string;
};

// One attempt per call. Retrying is the pipeline's job: a failed batch stays unprocessed
// and is selected again on the next run.
export class ProviderSummarizer implements Summarizer {
  constructor(
    private provider: LlmProvider,
    private options: ProviderSummarizerOptions
  ) {}

  async summarize(prompt: string, options: SummarizeOptions = {}): Promise<string> {
    if (!prompt.trim()) {
      throw new ApiError(null, "Refusing to summarize an empty prompt");
    }

    let content: string | undefined;
    try {
      const response = await this.provider.chat({
        model: this.options.model,
        messages: buildSummaryMessages(prompt, this.options.systemPrompt),
        temperature: this.options.temperature,
        signal: options.signal
      });
      content = response.content;
    } catch (error) {
      if (error instanceof ApiError) {
        throw error;
      }
      throw new ApiError(null, errorMessage(error));
    }

    const summary = content?.trim();
    if (!summary) {
      throw new ApiError(null, "Summarizer returned no content");
    }
    return summary;
  }
}
