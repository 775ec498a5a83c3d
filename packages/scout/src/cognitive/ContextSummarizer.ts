import { describeError } from "@reposcout/shared";
import type { Provider, ProviderMessage } from "../providers/ProviderTypes.js";
import { recordRunEvent, type RunLogger } from "../runtime/RunLogger.js";
import {
  REPOSITORY_CONTEXT_PROMPT,
  SUMMARIZER_PROMPT,
  buildContextSummaryRequest,
  buildSummaryRequest,
} from "./Prompts.js";

export const SUMMARY_FAILED_MESSAGE = "Error occurred while summarizing the context";
export const NO_SUMMARY_MESSAGE = "No summary generated";

export interface ContextSummarizerOptions {
  temperature?: number;
  maxTokens?: number;
  logger?: RunLogger;
}

export class ContextSummarizer {
  private temperature?: number;
  private maxTokens?: number;
  private logger?: RunLogger;

  constructor(private provider: Provider, options: ContextSummarizerOptions = {}) {
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.logger = options.logger;
  }

  private async complete(
    label: string,
    messages: ProviderMessage[],
    signal?: AbortSignal,
  ): Promise<string | undefined> {
    await recordRunEvent(this.logger, "provider_request", {
      provider: this.provider.name,
      purpose: label,
      messages: messages.length,
    });
    const response = await this.provider.generate({
      messages,
      temperature: this.temperature,
      maxTokens: this.maxTokens,
      signal,
    });
    if (response.usage) {
      await recordRunEvent(this.logger, `${label}_usage`, { usage: response.usage });
    }
    return response.empty ? undefined : response.message.content;
  }

  /** Tool-free summary of arbitrary content; failures and choice-less answers reject. */
  async summarize(content: string, signal?: AbortSignal): Promise<string> {
    const summary = await this.complete(
      "summarize",
      [
        { role: "system", content: SUMMARIZER_PROMPT },
        { role: "user", content: buildSummaryRequest(content) },
      ],
      signal,
    );
    if (summary === undefined) {
      throw new Error(NO_SUMMARY_MESSAGE);
    }
    return summary;
  }

  /** Compresses the accumulated context into an answer; never rejects. */
  async finalize(context: string, prompt: string, signal?: AbortSignal): Promise<string> {
    try {
      const summary = await this.complete(
        "finalize",
        [
          { role: "system", content: REPOSITORY_CONTEXT_PROMPT },
          { role: "user", content: buildContextSummaryRequest(context, prompt) },
        ],
        signal,
      );
      return summary || NO_SUMMARY_MESSAGE;
    } catch (error) {
      await recordRunEvent(this.logger, "finalize_failed", { error: describeError(error) });
      return SUMMARY_FAILED_MESSAGE;
    }
  }
}
