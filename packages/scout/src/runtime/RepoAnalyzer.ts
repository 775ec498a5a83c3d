import type { EventChannel, RepositoryContentSource } from "@reposcout/integrations";
import {
  AnalysisError,
  INVALID_REPOSITORY_MESSAGE,
  describeError,
  isRepositoryRefValid,
  parseRepositoryRef,
} from "@reposcout/shared";
import { ContextSummarizer } from "../cognitive/ContextSummarizer.js";
import type { Provider } from "../providers/ProviderTypes.js";
import { ToolDispatcher } from "../tools/ToolDispatcher.js";
import type { ToolCallOutcome } from "../tools/ToolDispatcher.js";
import { ToolRegistry } from "../tools/ToolRegistry.js";
import { createRepositoryTools } from "../tools/repository/RepositoryTools.js";
import { ConversationDriver, type DriverOutcome } from "./ConversationDriver.js";
import { EventNotifier } from "./EventNotifier.js";
import { recordRunEvent, type RunLogger } from "./RunLogger.js";

export type AnalysisOutcome = DriverOutcome | "failed";

/** How long a finished analysis waits for pending viewed-file events. */
export const DEFAULT_NOTIFY_TIMEOUT_MS = 5_000;

export interface AnalysisReport {
  outcome: AnalysisOutcome;
  text: string;
  reason?: string;
  turns: number;
  toolOutcomes: ToolCallOutcome[];
}

export interface RepoAnalyzerOptions {
  provider: Provider;
  content: RepositoryContentSource;
  maxTurns?: number;
  maxTokens?: number;
  temperature?: number;
  allowedHosts?: string[];
  /** Branch, tag or commit used when a call does not name one. */
  ref?: string;
  notifyTimeoutMs?: number;
}

export interface AnalyzeOptions {
  channel?: EventChannel;
  ref?: string;
  signal?: AbortSignal;
  logger?: RunLogger;
}

const failure = (text: string, reason: string): AnalysisReport => ({
  outcome: "failed",
  text,
  reason,
  turns: 0,
  toolOutcomes: [],
});

const describeFailure = (error: unknown): { text: string; reason: string } => {
  if (error instanceof AnalysisError && error.code === "credential_missing") {
    return { text: `Error: ${error.message}`, reason: error.code };
  }
  return {
    text: `Error analyzing repository: ${describeError(error)}`,
    reason: error instanceof AnalysisError ? error.code : "fatal_collaborator",
  };
};

/** Outward entry point: resolves every path, including failures, to report text. */
export class RepoAnalyzer {
  constructor(private options: RepoAnalyzerOptions) {}

  async analyze(identifier: string, prompt: string, options: AnalyzeOptions = {}): Promise<AnalysisReport> {
    const { logger, signal } = options;
    const repository = parseRepositoryRef(identifier, { allowedHosts: this.options.allowedHosts });
    if (!isRepositoryRefValid(repository)) {
      await recordRunEvent(logger, "analysis_failed", { identifier, reason: "invalid_input" });
      return failure(INVALID_REPOSITORY_MESSAGE, "invalid_input");
    }

    const ref = options.ref ?? this.options.ref;
    await recordRunEvent(logger, "analysis_started", { owner: repository.owner, name: repository.name, ref, prompt });

    const summarizer = new ContextSummarizer(this.options.provider, {
      temperature: this.options.temperature,
      maxTokens: this.options.maxTokens,
      logger,
    });
    const notifier = new EventNotifier({ channel: options.channel, logger });
    const registry = new ToolRegistry();
    for (const tool of createRepositoryTools({ content: this.options.content, summarizer, viewedFiles: notifier })) {
      registry.register(tool);
    }
    const driver = new ConversationDriver({
      provider: this.options.provider,
      content: this.options.content,
      dispatcher: new ToolDispatcher(registry),
      catalog: registry.describe(),
      maxTurns: this.options.maxTurns,
      maxTokens: this.options.maxTokens,
      temperature: this.options.temperature,
      logger,
    });

    const notifyTimeoutMs = this.options.notifyTimeoutMs ?? DEFAULT_NOTIFY_TIMEOUT_MS;
    try {
      const result = await driver.run({ repository, prompt, ref, signal });
      const text = await summarizer.finalize(result.context, prompt, signal);
      await notifier.idle(notifyTimeoutMs);
      await recordRunEvent(logger, "analysis_finished", {
        outcome: result.outcome,
        turns: result.turns,
        toolCalls: result.toolOutcomes.length,
        failedToolCalls: result.toolOutcomes.filter((outcome) => !outcome.ok).length,
      });
      return { outcome: result.outcome, text, turns: result.turns, toolOutcomes: result.toolOutcomes };
    } catch (error) {
      await notifier.idle(notifyTimeoutMs);
      const { text, reason } = describeFailure(error);
      await recordRunEvent(logger, "analysis_failed", { reason, error: describeError(error) });
      return failure(text, reason);
    }
  }

  /** Text-only form of {@link analyze}. */
  async getRepoContext(identifier: string, prompt: string, channel?: EventChannel): Promise<string> {
    const report = await this.analyze(identifier, prompt, { channel });
    return report.text;
  }
}
