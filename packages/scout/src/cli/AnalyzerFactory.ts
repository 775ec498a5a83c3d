import { randomUUID } from "node:crypto";
import { GitHubContentClient } from "@reposcout/integrations";
import type { ScoutConfig } from "../config/Config.js";
import { createDefaultProviderRegistry } from "../providers/ProviderRegistry.js";
import { RepoAnalyzer } from "../runtime/RepoAnalyzer.js";
import { RunLogger } from "../runtime/RunLogger.js";

/** The part of {@link RepoAnalyzer} the commands depend on; tests hand in stubs. */
export type Analyzer = Pick<RepoAnalyzer, "analyze">;

export const createAnalyzer = (config: ScoutConfig): Analyzer => {
  const provider = createDefaultProviderRegistry().create(config.provider, {
    model: config.model,
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    timeoutMs: config.limits.chatTimeoutMs,
  });
  const content = new GitHubContentClient({
    token: config.hosting.token,
    baseUrl: config.hosting.baseUrl,
    timeoutMs: config.hosting.timeoutMs,
  });
  return new RepoAnalyzer({
    provider,
    content,
    maxTurns: config.limits.maxTurns,
    maxTokens: config.limits.maxTokens,
    temperature: config.limits.temperature,
    allowedHosts: config.repository.allowedHosts,
    ref: config.hosting.ref,
  });
};

export const createRunLogger = (config: ScoutConfig, runId: string = randomUUID()): RunLogger =>
  new RunLogger(config.workspaceRoot, config.logging.directory, runId);
