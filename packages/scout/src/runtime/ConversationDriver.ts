import type { RepositoryContentSource } from "@reposcout/integrations";
import {
  AnalysisError,
  describeError,
  formatRepositoryUrl,
  isCredentialMissing,
  type RepositoryRef,
} from "@reposcout/shared";
import { ANALYZER_PROMPT, buildAnalysisRequest } from "../cognitive/Prompts.js";
import type {
  Provider,
  ProviderMessage,
  ProviderResponse,
  ProviderToolCall,
  ProviderToolDefinition,
} from "../providers/ProviderTypes.js";
import type { ToolCallOutcome, ToolDispatcher } from "../tools/ToolDispatcher.js";
import { REPOSITORY_TOOL_CATALOG } from "../tools/repository/RepositoryToolCatalog.js";
import type { ToolContext, ToolDescriptor } from "../tools/ToolTypes.js";
import { ConversationState, MAX_CONVERSATION_TURNS } from "./ConversationState.js";
import { recordRunEvent, type RunLogger } from "./RunLogger.js";

export type DriverOutcome = "completed" | "iteration_limit_reached";

export interface ConversationDriverOptions {
  provider: Provider;
  content: RepositoryContentSource;
  dispatcher: ToolDispatcher;
  catalog?: readonly ToolDescriptor[];
  maxTurns?: number;
  maxTokens?: number;
  temperature?: number;
  logger?: RunLogger;
}

export interface DriverInput {
  repository: RepositoryRef;
  prompt: string;
  ref?: string;
  signal?: AbortSignal;
}

export interface DriverResult {
  outcome: DriverOutcome;
  context: string;
  turns: number;
  toolOutcomes: ToolCallOutcome[];
  messages: ProviderMessage[];
}

const toProviderTools = (catalog: readonly ToolDescriptor[]): ProviderToolDefinition[] =>
  catalog.map((tool) => ({
    name: tool.name,
    description: tool.description,
    inputSchema: { ...tool.inputSchema },
  }));

const buildFunctionMessage = (call: ProviderToolCall, outcome: ToolCallOutcome): ProviderMessage => ({
  role: "function",
  name: call.name,
  toolCallId: call.id,
  content: outcome.ok ? outcome.output : `ERROR: ${outcome.error ?? "tool failed"}`,
});

const cancelledError = (): AnalysisError =>
  new AnalysisError({ code: "cancelled", message: "Analysis cancelled" });

/**
 * Bounded analyze loop: seed with the root listing, then alternate chat turns and
 * sequential tool dispatch until the model stops calling tools or the turn ceiling hits.
 */
export class ConversationDriver {
  private provider: Provider;
  private content: RepositoryContentSource;
  private dispatcher: ToolDispatcher;
  private tools: ProviderToolDefinition[];
  private maxTurns: number;
  private maxTokens?: number;
  private temperature?: number;
  private logger?: RunLogger;

  constructor(options: ConversationDriverOptions) {
    this.provider = options.provider;
    this.content = options.content;
    this.dispatcher = options.dispatcher;
    this.tools = toProviderTools(options.catalog ?? REPOSITORY_TOOL_CATALOG);
    this.maxTurns = options.maxTurns ?? MAX_CONVERSATION_TURNS;
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature;
    this.logger = options.logger;
  }

  async run(input: DriverInput): Promise<DriverResult> {
    const { repository, prompt, ref, signal } = input;
    const state = new ConversationState(this.maxTurns);
    const toolOutcomes: ToolCallOutcome[] = [];
    const toolContext: ToolContext = { repository, ref, signal };

    const finish = (outcome: DriverOutcome): DriverResult => ({
      outcome,
      context: state.contextBuffer,
      turns: state.iterationCount,
      toolOutcomes,
      messages: state.snapshot(),
    });

    const rootListing = await this.fetchRootListing(repository, ref, signal);
    state.appendMessage({ role: "system", content: ANALYZER_PROMPT });
    state.appendMessage({ role: "user", content: buildAnalysisRequest(prompt, rootListing) });
    state.appendContext(`Repository: ${formatRepositoryUrl(repository)}\n\n`);
    state.appendContext(rootListing);

    while (state.hasTurnsLeft()) {
      if (signal?.aborted) throw cancelledError();
      const turn = state.beginTurn();
      const response = await this.chat(state, turn, signal);

      const toolCalls = response.toolCalls ?? [];
      if (toolCalls.length === 0) {
        return finish("completed");
      }

      const replies: ProviderMessage[] = [];
      for (const call of toolCalls) {
        if (signal?.aborted) throw cancelledError();
        const outcome = await this.dispatcher.dispatch(call, toolContext);
        toolOutcomes.push(outcome);
        replies.push(buildFunctionMessage(call, outcome));
        if (outcome.ok) {
          state.appendContext(`${call.name}:\n${outcome.output}\n\n`);
          await recordRunEvent(this.logger, "tool_call", { turn, id: call.id, name: call.name, args: outcome.args });
        } else {
          await recordRunEvent(this.logger, "tool_call_failed", {
            turn,
            id: call.id,
            name: call.name,
            error: outcome.error,
          });
        }
      }

      for (const reply of replies) {
        state.appendMessage(reply);
      }
      state.appendMessage({ role: response.message.role, content: response.message.content });
    }

    return finish("iteration_limit_reached");
  }

  private async fetchRootListing(
    repository: RepositoryRef,
    ref: string | undefined,
    signal: AbortSignal | undefined,
  ): Promise<string> {
    if (signal?.aborted) throw cancelledError();
    try {
      return await this.content.getFolder(repository.owner, repository.name, "", { ref, signal });
    } catch (error) {
      if (isCredentialMissing(error)) {
        throw new AnalysisError({ code: "credential_missing", message: describeError(error), cause: error });
      }
      if (signal?.aborted) throw cancelledError();
      throw new AnalysisError({
        code: "fatal_collaborator",
        message: `error viewing root folder: ${describeError(error)}`,
        cause: error,
      });
    }
  }

  private async chat(state: ConversationState, turn: number, signal?: AbortSignal): Promise<ProviderResponse> {
    await recordRunEvent(this.logger, "provider_request", {
      provider: this.provider.name,
      turn,
      messages: state.messages.length,
    });
    let response: ProviderResponse;
    try {
      response = await this.provider.generate({
        messages: state.snapshot(),
        tools: this.tools,
        toolChoice: "auto",
        maxTokens: this.maxTokens,
        temperature: this.temperature,
        signal,
      });
    } catch (error) {
      if (signal?.aborted) throw cancelledError();
      throw new AnalysisError({
        code: "fatal_collaborator",
        message: `error in chat completion: ${describeError(error)}`,
        cause: error,
      });
    }
    await recordRunEvent(this.logger, "provider_response", {
      turn,
      role: response.message.role,
      toolCalls: (response.toolCalls ?? []).map((call) => call.name),
      usage: response.usage,
    });
    return response;
  }
}
