export type ProviderRole = "system" | "user" | "assistant" | "function" | "tool";

export interface ProviderToolDefinition {
  name: string;
  description?: string;
  inputSchema?: Record<string, unknown>;
}

/** Tool call as emitted by the model; arguments stay raw JSON text until dispatch. */
export interface ProviderToolCall {
  id: string;
  name: string;
  rawArguments: string;
}

export interface ProviderMessage {
  role: ProviderRole;
  content: string;
  name?: string;
  toolCallId?: string;
  toolCalls?: ProviderToolCall[];
}

export interface ProviderUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

export interface ProviderRequest {
  messages: ProviderMessage[];
  tools?: ProviderToolDefinition[];
  toolChoice?: "auto" | "none" | { name: string };
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface ProviderResponse {
  message: ProviderMessage;
  /** Set when the endpoint answered without any choice; `message` is then an empty assistant turn. */
  empty?: boolean;
  toolCalls?: ProviderToolCall[];
  usage?: ProviderUsage;
  raw?: unknown;
}

export interface ProviderConfig {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface Provider {
  name: string;
  generate(request: ProviderRequest): Promise<ProviderResponse>;
}
