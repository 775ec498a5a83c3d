import { createTimeoutSignal } from "@reposcout/shared";
import type {
  Provider,
  ProviderConfig,
  ProviderMessage,
  ProviderRequest,
  ProviderResponse,
  ProviderRole,
  ProviderToolCall,
} from "./ProviderTypes.js";

interface OpenAiToolCall {
  id: string;
  type: "function";
  function: {
    name: string;
    arguments: string;
  };
}

interface OpenAiResponse {
  choices: Array<{
    message: {
      role: string;
      content?: string | null;
      tool_calls?: OpenAiToolCall[];
    };
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_GROQ_BASE_URL = "https://api.groq.com/openai/v1";

const ROLES: ProviderRole[] = ["system", "user", "assistant", "function", "tool"];

const normalizeBaseUrl = (baseUrl?: string): string => {
  const root = baseUrl ?? DEFAULT_OPENAI_BASE_URL;
  return root.endsWith("/") ? root : `${root}/`;
};

const toRole = (role: string): ProviderRole => {
  const match = ROLES.find((candidate) => candidate === role);
  return match ?? "assistant";
};

const toWireMessage = (message: ProviderMessage): Record<string, unknown> => ({
  role: message.role,
  content: message.content,
  name: message.name,
  tool_call_id: message.role === "tool" ? message.toolCallId : undefined,
  tool_calls: message.toolCalls?.length
    ? message.toolCalls.map((call) => ({
        id: call.id,
        type: "function",
        function: { name: call.name, arguments: call.rawArguments },
      }))
    : undefined,
});

export class OpenAiCompatibleProvider implements Provider {
  name = "openai-compatible";

  constructor(private config: ProviderConfig) {}

  async generate(request: ProviderRequest): Promise<ProviderResponse> {
    const baseUrl = normalizeBaseUrl(this.config.baseUrl);
    const url = new URL("chat/completions", baseUrl).toString();

    const headers: Record<string, string> = {
      "content-type": "application/json",
    };
    if (this.config.apiKey) {
      headers.authorization = `Bearer ${this.config.apiKey}`;
    }

    const body = {
      model: this.config.model,
      messages: request.messages.map(toWireMessage),
      tools: request.tools?.map((tool) => ({
        type: "function",
        function: {
          name: tool.name,
          description: tool.description,
          parameters: tool.inputSchema ?? {},
        },
      })),
      tool_choice: request.tools?.length ? request.toolChoice : undefined,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
    };

    const { signal, dispose } = createTimeoutSignal(this.config.timeoutMs ?? 60_000, request.signal);

    try {
      const response = await fetch(url, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal,
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new Error(`OpenAI-compatible error ${response.status}: ${errorBody}`);
      }

      const raw = (await response.json()) as OpenAiResponse;
      const usage = raw.usage
        ? {
            inputTokens: raw.usage.prompt_tokens,
            outputTokens: raw.usage.completion_tokens,
            totalTokens: raw.usage.total_tokens,
          }
        : undefined;
      const choice = raw.choices?.[0]?.message;
      if (!choice) {
        return { message: { role: "assistant", content: "" }, toolCalls: [], empty: true, usage, raw };
      }

      const toolCalls: ProviderToolCall[] | undefined = choice.tool_calls?.map((call) => ({
        id: call.id,
        name: call.function.name,
        rawArguments: call.function.arguments ?? "",
      }));

      return {
        message: {
          role: toRole(choice.role),
          content: choice.content ?? "",
          toolCalls,
        },
        toolCalls,
        usage,
        raw,
      };
    } finally {
      dispose();
    }
  }
}
