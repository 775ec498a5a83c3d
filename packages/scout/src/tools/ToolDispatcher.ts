import type { ProviderToolCall } from "../providers/ProviderTypes.js";
import { decodeToolArguments } from "./ToolArguments.js";
import type { ToolRegistry } from "./ToolRegistry.js";
import type { ToolContext } from "./ToolTypes.js";

/** Result of one requested tool call, successful or not. */
export interface ToolCallOutcome {
  callId: string;
  name: string;
  ok: boolean;
  output: string;
  error?: string;
  args?: Record<string, string>;
}

export class ToolDispatcher {
  constructor(private registry: ToolRegistry) {}

  async dispatch(call: ProviderToolCall, context: ToolContext): Promise<ToolCallOutcome> {
    let args: Record<string, string>;
    try {
      args = decodeToolArguments(call.rawArguments);
    } catch (error) {
      return {
        callId: call.id,
        name: call.name,
        ok: false,
        output: "",
        error: error instanceof Error ? error.message : String(error),
      };
    }

    const result = await this.registry.execute(call.name, args, context);
    return {
      callId: call.id,
      name: call.name,
      ok: result.ok,
      output: result.output,
      error: result.error,
      args,
    };
  }
}
