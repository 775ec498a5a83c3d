import type {
  ToolArguments,
  ToolContext,
  ToolDefinition,
  ToolDescriptor,
  ToolExecutionResult,
} from "./ToolTypes.js";

const validateArgs = (args: ToolArguments, tool: ToolDescriptor): string | undefined => {
  const missing = tool.inputSchema.required.filter((key) => !(key in args));
  if (missing.length) {
    return `Missing required arguments: ${missing.join(", ")}`;
  }
  return undefined;
};

export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  list(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  describe(): ToolDescriptor[] {
    return this.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }));
  }

  async execute(name: string, args: ToolArguments, context: ToolContext): Promise<ToolExecutionResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { ok: false, output: "", error: `Unknown tool: ${name}` };
    }

    const validationError = validateArgs(args, tool);
    if (validationError) {
      return { ok: false, output: "", error: validationError };
    }

    try {
      const result = await tool.handler(args, context);
      return { ok: true, output: result.output, data: result.data };
    } catch (error) {
      return {
        ok: false,
        output: "",
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
