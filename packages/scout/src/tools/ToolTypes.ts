import type { RepositoryRef } from "@reposcout/shared";

/** Decoded tool arguments: a flat mapping of string keys to string values. */
export type ToolArguments = Record<string, string>;

export interface ToolContext {
  repository: RepositoryRef;
  ref?: string;
  signal?: AbortSignal;
}

export interface ToolHandlerResult {
  output: string;
  data?: unknown;
}

export interface ToolExecutionResult extends ToolHandlerResult {
  ok: boolean;
  error?: string;
}

export type ToolHandler = (args: ToolArguments, context: ToolContext) => Promise<ToolHandlerResult>;

export interface ToolParameterSchema {
  type: "string";
  description: string;
}

export interface ToolInputSchema {
  type: "object";
  properties: Record<string, ToolParameterSchema>;
  required: string[];
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface ToolDefinition extends ToolDescriptor {
  handler: ToolHandler;
}
