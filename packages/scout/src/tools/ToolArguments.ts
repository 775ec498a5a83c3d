import type { ToolArguments } from "./ToolTypes.js";

export class ToolArgumentsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolArgumentsError";
  }
}

export const decodeToolArguments = (raw: string): ToolArguments => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ToolArgumentsError(`error decoding tool call arguments: ${reason}`);
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ToolArgumentsError("error decoding tool call arguments: expected a JSON object");
  }
  const decoded: ToolArguments = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== "string") {
      throw new ToolArgumentsError(`error decoding tool call arguments: "${key}" must be a string`);
    }
    decoded[key] = value;
  }
  return decoded;
};
