import test from "node:test";
import assert from "node:assert/strict";
import { ToolRegistry } from "../ToolRegistry.js";
import type { ToolDefinition } from "../ToolTypes.js";

const context = { repository: { owner: "acme", name: "widgets" } };

const echoTool: ToolDefinition = {
  name: "echo",
  description: "echo args",
  inputSchema: {
    type: "object",
    properties: { text: { type: "string", description: "text to echo" } },
    required: ["text"],
  },
  handler: async (args) => ({ output: args.text }),
};

test("ToolRegistry executes registered tools", { concurrency: false }, async () => {
  const registry = new ToolRegistry();
  registry.register(echoTool);

  const result = await registry.execute("echo", { text: "hello" }, context);
  assert.equal(result.ok, true);
  assert.equal(result.output, "hello");
});

test("ToolRegistry reports unknown tools", { concurrency: false }, async () => {
  const registry = new ToolRegistry();
  const result = await registry.execute("missing", {}, context);
  assert.equal(result.ok, false);
  assert.equal(result.error, "Unknown tool: missing");
});

test("ToolRegistry validates required args", { concurrency: false }, async () => {
  const registry = new ToolRegistry();
  registry.register(echoTool);

  const result = await registry.execute("echo", {}, context);
  assert.equal(result.ok, false);
  assert.equal(result.error, "Missing required arguments: text");
});

test("ToolRegistry converts handler failures into results", { concurrency: false }, async () => {
  const registry = new ToolRegistry();
  registry.register({
    ...echoTool,
    name: "broken",
    handler: async () => {
      throw new Error("boom");
    },
  });

  const result = await registry.execute("broken", { text: "x" }, context);
  assert.deepEqual(result, { ok: false, output: "", error: "boom" });
});

test("ToolRegistry rejects duplicate names and describes tools", { concurrency: false }, () => {
  const registry = new ToolRegistry();
  registry.register(echoTool);
  assert.throws(() => registry.register(echoTool), /Tool already registered: echo/);
  assert.deepEqual(registry.describe(), [
    { name: "echo", description: "echo args", inputSchema: echoTool.inputSchema },
  ]);
});
