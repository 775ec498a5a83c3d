import test from "node:test";
import assert from "node:assert/strict";
import { FakeContentSource } from "@reposcout/testing";
import { ToolRegistry } from "../ToolRegistry.js";
import { createRepositoryTools } from "../repository/RepositoryTools.js";
import { REPOSITORY_TOOL_CATALOG } from "../repository/RepositoryToolCatalog.js";

const context = { repository: { owner: "acme", name: "widgets" }, ref: "main" };

const createRegistry = (source: FakeContentSource, viewed: string[], summaries: string[] = []) => {
  const registry = new ToolRegistry();
  const tools = createRepositoryTools({
    content: source,
    summarizer: {
      summarize: async (content) => {
        summaries.push(content);
        return `summary of ${content.length} chars`;
      },
    },
    viewedFiles: { notify: (filePath) => viewed.push(filePath) },
  });
  for (const tool of tools) {
    registry.register(tool);
  }
  return registry;
};

test("repository tool catalog declares three string-argument tools", { concurrency: false }, () => {
  assert.deepEqual(
    REPOSITORY_TOOL_CATALOG.map((tool) => [tool.name, tool.inputSchema.required]),
    [
      ["view_file", ["path"]],
      ["view_folder", ["path"]],
      ["generate_summary", ["content"]],
    ],
  );
  assert.equal(Object.isFrozen(REPOSITORY_TOOL_CATALOG[0].inputSchema), true);
  assert.equal(REPOSITORY_TOOL_CATALOG[2].inputSchema.properties.content.type, "string");
});

test("view_file reads through the content source and reports the viewed path", { concurrency: false }, async () => {
  const source = new FakeContentSource().withFile("src/app.ts", "export {};\n");
  const viewed: string[] = [];
  const registry = createRegistry(source, viewed);

  const result = await registry.execute("view_file", { path: "src/app.ts" }, context);

  assert.equal(result.ok, true);
  assert.equal(result.output, "export {};\n");
  assert.deepEqual(viewed, ["src/app.ts"]);
  assert.deepEqual(source.requests, [
    { kind: "file", owner: "acme", name: "widgets", path: "src/app.ts", ref: "main" },
  ]);
});

test("view_file failures do not report a viewed path", { concurrency: false }, async () => {
  const viewed: string[] = [];
  const registry = createRegistry(new FakeContentSource(), viewed);

  const result = await registry.execute("view_file", { path: "missing.ts" }, context);

  assert.equal(result.ok, false);
  assert.equal(result.error, "GitHub content not found: acme/widgets/missing.ts");
  assert.deepEqual(viewed, []);
});

test("view_folder and generate_summary delegate to their collaborators", { concurrency: false }, async () => {
  const source = new FakeContentSource().withFolder("src", "src/app.ts (file)\n");
  const summaries: string[] = [];
  const registry = createRegistry(source, [], summaries);

  const folder = await registry.execute("view_folder", { path: "src" }, context);
  const summary = await registry.execute("generate_summary", { content: "abcdef" }, context);

  assert.equal(folder.output, "src/app.ts (file)\n");
  assert.equal(summary.output, "summary of 6 chars");
  assert.deepEqual(summaries, ["abcdef"]);
});
