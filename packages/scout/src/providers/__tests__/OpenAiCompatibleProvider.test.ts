import test from "node:test";
import assert from "node:assert/strict";
import { OpenAiCompatibleProvider } from "../OpenAiCompatibleProvider.js";
import type { ProviderRequest } from "../ProviderTypes.js";

type FetchHandler = (url: string, body: string) => { status?: number; payload: unknown };

const withStubbedFetch = async (handler: FetchHandler, fn: () => Promise<void>): Promise<void> => {
  const original = globalThis.fetch;
  globalThis.fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const body = typeof init?.body === "string" ? init.body : "";
    const { status = 200, payload } = handler(String(input), body);
    return new Response(JSON.stringify(payload), {
      status,
      headers: { "content-type": "application/json" },
    });
  };

  try {
    await fn();
  } finally {
    globalThis.fetch = original;
  }
};

test("OpenAiCompatibleProvider returns message content", { concurrency: false }, async () => {
  let requestedUrl = "";
  await withStubbedFetch(
    (url) => {
      requestedUrl = url;
      return {
        payload: {
          choices: [{ message: { role: "assistant", content: "hello" } }],
          usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 },
        },
      };
    },
    async () => {
      const provider = new OpenAiCompatibleProvider({
        model: "test-model",
        baseUrl: "http://127.0.0.1:9999/v1",
      });
      const request: ProviderRequest = {
        messages: [{ role: "user", content: "hi" }],
      };

      const result = await provider.generate(request);
      assert.equal(result.message.content, "hello");
      assert.equal(result.message.role, "assistant");
      assert.equal(result.usage?.totalTokens, 5);
      assert.equal(requestedUrl, "http://127.0.0.1:9999/v1/chat/completions");
    },
  );
});

test("OpenAiCompatibleProvider keeps tool call arguments as raw text", { concurrency: false }, async () => {
  await withStubbedFetch(
    () => ({
      payload: {
        choices: [
          {
            message: {
              role: "assistant",
              content: null,
              tool_calls: [
                {
                  id: "call_1",
                  type: "function",
                  function: { name: "view_file", arguments: "{\"path\":\"README.md\"}" },
                },
              ],
            },
          },
        ],
      },
    }),
    async () => {
      const provider = new OpenAiCompatibleProvider({ model: "test-model", baseUrl: "http://127.0.0.1:9999/v1/" });

      const result = await provider.generate({ messages: [{ role: "user", content: "read file" }] });
      assert.equal(result.message.content, "");
      assert.deepEqual(result.toolCalls, [
        { id: "call_1", name: "view_file", rawArguments: "{\"path\":\"README.md\"}" },
      ]);
    },
  );
});

test("OpenAiCompatibleProvider sends tools, function messages and auth", { concurrency: false }, async () => {
  let received: Record<string, unknown> | undefined;
  await withStubbedFetch(
    (_, body) => {
      received = JSON.parse(body) as Record<string, unknown>;
      return { payload: { choices: [{ message: { role: "assistant", content: "ok" } }] } };
    },
    async () => {
      const provider = new OpenAiCompatibleProvider({
        model: "test-model",
        apiKey: "test-key",
        baseUrl: "http://127.0.0.1:9999/v1/",
      });

      await provider.generate({
        messages: [
          { role: "user", content: "hi" },
          { role: "function", content: "src (dir)\n", name: "view_folder" },
        ],
        tools: [{ name: "view_folder", description: "list", inputSchema: { type: "object" } }],
        toolChoice: "auto",
        temperature: 0.2,
      });

      assert.equal(received?.model, "test-model");
      assert.equal(received?.temperature, 0.2);
      assert.equal(received?.tool_choice, "auto");
      assert.deepEqual(received?.messages, [
        { role: "user", content: "hi" },
        { role: "function", content: "src (dir)\n", name: "view_folder" },
      ]);
      assert.deepEqual(received?.tools, [
        {
          type: "function",
          function: { name: "view_folder", description: "list", parameters: { type: "object" } },
        },
      ]);
    },
  );
});

test("OpenAiCompatibleProvider surfaces HTTP errors", { concurrency: false }, async () => {
  await withStubbedFetch(
    () => ({ status: 401, payload: { error: "bad key" } }),
    async () => {
      const provider = new OpenAiCompatibleProvider({ model: "test-model", baseUrl: "http://127.0.0.1:9999/v1/" });
      await assert.rejects(
        provider.generate({ messages: [{ role: "user", content: "hi" }] }),
        /OpenAI-compatible error 401/,
      );
    },
  );
});

test("OpenAiCompatibleProvider marks responses without choices as empty", { concurrency: false }, async () => {
  await withStubbedFetch(
    () => ({ payload: { choices: [], usage: { total_tokens: 4 } } }),
    async () => {
      const provider = new OpenAiCompatibleProvider({ model: "test-model", baseUrl: "http://127.0.0.1:9999/v1/" });
      const result = await provider.generate({ messages: [{ role: "user", content: "hi" }] });
      assert.equal(result.empty, true);
      assert.deepEqual(result.message, { role: "assistant", content: "" });
      assert.deepEqual(result.toolCalls, []);
      assert.equal(result.usage?.totalTokens, 4);
    },
  );
});
