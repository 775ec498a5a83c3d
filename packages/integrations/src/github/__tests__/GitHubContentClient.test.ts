import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { HostingError } from "@reposcout/shared";
import { GitHubContentClient } from "../GitHubContentClient.js";

interface RecordedRequest {
  url: string;
  authorization?: string;
}

const createFetchStub = (
  handler: (url: string) => { status: number; body: unknown },
): { fetch: typeof fetch; requests: RecordedRequest[] } => {
  const requests: RecordedRequest[] = [];
  const stub = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    const headers = new Headers(init?.headers);
    requests.push({ url, authorization: headers.get("authorization") ?? undefined });
    const { status, body } = handler(url);
    return new Response(JSON.stringify(body), {
      status,
      headers: { "content-type": "application/json; charset=utf-8" },
    });
  };
  return { fetch: stub, requests };
};

describe("GitHubContentClient", () => {
  it("decodes base64 file content", async () => {
    const { fetch, requests } = createFetchStub(() => ({
      status: 200,
      body: {
        type: "file",
        path: "README.md",
        encoding: "base64",
        content: `${Buffer.from("# Widgets\n").toString("base64")}\n`,
      },
    }));
    const client = new GitHubContentClient({ token: "test-token", baseUrl: "https://github.test", fetch });

    const content = await client.getFile("acme", "widgets", "README.md", { ref: "main" });

    assert.equal(content, "# Widgets\n");
    assert.equal(requests.length, 1);
    assert.equal(requests[0].url, "https://github.test/repos/acme/widgets/contents/README.md?ref=main");
    assert.equal(requests[0].authorization, "token test-token");
  });

  it("formats folder listings as path (type) lines", async () => {
    const { fetch } = createFetchStub(() => ({
      status: 200,
      body: [
        { type: "dir", path: "src", name: "src" },
        { type: "file", path: "package.json", name: "package.json" },
      ],
    }));
    const client = new GitHubContentClient({ token: "test-token", baseUrl: "https://github.test", fetch });

    const listing = await client.getFolder("acme", "widgets", "");

    assert.equal(listing, "src (dir)\npackage.json (file)\n");
  });

  it("maps 404 responses to not_found", async () => {
    const { fetch } = createFetchStub(() => ({ status: 404, body: { message: "Not Found" } }));
    const client = new GitHubContentClient({ token: "test-token", baseUrl: "https://github.test", fetch });

    await assert.rejects(client.getFile("acme", "widgets", "missing.txt"), (error: unknown) => {
      assert.ok(error instanceof HostingError);
      assert.equal(error.code, "not_found");
      assert.equal(error.status, 404);
      return true;
    });
  });

  it("rejects folders where a file was requested", async () => {
    const { fetch } = createFetchStub(() => ({ status: 200, body: [] }));
    const client = new GitHubContentClient({ token: "test-token", baseUrl: "https://github.test", fetch });

    await assert.rejects(client.getFile("acme", "widgets", "src"), (error: unknown) => {
      assert.ok(error instanceof HostingError);
      assert.equal(error.code, "decode_error");
      return true;
    });
  });

  it("fails before any request when no token is configured", async () => {
    const { fetch, requests } = createFetchStub(() => ({ status: 200, body: [] }));
    const client = new GitHubContentClient({ baseUrl: "https://github.test", fetch });

    assert.equal(client.hasCredential(), false);
    await assert.rejects(client.getFolder("acme", "widgets", ""), (error: unknown) => {
      assert.ok(error instanceof HostingError);
      assert.equal(error.code, "credential_missing");
      return true;
    });
    assert.equal(requests.length, 0);
  });
});
