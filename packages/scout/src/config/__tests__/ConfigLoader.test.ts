import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadConfig } from "../ConfigLoader.js";

const createTmpDir = (): string => mkdtempSync(path.join(os.tmpdir(), "reposcout-config-"));

test("loadConfig merges cli over env over file", { concurrency: false }, async () => {
  const tmpDir = createTmpDir();
  writeFileSync(
    path.join(tmpDir, "reposcout.config.json"),
    JSON.stringify(
      {
        provider: "file-provider",
        model: "file-model",
        hosting: { ref: "file-ref", timeoutMs: 5000 },
        limits: { maxTurns: 2 },
      },
      null,
      2,
    ),
  );

  const config = await loadConfig({
    cwd: tmpDir,
    env: {
      REPOSCOUT_PROVIDER: "env-provider",
      REPOSCOUT_MODEL: "env-model",
      REPOSCOUT_GITHUB_REF: "env-ref",
    },
    cli: { model: "cli-model", limits: { maxTurns: 3 } },
  });

  assert.equal(config.provider, "env-provider");
  assert.equal(config.model, "cli-model");
  assert.equal(config.hosting.ref, "env-ref");
  assert.equal(config.hosting.timeoutMs, 5000);
  assert.equal(config.limits.maxTurns, 3);
  assert.equal(config.limits.chatTimeoutMs, 60_000);
  assert.equal(config.workspaceRoot, path.resolve(tmpDir, "."));
});

test("loadConfig provides defaults", { concurrency: false }, async () => {
  const config = await loadConfig({ cwd: createTmpDir(), env: {} });

  assert.equal(config.provider, "groq");
  assert.equal(config.model, "llama-3.3-70b-versatile");
  assert.equal(config.apiKey, undefined);
  assert.equal(config.hosting.token, undefined);
  assert.equal(config.hosting.baseUrl, "https://api.github.com");
  assert.equal(config.limits.maxTurns, 5);
  assert.deepEqual(config.repository.allowedHosts, []);
  assert.equal(config.logging.directory, "logs/reposcout");
  assert.deepEqual(config.server, { host: "127.0.0.1", port: 8080 });
});

test("loadConfig reads credentials and lists from env", { concurrency: false }, async () => {
  const config = await loadConfig({
    cwd: createTmpDir(),
    env: {
      GROQ_API_KEY: "test-groq-key",
      GITHUB_TOKEN: "test-token",
      REPOSCOUT_ALLOWED_HOSTS: "github.com, GitHub.example.test",
      REPOSCOUT_PORT: "9090",
      REPOSCOUT_LOG_DIR: "tmp/logs",
    },
  });

  assert.equal(config.apiKey, "test-groq-key");
  assert.equal(config.hosting.token, "test-token");
  assert.deepEqual(config.repository.allowedHosts, ["github.com", "GitHub.example.test"]);
  assert.equal(config.server.port, 9090);
  assert.equal(config.server.host, "127.0.0.1");
  assert.equal(config.logging.directory, "tmp/logs");
});

test("loadConfig prefers REPOSCOUT_API_KEY over GROQ_API_KEY", { concurrency: false }, async () => {
  const config = await loadConfig({
    cwd: createTmpDir(),
    env: { REPOSCOUT_API_KEY: "test-key", GROQ_API_KEY: "test-groq-key" },
  });

  assert.equal(config.apiKey, "test-key");
});

test("loadConfig parses yaml config files", { concurrency: false }, async () => {
  const tmpDir = createTmpDir();
  writeFileSync(
    path.join(tmpDir, "reposcout.config.yaml"),
    [
      "provider: openai-compatible",
      "baseUrl: http://127.0.0.1:9999/v1",
      "repository:",
      "  allowedHosts:",
      "    - github.com",
      "server:",
      "  port: 7000",
      "",
    ].join("\n"),
  );

  const config = await loadConfig({ cwd: tmpDir, env: {} });

  assert.equal(config.provider, "openai-compatible");
  assert.equal(config.baseUrl, "http://127.0.0.1:9999/v1");
  assert.deepEqual(config.repository.allowedHosts, ["github.com"]);
  assert.equal(config.server.port, 7000);
});

test("loadConfig honours an explicit config path", { concurrency: false }, async () => {
  const tmpDir = createTmpDir();
  writeFileSync(path.join(tmpDir, "custom.json"), JSON.stringify({ model: "custom-model" }));

  const config = await loadConfig({ cwd: tmpDir, env: {}, configPath: "custom.json" });

  assert.equal(config.model, "custom-model");
});

test("loadConfig rejects turn limits above the ceiling", { concurrency: false }, async () => {
  await assert.rejects(
    loadConfig({ cwd: createTmpDir(), env: { REPOSCOUT_MAX_TURNS: "6" } }),
    /Invalid config values: limits\.maxTurns/,
  );
  await assert.rejects(
    loadConfig({ cwd: createTmpDir(), env: {}, cli: { limits: { maxTurns: 0 } } }),
    /Invalid config values: limits\.maxTurns/,
  );
});

test("loadConfig rejects non-numeric env values", { concurrency: false }, async () => {
  await assert.rejects(
    loadConfig({ cwd: createTmpDir(), env: { REPOSCOUT_PORT: "eighty" } }),
    /Invalid REPOSCOUT_PORT: expected number\./,
  );
});

test("loadConfig rejects mistyped file values", { concurrency: false }, async () => {
  const tmpDir = createTmpDir();
  writeFileSync(path.join(tmpDir, "reposcout.config.json"), JSON.stringify({ limits: { maxTurns: "three" } }));

  await assert.rejects(
    loadConfig({ cwd: tmpDir, env: {} }),
    /Invalid reposcout\.config\.json\.limits\.maxTurns: expected number\./,
  );
});
