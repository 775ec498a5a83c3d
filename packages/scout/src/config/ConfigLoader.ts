import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { MAX_CONVERSATION_TURNS } from "../runtime/ConversationState.js";
import {
  DEFAULT_HOSTING,
  DEFAULT_LIMITS,
  DEFAULT_LOGGING,
  DEFAULT_MODEL,
  DEFAULT_PROVIDER,
  DEFAULT_REPOSITORY,
  DEFAULT_SERVER,
  type HostingConfig,
  type LimitsConfig,
  type LoggingConfig,
  type RepositoryConfig,
  type ScoutConfig,
  type ServerConfig,
} from "./Config.js";

export interface ConfigSource {
  workspaceRoot?: string;
  provider?: string;
  model?: string;
  apiKey?: string;
  baseUrl?: string;
  hosting?: Partial<HostingConfig>;
  limits?: Partial<LimitsConfig>;
  repository?: Partial<RepositoryConfig>;
  logging?: Partial<LoggingConfig>;
  server?: Partial<ServerConfig>;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  cli?: ConfigSource;
  configPath?: string;
}

export const CONFIG_FILE_NAMES = ["reposcout.config.json", "reposcout.config.yaml", "reposcout.config.yml"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseNumberStrict = (value: string | undefined, label: string): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid ${label}: expected number.`);
  }
  return parsed;
};

const parseList = (value: string | undefined): string[] | undefined => {
  if (!value) return undefined;
  const items = value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
  return items.length ? items : undefined;
};

const readString = (source: Record<string, unknown>, key: string, label: string): string | undefined => {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new Error(`Invalid ${label}.${key}: expected string.`);
  }
  return value;
};

const readNumber = (source: Record<string, unknown>, key: string, label: string): number | undefined => {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`Invalid ${label}.${key}: expected number.`);
  }
  return value;
};

const readStringList = (source: Record<string, unknown>, key: string, label: string): string[] | undefined => {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === "string")) {
    throw new Error(`Invalid ${label}.${key}: expected list of strings.`);
  }
  return value;
};

const readSection = (source: Record<string, unknown>, key: string, label: string): Record<string, unknown> | undefined => {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new Error(`Invalid ${label}.${key}: expected object.`);
  }
  return value;
};

const hasKey = <T extends object>(value: T, key: PropertyKey): key is keyof T => key in value;

/** Layers later sources over `base`; undefined entries never shadow a lower-precedence value. */
const overlay = <T extends object>(base: T, ...layers: Array<Partial<T> | undefined>): T => {
  const result: T = { ...base };
  for (const layer of layers) {
    if (!layer) continue;
    for (const key of Object.keys(layer)) {
      if (!hasKey(layer, key)) continue;
      const entry: T[typeof key] | undefined = layer[key];
      if (entry !== undefined) result[key] = entry;
    }
  }
  return result;
};

export const normalizeConfigSource = (raw: unknown, label = "config"): ConfigSource => {
  if (!isRecord(raw)) {
    throw new Error(`Invalid ${label}: expected object.`);
  }
  const config: ConfigSource = {
    workspaceRoot: readString(raw, "workspaceRoot", label),
    provider: readString(raw, "provider", label),
    model: readString(raw, "model", label),
    apiKey: readString(raw, "apiKey", label),
    baseUrl: readString(raw, "baseUrl", label),
  };

  const hosting = readSection(raw, "hosting", label);
  if (hosting) {
    config.hosting = {
      token: readString(hosting, "token", `${label}.hosting`),
      ref: readString(hosting, "ref", `${label}.hosting`),
      baseUrl: readString(hosting, "baseUrl", `${label}.hosting`),
      timeoutMs: readNumber(hosting, "timeoutMs", `${label}.hosting`),
    };
  }
  const limits = readSection(raw, "limits", label);
  if (limits) {
    config.limits = {
      maxTurns: readNumber(limits, "maxTurns", `${label}.limits`),
      chatTimeoutMs: readNumber(limits, "chatTimeoutMs", `${label}.limits`),
      maxTokens: readNumber(limits, "maxTokens", `${label}.limits`),
      temperature: readNumber(limits, "temperature", `${label}.limits`),
    };
  }
  const repository = readSection(raw, "repository", label);
  if (repository) {
    config.repository = {
      allowedHosts: readStringList(repository, "allowedHosts", `${label}.repository`),
    };
  }
  const logging = readSection(raw, "logging", label);
  if (logging) {
    config.logging = { directory: readString(logging, "directory", `${label}.logging`) };
  }
  const server = readSection(raw, "server", label);
  if (server) {
    config.server = {
      host: readString(server, "host", `${label}.server`),
      port: readNumber(server, "port", `${label}.server`),
    };
  }
  return config;
};

const findConfigFile = (cwd: string): string | undefined => {
  for (const candidate of CONFIG_FILE_NAMES) {
    const candidatePath = path.join(cwd, candidate);
    if (existsSync(candidatePath)) {
      return candidatePath;
    }
  }
  return undefined;
};

const readConfigFile = async (configPath?: string): Promise<ConfigSource | undefined> => {
  if (!configPath) return undefined;
  if (!existsSync(configPath)) return undefined;
  const content = await readFile(configPath, "utf8");
  if (!content.trim()) return undefined;
  const extension = path.extname(configPath).toLowerCase();
  const parsed: unknown = extension === ".yaml" || extension === ".yml" ? YAML.parse(content) : JSON.parse(content);
  return normalizeConfigSource(parsed, path.basename(configPath));
};

const loadEnvConfig = (env: NodeJS.ProcessEnv): ConfigSource => {
  const config: ConfigSource = {
    workspaceRoot: env.REPOSCOUT_WORKSPACE_ROOT || undefined,
    provider: env.REPOSCOUT_PROVIDER || undefined,
    model: env.REPOSCOUT_MODEL || undefined,
    apiKey: env.REPOSCOUT_API_KEY || env.GROQ_API_KEY || undefined,
    baseUrl: env.REPOSCOUT_BASE_URL || undefined,
  };

  config.hosting = {
    token: env.GITHUB_TOKEN || undefined,
    ref: env.REPOSCOUT_GITHUB_REF || undefined,
    timeoutMs: parseNumberStrict(env.REPOSCOUT_GITHUB_TIMEOUT_MS, "REPOSCOUT_GITHUB_TIMEOUT_MS"),
  };

  config.limits = {
    maxTurns: parseNumberStrict(env.REPOSCOUT_MAX_TURNS, "REPOSCOUT_MAX_TURNS"),
    chatTimeoutMs: parseNumberStrict(env.REPOSCOUT_CHAT_TIMEOUT_MS, "REPOSCOUT_CHAT_TIMEOUT_MS"),
  };

  const allowedHosts = parseList(env.REPOSCOUT_ALLOWED_HOSTS);
  if (allowedHosts) config.repository = { allowedHosts };

  if (env.REPOSCOUT_LOG_DIR) config.logging = { directory: env.REPOSCOUT_LOG_DIR };

  const port = parseNumberStrict(env.REPOSCOUT_PORT, "REPOSCOUT_PORT");
  if (port !== undefined) config.server = { port };

  return config;
};

const mergeConfigs = (
  defaults: ScoutConfig,
  fileConfig?: ConfigSource,
  envConfig?: ConfigSource,
  cliConfig?: ConfigSource,
): ScoutConfig => {
  const sources = [fileConfig, envConfig, cliConfig];
  const topLevel = overlay(
    {
      workspaceRoot: defaults.workspaceRoot,
      provider: defaults.provider,
      model: defaults.model,
      apiKey: defaults.apiKey,
      baseUrl: defaults.baseUrl,
    },
    ...sources,
  );
  return {
    ...topLevel,
    hosting: overlay(defaults.hosting, ...sources.map((source) => source?.hosting)),
    limits: overlay(defaults.limits, ...sources.map((source) => source?.limits)),
    repository: overlay(defaults.repository, ...sources.map((source) => source?.repository)),
    logging: overlay(defaults.logging, ...sources.map((source) => source?.logging)),
    server: overlay(defaults.server, ...sources.map((source) => source?.server)),
  };
};

const assertRequired = (config: ScoutConfig): void => {
  const missing: string[] = [];
  if (!config.provider) missing.push("provider");
  if (!config.model) missing.push("model");
  if (missing.length) {
    throw new Error(`Missing required config: ${missing.join(", ")}`);
  }
};

const assertValid = (config: ScoutConfig): void => {
  const errors: string[] = [];
  const { maxTurns, chatTimeoutMs, maxTokens } = config.limits;
  if (!Number.isInteger(maxTurns) || maxTurns < 1 || maxTurns > MAX_CONVERSATION_TURNS) {
    errors.push("limits.maxTurns");
  }
  if (chatTimeoutMs <= 0) errors.push("limits.chatTimeoutMs");
  if (maxTokens !== undefined && maxTokens <= 0) errors.push("limits.maxTokens");
  if (config.hosting.timeoutMs <= 0) errors.push("hosting.timeoutMs");
  const { port } = config.server;
  if (!Number.isInteger(port) || port < 0 || port > 65535) errors.push("server.port");
  if (errors.length) {
    throw new Error(`Invalid config values: ${errors.join(", ")}`);
  }
};

export const loadConfig = async (options: LoadConfigOptions = {}): Promise<ScoutConfig> => {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const configPath = options.configPath ? path.resolve(cwd, options.configPath) : findConfigFile(cwd);
  const fileConfig = await readConfigFile(configPath);
  const envConfig = loadEnvConfig(env);

  const defaults: ScoutConfig = {
    workspaceRoot: ".",
    provider: DEFAULT_PROVIDER,
    model: DEFAULT_MODEL,
    hosting: DEFAULT_HOSTING,
    limits: DEFAULT_LIMITS,
    repository: DEFAULT_REPOSITORY,
    logging: DEFAULT_LOGGING,
    server: DEFAULT_SERVER,
  };

  const merged = mergeConfigs(defaults, fileConfig, envConfig, options.cli);
  const finalized: ScoutConfig = { ...merged, workspaceRoot: path.resolve(cwd, merged.workspaceRoot) };
  assertRequired(finalized);
  assertValid(finalized);
  return finalized;
};
