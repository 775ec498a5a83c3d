import { DEFAULT_GITHUB_API_BASE_URL } from "@reposcout/integrations";
import { MAX_CONVERSATION_TURNS } from "../runtime/ConversationState.js";

export interface HostingConfig {
  token?: string;
  /** Branch, tag or commit read when a request does not name one. */
  ref?: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface LimitsConfig {
  maxTurns: number;
  chatTimeoutMs: number;
  maxTokens?: number;
  temperature?: number;
}

export interface RepositoryConfig {
  /** URL hosts accepted for repository identifiers; empty accepts any host. */
  allowedHosts: string[];
}

export interface LoggingConfig {
  directory: string;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface ScoutConfig {
  workspaceRoot: string;
  provider: string;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  hosting: HostingConfig;
  limits: LimitsConfig;
  repository: RepositoryConfig;
  logging: LoggingConfig;
  server: ServerConfig;
}

export const DEFAULT_PROVIDER = "groq";
export const DEFAULT_MODEL = "llama-3.3-70b-versatile";

export const DEFAULT_HOSTING: HostingConfig = {
  baseUrl: DEFAULT_GITHUB_API_BASE_URL,
  timeoutMs: 30_000,
};

export const DEFAULT_LIMITS: LimitsConfig = {
  maxTurns: MAX_CONVERSATION_TURNS,
  chatTimeoutMs: 60_000,
};

export const DEFAULT_REPOSITORY: RepositoryConfig = {
  allowedHosts: [],
};

export const DEFAULT_LOGGING: LoggingConfig = {
  directory: "logs/reposcout",
};

export const DEFAULT_SERVER: ServerConfig = {
  host: "127.0.0.1",
  port: 8080,
};
