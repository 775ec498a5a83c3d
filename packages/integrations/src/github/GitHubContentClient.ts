import { Octokit } from "@octokit/rest";
import {
  HostingError,
  createCredentialMissingError,
  createTimeoutSignal,
  describeError,
} from "@reposcout/shared";

export const DEFAULT_GITHUB_API_BASE_URL = "https://api.github.com";

export interface GitHubContentClientOptions {
  token?: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Overrides the fetch implementation handed to Octokit. */
  fetch?: typeof fetch;
}

export interface ContentRequestOptions {
  ref?: string;
  signal?: AbortSignal;
}

export interface RepositoryContentSource {
  getFile(owner: string, name: string, filePath: string, options?: ContentRequestOptions): Promise<string>;
  getFolder(owner: string, name: string, folderPath: string, options?: ContentRequestOptions): Promise<string>;
}

interface FolderEntry {
  path: string;
  type: string;
}

const readStatus = (error: unknown): number | undefined => {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
};

const normalizePath = (value: string): string => value.replace(/^\/+/, "");

export class GitHubContentClient implements RepositoryContentSource {
  private client?: Octokit;

  constructor(private options: GitHubContentClientOptions = {}) {}

  hasCredential(): boolean {
    return Boolean(this.options.token);
  }

  private octokit(): Octokit {
    const token = this.options.token;
    if (!token) {
      throw createCredentialMissingError();
    }
    if (!this.client) {
      this.client = new Octokit({
        auth: token,
        baseUrl: this.options.baseUrl ?? DEFAULT_GITHUB_API_BASE_URL,
        request: this.options.fetch ? { fetch: this.options.fetch } : undefined,
      });
    }
    return this.client;
  }

  private async getContent(
    owner: string,
    name: string,
    contentPath: string,
    options: ContentRequestOptions,
  ): Promise<unknown> {
    const octokit = this.octokit();
    const { signal, dispose } = createTimeoutSignal(this.options.timeoutMs, options.signal);
    try {
      const response = await octokit.rest.repos.getContent({
        owner,
        repo: name,
        path: normalizePath(contentPath),
        ref: options.ref || undefined,
        request: { signal },
      });
      return response.data;
    } catch (error) {
      const status = readStatus(error);
      if (status === 404) {
        throw new HostingError("not_found", `GitHub content not found: ${owner}/${name}/${contentPath}`, {
          status,
          cause: error,
        });
      }
      const detail = status === undefined ? describeError(error) : `status code: ${status}`;
      throw new HostingError("transport_error", `GitHub API request failed with ${detail}`, {
        status,
        cause: error,
      });
    } finally {
      dispose();
    }
  }

  async getFile(owner: string, name: string, filePath: string, options: ContentRequestOptions = {}): Promise<string> {
    const data = await this.getContent(owner, name, filePath, options);
    if (!data || typeof data !== "object" || Array.isArray(data) || !("content" in data)) {
      throw new HostingError("decode_error", `GitHub content at ${filePath} is not a file`);
    }
    const encoding = "encoding" in data ? data.encoding : undefined;
    if (encoding !== "base64" || typeof data.content !== "string") {
      throw new HostingError("decode_error", `unexpected file encoding: ${String(encoding)}`);
    }
    return Buffer.from(data.content.replace(/\s+/g, ""), "base64").toString("utf8");
  }

  async getFolder(
    owner: string,
    name: string,
    folderPath: string,
    options: ContentRequestOptions = {},
  ): Promise<string> {
    const data = await this.getContent(owner, name, folderPath, options);
    if (!Array.isArray(data)) {
      throw new HostingError("decode_error", `GitHub content at ${folderPath || "/"} is not a folder`);
    }
    const entries: FolderEntry[] = data.map((item: unknown) => {
      if (!item || typeof item !== "object" || !("path" in item) || !("type" in item)) {
        throw new HostingError("decode_error", "GitHub folder entry is missing path or type");
      }
      return { path: String(item.path), type: String(item.type) };
    });
    return entries.map((entry) => `${entry.path} (${entry.type})\n`).join("");
  }
}
