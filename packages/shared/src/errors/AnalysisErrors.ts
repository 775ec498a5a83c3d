export type AnalysisErrorCode =
  | "invalid_input"
  | "credential_missing"
  | "fatal_collaborator"
  | "cancelled";

export type HostingErrorCode =
  | "not_found"
  | "credential_missing"
  | "decode_error"
  | "transport_error";

type AnalysisErrorInput = {
  code: AnalysisErrorCode;
  message: string;
  cause?: unknown;
};

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;

  constructor({ code, message, cause }: AnalysisErrorInput) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "AnalysisError";
    this.code = code;
  }
}

export class HostingError extends Error {
  readonly code: HostingErrorCode;
  readonly status?: number;

  constructor(code: HostingErrorCode, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "HostingError";
    this.code = code;
    this.status = options.status;
  }
}

export const CREDENTIAL_MISSING_MESSAGE =
  "GitHub token is not configured. Set GITHUB_TOKEN (or hosting.token in reposcout.config.json) to a personal access token with repo scope.";

export const createCredentialMissingError = (): HostingError =>
  new HostingError("credential_missing", CREDENTIAL_MISSING_MESSAGE);

export const isCredentialMissing = (error: unknown): boolean =>
  (error instanceof HostingError || error instanceof AnalysisError) &&
  error.code === "credential_missing";

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
