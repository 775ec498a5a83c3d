import { promises as fs } from "node:fs";
import path from "node:path";
import { describeError } from "@reposcout/shared";

export interface RunLogEvent {
  type: string;
  timestamp: string;
  data: Record<string, unknown>;
}

export class RunLogger {
  readonly logPath: string;
  readonly logDir: string;
  readonly runId: string;

  constructor(baseDir: string, logDir: string, runId: string) {
    const resolvedDir = path.resolve(baseDir, logDir);
    this.logDir = resolvedDir;
    this.runId = runId;
    this.logPath = path.join(resolvedDir, `${runId}.jsonl`);
  }

  async log(type: string, data: Record<string, unknown>): Promise<void> {
    await fs.mkdir(path.dirname(this.logPath), { recursive: true });
    const event: RunLogEvent = {
      type,
      timestamp: new Date().toISOString(),
      data,
    };
    await fs.appendFile(this.logPath, `${JSON.stringify(event)}\n`, "utf8");
  }

  /** Events written so far for this run, oldest first. */
  async readEvents(): Promise<RunLogEvent[]> {
    let content: string;
    try {
      content = await fs.readFile(this.logPath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
      throw error;
    }
    return content
      .split("\n")
      .filter(Boolean)
      .map((line) => JSON.parse(line) as RunLogEvent);
  }
}

/** Writes an event when a logger is present; a failed write is reported on stderr and never rethrown. */
export const recordRunEvent = async (
  logger: RunLogger | undefined,
  type: string,
  data: Record<string, unknown>,
): Promise<void> => {
  if (!logger) return;
  try {
    await logger.log(type, data);
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error(`Failed to write ${type} log entry: ${describeError(error)}`);
  }
};
