import process from "node:process";
import { loadConfig, type ConfigSource } from "../config/ConfigLoader.js";
import type { AnalysisReport } from "../runtime/RepoAnalyzer.js";
import { createAnalyzer, createRunLogger, type Analyzer } from "./AnalyzerFactory.js";

export interface AnalyzeArgs {
  repo?: string;
  prompt?: string;
  ref?: string;
  configPath?: string;
  workspaceRoot?: string;
  provider?: string;
  model?: string;
  apiKey?: string;
  baseUrl?: string;
  maxTurns?: number;
  logDir?: string;
  runId?: string;
  json?: boolean;
}

export interface AnalyzeCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  createAnalyzer?: typeof createAnalyzer;
  write?: (line: string) => void;
}

export const ANALYZE_USAGE = "Usage: reposcout analyze --repo <owner/repo|url> --prompt <text> [--ref <ref>] [--json]";

const parseNumberArg = (value: string, flag: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid ${flag}: expected number.`);
  }
  return parsed;
};

export const parseAnalyzeArgs = (argv: string[]): AnalyzeArgs => {
  const parsed: AnalyzeArgs = {};
  const positionals: string[] = [];
  const valueFlags: Record<string, (value: string) => void> = {
    "--repo": (value) => (parsed.repo = value),
    "--prompt": (value) => (parsed.prompt = value),
    "--ref": (value) => (parsed.ref = value),
    "--config": (value) => (parsed.configPath = value),
    "--workspace-root": (value) => (parsed.workspaceRoot = value),
    "--provider": (value) => (parsed.provider = value),
    "--model": (value) => (parsed.model = value),
    "--api-key": (value) => (parsed.apiKey = value),
    "--base-url": (value) => (parsed.baseUrl = value),
    "--log-dir": (value) => (parsed.logDir = value),
    "--run-id": (value) => (parsed.runId = value),
    "--max-turns": (value) => (parsed.maxTurns = parseNumberArg(value, "--max-turns")),
  };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === "--json") {
      parsed.json = true;
      continue;
    }
    const setter = Object.hasOwn(valueFlags, arg) ? valueFlags[arg] : undefined;
    if (setter && next !== undefined) {
      setter(next);
      i += 1;
      continue;
    }
    if (arg.startsWith("--")) {
      throw new Error(`Unknown option: ${arg}\n${ANALYZE_USAGE}`);
    }
    positionals.push(arg);
  }
  if (!parsed.repo && positionals.length) {
    parsed.repo = positionals.shift();
  }
  if (!parsed.prompt && positionals.length) {
    parsed.prompt = positionals.join(" ");
  }
  return parsed;
};

const toConfigSource = (args: AnalyzeArgs): ConfigSource => {
  const cli: ConfigSource = {};
  if (args.workspaceRoot) cli.workspaceRoot = args.workspaceRoot;
  if (args.provider) cli.provider = args.provider;
  if (args.model) cli.model = args.model;
  if (args.apiKey) cli.apiKey = args.apiKey;
  if (args.baseUrl) cli.baseUrl = args.baseUrl;
  if (args.ref) cli.hosting = { ref: args.ref };
  if (args.maxTurns !== undefined) cli.limits = { maxTurns: args.maxTurns };
  if (args.logDir) cli.logging = { directory: args.logDir };
  return cli;
};

export class AnalyzeCommand {
  static async run(argv: string[], options: AnalyzeCommandOptions = {}): Promise<AnalysisReport> {
    const args = parseAnalyzeArgs(argv);
    if (!args.repo || !args.prompt) {
      throw new Error(`Both a repository and a prompt are required.\n${ANALYZE_USAGE}`);
    }
    const config = await loadConfig({
      cwd: options.cwd,
      env: options.env,
      cli: toConfigSource(args),
      configPath: args.configPath,
    });
    const analyzer: Analyzer = (options.createAnalyzer ?? createAnalyzer)(config);
    const logger = createRunLogger(config, args.runId);
    const write =
      options.write ??
      ((line: string) => {
        // eslint-disable-next-line no-console
        console.log(line);
      });

    const controller = new AbortController();
    const onSigint = (): void => controller.abort();
    process.once("SIGINT", onSigint);
    let report: AnalysisReport;
    try {
      report = await analyzer.analyze(args.repo, args.prompt, { logger, signal: controller.signal });
    } finally {
      process.removeListener("SIGINT", onSigint);
    }

    write(args.json ? JSON.stringify({ ...report, runId: logger.runId, logPath: logger.logPath }, null, 2) : report.text);
    return report;
  }
}
