#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { AnalyzeCommand } from "./cli/AnalyzeCommand.js";
import { ServeCommand } from "./cli/ServeCommand.js";
import { CONFIG_FILE_NAMES } from "./config/ConfigLoader.js";

export const HELP_TEXT =
  "Usage: reposcout analyze --repo <owner/repo|url> --prompt <text> [--ref <ref>] [--json]\n" +
  "   or: reposcout serve [--port <port>] [--host <host>]\n" +
  "\n" +
  "Commands:\n" +
  "  analyze  Explore a GitHub repository with the model and print a summary.\n" +
  "  serve    Accept analysis requests over a WebSocket relay.\n" +
  "  doctor   Print environment and install paths.\n" +
  "\n" +
  "Options:\n" +
  "  --help, -h     Show help\n" +
  "  --version, -v  Show version\n";

const resolveReal = (value: string): string => {
  try {
    return fs.realpathSync(value);
  } catch {
    return path.resolve(value);
  }
};

const readPackageVersion = (pkgJson: string): string => {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(pkgJson, "utf8"));
    if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) throw error;
  }
  return "dev";
};

const packageRoot = (): string => path.resolve(resolveReal(fileURLToPath(import.meta.url)), "..", "..");

export const buildDoctorReport = (env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string[] => {
  const scriptPath = process.argv[1] ?? "unknown";
  const resolvedScript = resolveReal(scriptPath);
  const binDir = path.dirname(resolvedScript);
  const pkgRoot = packageRoot();
  const pkgJson = path.join(pkgRoot, "package.json");
  const pathEntries = (env.PATH ?? "").split(path.delimiter).filter(Boolean);
  const configFile = CONFIG_FILE_NAMES.find((name) => fs.existsSync(path.join(cwd, name)));

  return [
    "reposcout doctor",
    `Node: ${process.version}`,
    `Platform: ${process.platform} ${process.arch}`,
    `CLI Path: ${scriptPath}`,
    `CLI Resolved: ${resolvedScript}`,
    `Bin Dir In PATH: ${pathEntries.includes(binDir) ? "yes" : "no"}`,
    `Package Root: ${pkgRoot}`,
    `Package.json: ${fs.existsSync(pkgJson) ? "found" : "missing"}`,
    `Config File: ${configFile ?? "none"}`,
    `GitHub Token: ${env.GITHUB_TOKEN ? "set" : "missing"}`,
    `Model API Key: ${env.REPOSCOUT_API_KEY || env.GROQ_API_KEY ? "set" : "missing"}`,
  ];
};

export const runCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  if (argv.includes("--help") || argv.includes("-h") || argv.length === 0) {
    // eslint-disable-next-line no-console
    console.log(HELP_TEXT);
    return;
  }

  const [command, ...rest] = argv;
  if (command === "--version" || command === "-v" || command === "version") {
    // eslint-disable-next-line no-console
    console.log(readPackageVersion(path.join(packageRoot(), "package.json")));
    return;
  }

  if (command === "doctor" || command === "--doctor") {
    // eslint-disable-next-line no-console
    console.log(buildDoctorReport().join("\n"));
    return;
  }

  if (command === "analyze") {
    const report = await AnalyzeCommand.run(rest);
    if (report.outcome === "failed") {
      process.exitCode = 1;
    }
    return;
  }

  if (command === "serve") {
    await ServeCommand.run(rest);
    return;
  }

  throw new Error(HELP_TEXT);
};

const isMain = (() => {
  const scriptPath = process.argv[1];
  if (!scriptPath) return false;
  const current = fileURLToPath(import.meta.url);
  return resolveReal(scriptPath) === resolveReal(current);
})();

if (isMain) {
  runCli().catch((error) => {
    // eslint-disable-next-line no-console
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
