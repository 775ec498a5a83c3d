import type { AddressInfo } from "node:net";
import process from "node:process";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import { WebSocketEventChannel } from "@reposcout/integrations";
import {
  ANALYSIS_REQUEST_EVENT_KIND,
  ANALYSIS_RESULT_EVENT_KIND,
  createEventMessage,
  createNoticeMessage,
  createRelayEvent,
  describeError,
  findTagValue,
  parseEventMessage,
} from "@reposcout/shared";
import type { ScoutConfig } from "../config/Config.js";
import { loadConfig, type ConfigSource } from "../config/ConfigLoader.js";
import type { RunLogger } from "../runtime/RunLogger.js";
import { createAnalyzer, createRunLogger, type Analyzer } from "./AnalyzerFactory.js";

export interface RelayServerOptions {
  analyzer: Analyzer;
  host: string;
  port: number;
  createLogger?: () => RunLogger;
}

const rawDataToString = (data: RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
};

/**
 * Relay endpoint: each `["EVENT", {kind: 5838}]` frame starts one analysis whose
 * viewed-file events and final result are written back on the same socket.
 */
export class RelayServer {
  private server?: WebSocketServer;
  private inFlight = new Set<Promise<void>>();
  private controllers = new Set<AbortController>();

  constructor(private options: RelayServerOptions) {}

  async start(): Promise<AddressInfo> {
    const server = new WebSocketServer({ host: this.options.host, port: this.options.port });
    this.server = server;
    server.on("connection", (socket) => this.handleConnection(socket));
    await new Promise<void>((resolve, reject) => {
      server.once("listening", () => resolve());
      server.once("error", reject);
    });
    const address = server.address();
    if (typeof address === "string") {
      throw new Error(`Unexpected relay address: ${address}`);
    }
    return address;
  }

  /** Cancels running analyses, waits for them to settle, then closes the server. */
  async close(): Promise<void> {
    for (const controller of this.controllers) controller.abort();
    await Promise.all(this.inFlight);
    const server = this.server;
    if (!server) return;
    for (const client of server.clients) client.terminate();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    this.server = undefined;
  }

  private handleConnection(socket: WebSocket): void {
    const channel = new WebSocketEventChannel(socket);
    const controllers = new Set<AbortController>();
    socket.on("message", (data) => {
      const task = this.handleMessage(channel, rawDataToString(data), controllers).catch((error) => {
        // eslint-disable-next-line no-console
        console.error(`Relay request failed: ${describeError(error)}`);
      });
      this.inFlight.add(task);
      void task.finally(() => this.inFlight.delete(task));
    });
    socket.on("close", () => {
      for (const controller of controllers) controller.abort();
    });
    socket.on("error", (error) => {
      // eslint-disable-next-line no-console
      console.error(`Relay socket error: ${error.message}`);
    });
  }

  private async handleMessage(
    channel: WebSocketEventChannel,
    raw: string,
    controllers: Set<AbortController>,
  ): Promise<void> {
    const event = parseEventMessage(raw);
    if (!event) {
      await channel.sendMessage(createNoticeMessage("invalid message: expected [\"EVENT\", {...}]"));
      return;
    }
    if (event.kind !== ANALYSIS_REQUEST_EVENT_KIND) {
      await channel.sendMessage(createNoticeMessage(`unsupported event kind: ${event.kind}`));
      return;
    }
    const repo = findTagValue(event, "repo");
    if (!repo) {
      await channel.sendMessage(createNoticeMessage("missing repo tag"));
      return;
    }

    const controller = new AbortController();
    controllers.add(controller);
    this.controllers.add(controller);
    try {
      const report = await this.options.analyzer.analyze(repo, event.content, {
        channel,
        signal: controller.signal,
        logger: this.options.createLogger?.(),
      });
      if (!channel.isOpen()) return;
      await channel.sendMessage(
        createEventMessage(
          createRelayEvent({
            kind: ANALYSIS_RESULT_EVENT_KIND,
            content: report.text,
            tags: [
              ["status", report.outcome],
              ["repo", repo],
            ],
          }),
        ),
      );
    } finally {
      controllers.delete(controller);
      this.controllers.delete(controller);
    }
  }
}

export const SERVE_USAGE = "Usage: reposcout serve [--port <port>] [--host <host>] [--config <path>]";

export interface ServeArgs {
  port?: number;
  host?: string;
  configPath?: string;
}

export const parseServeArgs = (argv: string[]): ServeArgs => {
  const parsed: ServeArgs = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === "--port" && next) {
      const port = Number(next);
      if (!Number.isInteger(port)) {
        throw new Error("Invalid --port: expected number.");
      }
      parsed.port = port;
      i += 1;
      continue;
    }
    if (arg === "--host" && next) {
      parsed.host = next;
      i += 1;
      continue;
    }
    if (arg === "--config" && next) {
      parsed.configPath = next;
      i += 1;
      continue;
    }
    throw new Error(`Unknown option: ${arg}\n${SERVE_USAGE}`);
  }
  return parsed;
};

export const createRelayServer = (config: ScoutConfig, analyzer: Analyzer = createAnalyzer(config)): RelayServer =>
  new RelayServer({
    analyzer,
    host: config.server.host,
    port: config.server.port,
    createLogger: () => createRunLogger(config),
  });

export class ServeCommand {
  static async run(argv: string[]): Promise<RelayServer> {
    const args = parseServeArgs(argv);
    const cli: ConfigSource = {};
    if (args.port !== undefined || args.host) {
      cli.server = { port: args.port, host: args.host };
    }
    const config = await loadConfig({ cli, configPath: args.configPath });
    const relay = createRelayServer(config);
    const address = await relay.start();
    // eslint-disable-next-line no-console
    console.log(`reposcout relay listening on ws://${address.address}:${address.port}`);

    const shutdown = (): void => {
      relay.close().catch((error) => {
        // eslint-disable-next-line no-console
        console.error(`Failed to stop relay: ${describeError(error)}`);
        process.exitCode = 1;
      });
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
    return relay;
  }
}
