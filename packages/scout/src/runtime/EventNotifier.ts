import type { EventChannel } from "@reposcout/integrations";
import { createEventMessage, createViewedFileEvent, describeError } from "@reposcout/shared";
import type { ViewedFileListener } from "../tools/repository/RepositoryTools.js";
import { recordRunEvent, type RunLogger } from "./RunLogger.js";

export interface EventNotifierOptions {
  channel?: EventChannel;
  logger?: RunLogger;
  clock?: () => Date;
}

/**
 * Publishes a viewed-file event per successful file read. Deliveries run on a serialized
 * queue detached from the caller; failures end up in the run log only.
 */
export class EventNotifier implements ViewedFileListener {
  private channel?: EventChannel;
  private logger?: RunLogger;
  private clock: () => Date;
  private pending: Promise<void> = Promise.resolve();
  private queued = 0;

  constructor(options: EventNotifierOptions = {}) {
    this.channel = options.channel;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
  }

  notify(filePath: string): void {
    const createdAt = this.clock();
    this.queued += 1;
    this.pending = this.pending
      .then(() => this.deliver(filePath, createdAt))
      .finally(() => {
        this.queued -= 1;
      });
  }

  /**
   * Resolves true once every queued notification has been delivered or dropped. With a
   * `timeoutMs`, stops waiting after that long, logs `notify_abandoned` and resolves false.
   */
  async idle(timeoutMs?: number): Promise<boolean> {
    if (timeoutMs === undefined) {
      await this.pending;
      return true;
    }
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      const drained = await Promise.race([this.pending.then((): true => true), expired]);
      if (!drained) {
        await recordRunEvent(this.logger, "notify_abandoned", { pending: this.queued, timeoutMs });
      }
      return drained;
    } finally {
      clearTimeout(timer);
    }
  }

  private async deliver(filePath: string, createdAt: Date): Promise<void> {
    if (!this.channel) {
      await recordRunEvent(this.logger, "notify_skipped", { path: filePath, reason: "no event channel" });
      return;
    }
    const message = createEventMessage(createViewedFileEvent(filePath, createdAt));
    try {
      await this.channel.send(JSON.stringify(message));
    } catch (error) {
      await recordRunEvent(this.logger, "notify_failed", { path: filePath, error: describeError(error) });
      return;
    }
    await recordRunEvent(this.logger, "notify_sent", { path: filePath });
  }
}
