// herocore/core/SaveScheduler.ts

import { Logger } from "../utils/logger";

export interface Saver {
  saveAll(): Promise<number>;
}

export interface SaveSchedulerConfig {
  intervalMs: number;
  /** Keep the timer ref'd so it alone holds the process open. */
  keepProcessAlive?: boolean;
}

const log = Logger.scope("SAVE");

/**
 * Periodic flush of every connected player's progress.
 *
 * Runs off the event path on its own timer; a flush that is still in
 * flight when the next interval fires makes that interval a no-op.
 */
export class SaveScheduler {
  private readonly intervalMs: number;
  private readonly keepProcessAlive: boolean;
  private handle: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(private readonly saver: Saver, cfg: SaveSchedulerConfig) {
    // Sub-second flushes would hammer the store.
    this.intervalMs = Math.max(cfg.intervalMs, 1000);
    this.keepProcessAlive = cfg.keepProcessAlive ?? false;
  }

  get running(): boolean {
    return this.handle !== null;
  }

  start(): void {
    if (this.handle) return;

    log.info("Starting save scheduler", { intervalMs: this.intervalMs });
    this.handle = setInterval(() => {
      this.flush().catch((err) => {
        log.error("Unexpected save scheduler failure", { err });
      });
    }, this.intervalMs);
    if (!this.keepProcessAlive) this.handle.unref();
  }

  stop(): void {
    if (!this.handle) return;
    clearInterval(this.handle);
    this.handle = null;
    log.info("Save scheduler stopped");
  }

  /**
   * Save now unless a flush is already running (then wait for that one).
   * Store failures are logged, not thrown, so the timer keeps going.
   */
  flush(): Promise<void> {
    if (this.inFlight) return this.inFlight;

    this.inFlight = this.saver
      .saveAll()
      .then((count) => {
        if (count > 0) log.debug("Periodic save complete", { count });
      })
      .catch((err) => {
        log.error("Periodic save failed", { err });
      })
      .finally(() => {
        this.inFlight = null;
      });

    return this.inFlight;
  }
}
