// Daily trigger.
//
// Fires once per local day at hh:mm:ss in the configured fixed UTC offset.
// Each firing re-arms for the next day; a failed run is logged and does not
// stop the schedule.

import type { TrackerLogger } from "./logger";

export type DailyTime = { hour: number; minute: number; second: number };

const DAY_MS = 24 * 60 * 60 * 1000;

/** Milliseconds from `nowTs` until the next local `at` (strictly in the future). */
export function msUntilNextRun(nowTs: number, at: DailyTime, utcOffsetMinutes: number): number {
  const offsetMs = utcOffsetMinutes * 60 * 1000;
  const localNow = nowTs + offsetMs;
  const dayStart = Math.floor(localNow / DAY_MS) * DAY_MS;
  let next = dayStart + ((at.hour * 60 + at.minute) * 60 + at.second) * 1000;
  if (next <= localNow) next += DAY_MS;
  return next - localNow;
}

export type DailySchedulerOptions = {
  at: DailyTime;
  utcOffsetMinutes: number;
  clock: () => number;
  logger: TrackerLogger;
  task: () => Promise<void>;
};

export class DailyScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;
  private stopped = false;

  constructor(private readonly opts: DailySchedulerOptions) {}

  start(): void {
    if (this.timer) return;
    this.stopped = false;
    this.arm();
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  get armed(): boolean {
    return this.timer !== null;
  }

  /** Runs the task now; concurrent calls share the in-flight run. */
  runNow(): Promise<void> {
    if (!this.running) {
      this.running = this.opts.task().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private arm(): void {
    const delay = msUntilNextRun(this.opts.clock(), this.opts.at, this.opts.utcOffsetMinutes);
    this.opts.logger.debug({ delay_ms: delay }, "daily run armed");
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.fire();
    }, delay);
    // The HTTP server keeps the process alive, not the schedule.
    this.timer.unref();
  }

  private async fire(): Promise<void> {
    try {
      await this.runNow();
    } catch (err) {
      this.opts.logger.error({ err }, "daily run failed");
    }
    if (!this.stopped) this.arm();
  }
}
