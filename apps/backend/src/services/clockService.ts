import { clockConfig } from "../config/simulation";
import { logger } from "../utils/logger";
import { formatClockTime } from "../utils/timing";

const log = logger.child("clock");

type ClockListener = (time: string) => void;

/** Wall-clock readout (HH:mm:ss) refreshed once a second. Knows nothing about the simulation. */
export class ClockService {
  private readonly listeners = new Set<ClockListener>();
  private currentTime: string;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly now: () => Date = () => new Date(),
    private readonly intervalMs: number = clockConfig.intervalMs,
  ) {
    this.currentTime = formatClockTime(this.now());
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.update();
    this.timer = setInterval(() => this.update(), this.intervalMs);
    this.timer.unref();
    log.info("Clock started");
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    log.info("Clock stopped");
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getCurrentTime(): string {
    return this.currentTime;
  }

  subscribe(listener: ClockListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private update() {
    this.currentTime = formatClockTime(this.now());
    this.listeners.forEach((listener) => {
      try {
        listener(this.currentTime);
      } catch (error) {
        log.error("Clock listener failed", { error });
      }
    });
  }
}
