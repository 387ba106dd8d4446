import { trafficLightConfig } from "../config/simulation";
import { LIGHT_CYCLE, type Intersection, type LightColor, type LightServiceStatus } from "../models/simulation";
import { logger } from "../utils/logger";
import { settleWithin, sleep } from "../utils/timing";
import type { WorldState } from "./worldState";

const log = logger.child("lights");

export interface TrafficLightServiceOptions {
  pollIntervalMs?: number;
  shutdownTimeoutMs?: number;
  now?: () => number;
}

interface ActiveLight {
  controller: AbortController;
  done: Promise<void>;
}

const phaseDurationMs = (intersection: Intersection, color: LightColor) => {
  switch (color) {
    case "GREEN":
      return intersection.greenMs;
    case "YELLOW":
      return intersection.yellowMs;
    default:
      return intersection.redMs;
  }
};

/**
 * Cycles one intersection GREEN → YELLOW → RED until cancelled. The color is
 * written on phase entry; the countdown then advances in poll-sized steps and
 * stands still while the shared pause flag is set.
 */
class LightCycleTask {
  constructor(
    private readonly intersectionId: number,
    private readonly world: WorldState,
    private readonly signal: AbortSignal,
    private readonly isPaused: () => boolean,
    private readonly pollIntervalMs: number,
    private readonly now: () => number,
  ) {}

  async run(): Promise<void> {
    while (!this.signal.aborted) {
      for (const color of LIGHT_CYCLE) {
        if (this.signal.aborted) {
          return;
        }
        const durationMs = this.enterPhase(color);
        if (durationMs === undefined) {
          log.debug("Intersection no longer exists, ending light cycle", { intersectionId: this.intersectionId });
          return;
        }
        await this.waitPhase(durationMs);
      }
    }
  }

  private enterPhase(color: LightColor): number | undefined {
    return this.world.write(({ intersections }) => {
      const intersection = intersections.find((candidate) => candidate.id === this.intersectionId);
      if (!intersection) {
        return undefined;
      }
      intersection.color = color;
      return phaseDurationMs(intersection, color);
    });
  }

  private async waitPhase(durationMs: number): Promise<void> {
    let remainingMs = durationMs;
    while (remainingMs > 0 && !this.signal.aborted) {
      const startedAt = this.now();
      await sleep(Math.min(remainingMs, this.pollIntervalMs));
      if (!this.isPaused()) {
        remainingMs -= this.now() - startedAt;
      }
    }
  }
}

/**
 * Runs one independent light cycle per intersection. Tasks share only the
 * pause flag; there is no coordination or offset between intersections.
 */
export class TrafficLightService {
  private readonly lights = new Map<number, ActiveLight>();
  private readonly pollIntervalMs: number;
  private readonly shutdownTimeoutMs: number;
  private readonly now: () => number;
  private running = false;
  private paused = false;

  constructor(
    private readonly world: WorldState,
    options: TrafficLightServiceOptions = {},
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? trafficLightConfig.pollIntervalMs;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? trafficLightConfig.shutdownTimeoutMs;
    this.now = options.now ?? (() => Date.now());
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.paused = false;
    log.info("Traffic light service started");
  }

  /** Returns whether a new cycle was started for the intersection. */
  startLight(intersectionId: number): boolean {
    if (!this.running || this.lights.has(intersectionId)) {
      return false;
    }

    const controller = new AbortController();
    const task = new LightCycleTask(
      intersectionId,
      this.world,
      controller.signal,
      () => this.paused,
      this.pollIntervalMs,
      this.now,
    );
    const light: ActiveLight = {
      controller,
      done: Promise.resolve(),
    };
    light.done = task
      .run()
      .catch((error: unknown) => {
        log.error("Light cycle failed", { intersectionId, error });
      })
      .finally(() => {
        if (this.lights.get(intersectionId) === light) {
          this.lights.delete(intersectionId);
        }
      });
    this.lights.set(intersectionId, light);

    log.debug("Started light cycle", { intersectionId });
    return true;
  }

  /** Cancellation is observed at the task's next poll; the current step is not interrupted. */
  stopLight(intersectionId: number): boolean {
    const light = this.lights.get(intersectionId);
    if (!light) {
      return false;
    }
    this.lights.delete(intersectionId);
    light.controller.abort();
    log.debug("Stopped light cycle", { intersectionId });
    return true;
  }

  pause(): void {
    if (!this.running || this.paused) {
      return;
    }
    this.paused = true;
    log.info("Traffic light service paused");
  }

  resume(): void {
    if (!this.running || !this.paused) {
      return;
    }
    this.paused = false;
    log.info("Traffic light service resumed");
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.paused = false;

    const pending = [...this.lights.values()];
    this.lights.clear();
    pending.forEach((light) => light.controller.abort());

    const finished = await settleWithin(
      Promise.all(pending.map((light) => light.done)),
      this.shutdownTimeoutMs,
    );
    if (!finished) {
      log.warn("Light cycles did not finish in time, abandoning them", {
        count: pending.length,
        timeoutMs: this.shutdownTimeoutMs,
      });
    }
    log.info("Traffic light service stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  isPaused(): boolean {
    return this.paused;
  }

  activeLights(): number[] {
    return [...this.lights.keys()].sort((a, b) => a - b);
  }

  getStatus(): LightServiceStatus {
    return {
      running: this.running,
      paused: this.paused,
      activeIntersectionIds: this.activeLights(),
    };
  }
}
