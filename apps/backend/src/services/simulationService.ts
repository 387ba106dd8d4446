import { simulationConfig } from "../config/simulation";
import type { SimulationRunState, SimulationStatus, WorldSnapshot } from "../models/simulation";
import { logger } from "../utils/logger";
import { CarService } from "./carService";
import type { WorldState } from "./worldState";

const log = logger.child("simulation");

export interface SimulationServiceOptions {
  tickIntervalMs?: number;
  now?: () => number;
  carService?: CarService;
}

/**
 * Owns the physics stepper's lifecycle and the read path the renderer uses.
 *
 * Stopped → (start) → Running ⇄ (pause/resume) Paused → (stop) → Stopped.
 * While paused the interval keeps firing but ticks do nothing; resuming resets
 * the time baseline so the pause never shows up in a tick's delta.
 */
export class SimulationService {
  private readonly tickIntervalMs: number;
  private readonly now: () => number;
  private readonly carService: CarService;
  private state: SimulationRunState = "stopped";
  private tickCount = 0;
  private lastTick: number;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly world: WorldState,
    options: SimulationServiceOptions = {},
  ) {
    this.tickIntervalMs = options.tickIntervalMs ?? simulationConfig.tickIntervalMs;
    this.now = options.now ?? (() => Date.now());
    this.carService = options.carService ?? new CarService(world);
    this.lastTick = this.now();
  }

  start(): void {
    if (this.state === "running") {
      return;
    }
    if (this.timer) {
      clearInterval(this.timer);
    }

    this.state = "running";
    this.tickCount = 0;
    this.lastTick = this.now();
    this.timer = setInterval(() => {
      try {
        this.step();
      } catch (error) {
        log.error("Simulation tick failed", { error, tick: this.tickCount });
      }
    }, this.tickIntervalMs);
    this.timer.unref();

    log.info(`Simulation started at ${Math.round(1000 / this.tickIntervalMs)} Hz`);
  }

  pause(): void {
    if (this.state !== "running") {
      return;
    }
    this.state = "paused";
    log.info("Simulation paused", { tick: this.tickCount });
  }

  resume(): void {
    if (this.state !== "paused") {
      return;
    }
    this.state = "running";
    this.lastTick = this.now();
    log.info("Simulation resumed", { tick: this.tickCount });
  }

  /**
   * Ticks are synchronous, so clearing the interval can never cut one short:
   * the tick in progress (if any) has already finished by the time this runs.
   */
  stop(): void {
    if (this.state === "stopped") {
      return;
    }
    this.state = "stopped";
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    log.info("Simulation stopped", { tick: this.tickCount });
  }

  snapshot(): WorldSnapshot {
    return this.world.snapshot();
  }

  getStatus(): SimulationStatus {
    return {
      state: this.state,
      running: this.state !== "stopped",
      paused: this.state === "paused",
      tick: this.tickCount,
    };
  }

  isRunning(): boolean {
    return this.state !== "stopped";
  }

  isPaused(): boolean {
    return this.state === "paused";
  }

  getTickCount(): number {
    return this.tickCount;
  }

  private step() {
    if (this.state !== "running") {
      return;
    }

    const now = this.now();
    const dt = Math.max(0, (now - this.lastTick) / 1000);
    this.lastTick = now;

    this.world.write(() => {
      this.carService.tick(dt);
      this.tickCount += 1;
    });
  }
}
