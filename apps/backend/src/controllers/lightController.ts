import type { Request, Response } from "express";
import type { SimulationRuntime } from "../services/simulationRuntime";
import { sendError } from "./httpErrors";

export class LightController {
  constructor(private readonly runtime: SimulationRuntime) {}

  getStatus = (_req: Request, res: Response) => {
    res.json(this.runtime.lights.getStatus());
  };

  start = (_req: Request, res: Response) => {
    this.runtime.startLights();
    res.json(this.runtime.lights.getStatus());
  };

  pause = (_req: Request, res: Response) => {
    this.runtime.lights.pause();
    res.json(this.runtime.lights.getStatus());
  };

  resume = (_req: Request, res: Response) => {
    this.runtime.lights.resume();
    res.json(this.runtime.lights.getStatus());
  };

  async stop(_req: Request, res: Response) {
    try {
      await this.runtime.stopLights();
      res.json(this.runtime.lights.getStatus());
    } catch (error) {
      sendError(res, error, "Failed to stop traffic lights");
    }
  }
}

export class ClockController {
  constructor(private readonly runtime: SimulationRuntime) {}

  getTime = (_req: Request, res: Response) => {
    res.json({ time: this.runtime.clock.getCurrentTime(), running: this.runtime.clock.isRunning() });
  };
}
