import type { Request, Response } from "express";
import type { PhaseDurations } from "../models/simulation";
import type { SimulationRuntime } from "../services/simulationRuntime";
import { sendError, toInteger, toNumber } from "./httpErrors";

const SECONDS_TO_MS = 1000;

export class SimulationController {
  constructor(private readonly runtime: SimulationRuntime) {}

  getState = (_req: Request, res: Response) => {
    res.json(this.runtime.getStateView());
  };

  getStatus = (_req: Request, res: Response) => {
    res.json(this.runtime.simulation.getStatus());
  };

  start = (_req: Request, res: Response) => {
    this.runtime.simulation.start();
    res.json(this.runtime.simulation.getStatus());
  };

  pause = (req: Request, res: Response) => {
    const { pauseLights } = req.body ?? {};
    if (pauseLights !== undefined && typeof pauseLights !== "boolean") {
      res.status(400).json({ error: "pauseLights must be a boolean" });
      return;
    }
    this.runtime.pauseAll(pauseLights === undefined ? {} : { pauseLights });
    res.json(this.runtime.simulation.getStatus());
  };

  resume = (_req: Request, res: Response) => {
    this.runtime.resumeAll();
    res.json(this.runtime.simulation.getStatus());
  };

  stop = (_req: Request, res: Response) => {
    this.runtime.stopSimulation();
    res.json(this.runtime.simulation.getStatus());
  };

  addCar = (req: Request, res: Response) => {
    const { id, x, speedMps } = req.body ?? {};

    const parsedX = toNumber(x);
    if (parsedX === undefined) {
      res.status(400).json({ error: "x must be a number" });
      return;
    }
    const parsedSpeed = toNumber(speedMps);
    if (parsedSpeed === undefined || parsedSpeed < 0) {
      res.status(400).json({ error: "speedMps must be a non-negative number" });
      return;
    }
    const parsedId = id === undefined ? undefined : toInteger(id);
    if (id !== undefined && parsedId === undefined) {
      res.status(400).json({ error: "id must be an integer" });
      return;
    }

    try {
      const car = this.runtime.addCar({ id: parsedId, x: parsedX, speedMps: parsedSpeed });
      res.status(201).json(car);
    } catch (error) {
      sendError(res, error, "Failed to add car");
    }
  };

  removeCar = (req: Request, res: Response) => {
    const id = toInteger(req.params.id);
    if (id === undefined) {
      res.status(400).json({ error: "id must be an integer" });
      return;
    }
    try {
      this.runtime.removeCar(id);
      res.status(204).send();
    } catch (error) {
      sendError(res, error, "Failed to remove car");
    }
  };

  addIntersection = (req: Request, res: Response) => {
    const { id, x } = req.body ?? {};

    const parsedX = toNumber(x);
    if (parsedX === undefined) {
      res.status(400).json({ error: "x must be a number" });
      return;
    }
    const parsedId = id === undefined ? undefined : toInteger(id);
    if (id !== undefined && parsedId === undefined) {
      res.status(400).json({ error: "id must be an integer" });
      return;
    }
    const durations = this.parseDurations(req.body ?? {}, true);
    if ("error" in durations) {
      res.status(400).json({ error: durations.error });
      return;
    }

    try {
      const intersection = this.runtime.addIntersection({
        id: parsedId,
        x: parsedX,
        greenMs: durations.value.greenMs ?? 0,
        yellowMs: durations.value.yellowMs ?? 0,
        redMs: durations.value.redMs ?? 0,
      });
      res.status(201).json(intersection);
    } catch (error) {
      sendError(res, error, "Failed to add intersection");
    }
  };

  updateIntersection = (req: Request, res: Response) => {
    const id = toInteger(req.params.id);
    if (id === undefined) {
      res.status(400).json({ error: "id must be an integer" });
      return;
    }
    const durations = this.parseDurations(req.body ?? {}, false);
    if ("error" in durations) {
      res.status(400).json({ error: durations.error });
      return;
    }

    try {
      const intersection = this.runtime.updateIntersectionTiming(id, durations.value);
      res.json(intersection);
    } catch (error) {
      sendError(res, error, "Failed to update intersection");
    }
  };

  removeIntersection = (req: Request, res: Response) => {
    const id = toInteger(req.params.id);
    if (id === undefined) {
      res.status(400).json({ error: "id must be an integer" });
      return;
    }
    try {
      this.runtime.removeIntersection(id);
      res.status(204).send();
    } catch (error) {
      sendError(res, error, "Failed to remove intersection");
    }
  };

  loadDemo = (req: Request, res: Response) => {
    const { seed } = req.body ?? {};
    const parsedSeed = seed === undefined ? undefined : toInteger(seed);
    if (seed !== undefined && parsedSeed === undefined) {
      res.status(400).json({ error: "seed must be an integer" });
      return;
    }
    try {
      const scenario = this.runtime.loadDemoScenario(parsedSeed);
      res.status(200).json(scenario);
    } catch (error) {
      sendError(res, error, "Failed to load demo scenario");
    }
  };

  /** Durations arrive in seconds, the unit the shell asks users for. */
  private parseDurations(
    body: Record<string, unknown>,
    required: boolean,
  ): { value: Partial<PhaseDurations> } | { error: string } {
    const fields: Array<[string, keyof PhaseDurations]> = [
      ["greenSeconds", "greenMs"],
      ["yellowSeconds", "yellowMs"],
      ["redSeconds", "redMs"],
    ];
    const value: Partial<PhaseDurations> = {};

    for (const [field, key] of fields) {
      const raw = body[field];
      if (raw === undefined && !required) {
        continue;
      }
      const parsed = toNumber(raw);
      if (parsed === undefined || parsed <= 0) {
        return { error: `${field} must be a positive number` };
      }
      value[key] = parsed * SECONDS_TO_MS;
    }

    return { value };
  }
}
