import { Router } from "express";
import type { SimulationRuntime } from "../services/simulationRuntime";
import { buildClockRoutes, buildLightRoutes } from "./lightRoutes";
import { buildSimulationRoutes } from "./simulationRoutes";

export const buildApiRouter = (runtime: SimulationRuntime) => {
  const router = Router();

  router.use("/simulation", buildSimulationRoutes(runtime));
  router.use("/lights", buildLightRoutes(runtime));
  router.use("/clock", buildClockRoutes(runtime));

  return router;
};
