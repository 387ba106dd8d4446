import { Router } from "express";
import { ClockController, LightController } from "../controllers/lightController";
import type { SimulationRuntime } from "../services/simulationRuntime";

export const buildLightRoutes = (runtime: SimulationRuntime) => {
  const router = Router();
  const controller = new LightController(runtime);

  router.get("/", controller.getStatus);
  router.post("/start", controller.start);
  router.post("/pause", controller.pause);
  router.post("/resume", controller.resume);
  router.post("/stop", (req, res) => {
    void controller.stop(req, res);
  });

  return router;
};

export const buildClockRoutes = (runtime: SimulationRuntime) => {
  const router = Router();
  const controller = new ClockController(runtime);

  router.get("/", controller.getTime);

  return router;
};
