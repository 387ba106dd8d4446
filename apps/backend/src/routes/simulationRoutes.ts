import { Router } from "express";
import { SimulationController } from "../controllers/simulationController";
import type { SimulationRuntime } from "../services/simulationRuntime";

export const buildSimulationRoutes = (runtime: SimulationRuntime) => {
  const router = Router();
  const controller = new SimulationController(runtime);

  router.get("/state", controller.getState);
  router.get("/status", controller.getStatus);
  router.post("/start", controller.start);
  router.post("/pause", controller.pause);
  router.post("/resume", controller.resume);
  router.post("/stop", controller.stop);
  router.post("/cars", controller.addCar);
  router.delete("/cars/:id", controller.removeCar);
  router.post("/intersections", controller.addIntersection);
  router.patch("/intersections/:id", controller.updateIntersection);
  router.delete("/intersections/:id", controller.removeIntersection);
  router.post("/scenario/demo", controller.loadDemo);

  return router;
};
