import cors from "cors";
import express from "express";
import { buildApiRouter } from "./routes";
import type { SimulationRuntime } from "./services/simulationRuntime";

export const buildApp = (runtime: SimulationRuntime) => {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api", buildApiRouter(runtime));

  return app;
};
