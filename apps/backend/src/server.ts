import { buildApp } from "./app";
import { shellConfig } from "./config/simulation";
import { env } from "./config/env";
import { SimulationRuntime } from "./services/simulationRuntime";
import { logger } from "./utils/logger";

const runtime = new SimulationRuntime();

if (shellConfig.loadDemoOnBoot) {
  runtime.loadDemoScenario();
}
if (shellConfig.autoStartClock) {
  runtime.clock.start();
}
if (shellConfig.autoStartLights) {
  runtime.startLights();
}

const app = buildApp(runtime);

const server = app.listen(env.port, () => {
  logger.info(`Backend listening on port ${env.port}`, { env: env.nodeEnv });
});

let shuttingDown = false;

const shutdown = async (signal: NodeJS.Signals) => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info("Shutting down", { signal });
  try {
    await runtime.shutdown();
  } catch (error) {
    logger.error("Runtime shutdown failed", { error });
  }
  server.close(() => {
    process.exit(0);
  });
};

process.on("SIGINT", (signal) => void shutdown(signal));
process.on("SIGTERM", (signal) => void shutdown(signal));
