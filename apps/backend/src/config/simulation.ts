import { env } from "./env";

export const SIMULATION_HZ = 20;

export const simulationConfig = {
  tickIntervalMs: 1000 / SIMULATION_HZ,
  roadLengthMeters: env.roadLengthMeters,
  stoppingMarginMeters: 5,
  passMarginMeters: 2,
};

export const trafficLightConfig = {
  pollIntervalMs: 100,
  shutdownTimeoutMs: 2000,
};

export const clockConfig = {
  intervalMs: 1000,
};

export const shellConfig = {
  pauseLightsOnPause: env.pauseLightsOnPause,
  scenarioSeed: env.scenarioSeed,
  autoStartLights: env.autoStartLights,
  autoStartClock: env.autoStartClock,
  loadDemoOnBoot: env.loadDemoOnBoot,
};
