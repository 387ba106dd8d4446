import dotenv from "dotenv";

dotenv.config();

const DEFAULT_PORT = 4000;
const DEFAULT_ROAD_LENGTH_METERS = 1000;
const DEFAULT_SCENARIO_SEED = 12345;

const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevelSetting = (typeof LOG_LEVELS)[number];

const optional = (value?: string | null) => {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const flag = (value: string | undefined, fallback: boolean) => {
  const normalized = optional(value)?.toLowerCase();
  if (normalized === undefined) return fallback;
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

const positiveNumber = (value: string | undefined, fallback: number) => {
  const parsed = Number(optional(value));
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const logLevel = (value: string | undefined, nodeEnv: string): LogLevelSetting => {
  const normalized = optional(value)?.toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  if (match) return match;
  return nodeEnv === "production" ? "info" : "debug";
};

const nodeEnv = process.env.NODE_ENV ?? "development";

export const env = {
  nodeEnv,
  port: Number(process.env.PORT ?? DEFAULT_PORT),
  logLevel: logLevel(process.env.LOG_LEVEL, nodeEnv),
  roadLengthMeters: positiveNumber(process.env.ROAD_LENGTH_METERS, DEFAULT_ROAD_LENGTH_METERS),
  pauseLightsOnPause: flag(process.env.PAUSE_LIGHTS_ON_PAUSE, true),
  scenarioSeed: Math.trunc(Number(optional(process.env.SCENARIO_SEED) ?? DEFAULT_SCENARIO_SEED)) || DEFAULT_SCENARIO_SEED,
  autoStartLights: flag(process.env.AUTO_START_LIGHTS, true),
  autoStartClock: flag(process.env.AUTO_START_CLOCK, true),
  loadDemoOnBoot: flag(process.env.LOAD_DEMO_ON_BOOT, false),
};
