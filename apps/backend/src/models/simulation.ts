export type LightColor = "GREEN" | "YELLOW" | "RED";

export const LIGHT_CYCLE: readonly LightColor[] = ["GREEN", "YELLOW", "RED"];

export interface PhaseDurations {
  greenMs: number;
  yellowMs: number;
  redMs: number;
}

export interface Intersection extends PhaseDurations {
  id: number;
  x: number;
  color: LightColor;
}

export interface Car {
  id: number;
  x: number;
  y: number; // lateral offset, pinned to the lane centre
  speedMps: number;
  targetIndex: number;
}

export interface CarInput {
  id: number;
  x: number;
  speedMps: number;
}

export interface IntersectionInput extends PhaseDurations {
  id: number;
  x: number;
}

export type SimulationRunState = "stopped" | "running" | "paused";

export interface SimulationStatus {
  state: SimulationRunState;
  running: boolean;
  paused: boolean;
  tick: number;
}

export interface WorldSnapshot {
  version: number;
  takenAt: number;
  intersections: Intersection[];
  cars: Car[];
}

export interface LightServiceStatus {
  running: boolean;
  paused: boolean;
  activeIntersectionIds: number[];
}

export interface SimulationStateView {
  status: SimulationStatus;
  lights: LightServiceStatus;
  clock: string;
  world: WorldSnapshot;
}
