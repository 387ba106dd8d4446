import type { CarInput, IntersectionInput } from "../models/simulation";
import { createSeededRandom, randBetween } from "../utils/random";

export interface Scenario {
  intersections: IntersectionInput[];
  cars: CarInput[];
}

const seconds = (value: number) => value * 1000;

const DEMO_INTERSECTIONS: IntersectionInput[] = [
  { id: 1, x: 200, greenMs: seconds(10), yellowMs: seconds(2), redMs: seconds(12) },
  { id: 2, x: 500, greenMs: seconds(8), yellowMs: seconds(2), redMs: seconds(10) },
  { id: 3, x: 800, greenMs: seconds(12), yellowMs: seconds(3), redMs: seconds(15) },
];

// Each car spawns somewhere in a 50 m band with a speed drawn from its range.
const DEMO_CAR_PROFILES: Array<{ id: number; xRange: [number, number]; speedRange: [number, number] }> = [
  { id: 1, xRange: [50, 100], speedRange: [10, 15] },
  { id: 2, xRange: [300, 350], speedRange: [12, 16] },
  { id: 3, xRange: [600, 650], speedRange: [8, 14] },
];

/** Three intersections and three cars; the same seed always yields the same cars. */
export const buildDemoScenario = (seed: number): Scenario => {
  const random = createSeededRandom(seed);
  return {
    intersections: DEMO_INTERSECTIONS.map((intersection) => ({ ...intersection })),
    cars: DEMO_CAR_PROFILES.map((profile) => ({
      id: profile.id,
      x: randBetween(random, ...profile.xRange),
      speedMps: randBetween(random, ...profile.speedRange),
    })),
  };
};
