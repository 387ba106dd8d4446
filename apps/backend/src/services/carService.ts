import { simulationConfig } from "../config/simulation";
import type { Car, Intersection } from "../models/simulation";
import type { WorldState } from "./worldState";

export interface CarMotionOptions {
  roadLengthMeters: number;
  stoppingMarginMeters: number;
  passMarginMeters: number;
}

export interface CarMotion {
  x: number;
  y: number;
  targetIndex: number;
}

export type IntersectionApproach = "passed" | "approaching" | "clear";

const DEFAULT_MOTION_OPTIONS: CarMotionOptions = {
  roadLengthMeters: simulationConfig.roadLengthMeters,
  stoppingMarginMeters: simulationConfig.stoppingMarginMeters,
  passMarginMeters: simulationConfig.passMarginMeters,
};

const wrapToRoad = (x: number, roadLengthMeters: number) => (x > roadLengthMeters ? x % roadLengthMeters : x);

export const classifyApproach = (
  currentX: number,
  desiredX: number,
  intersectionX: number,
  options: Pick<CarMotionOptions, "stoppingMarginMeters" | "passMarginMeters">,
): IntersectionApproach => {
  if (currentX > intersectionX + options.passMarginMeters) {
    return "passed";
  }
  if (currentX < intersectionX && desiredX >= intersectionX - options.stoppingMarginMeters) {
    return "approaching";
  }
  return "clear";
};

/**
 * Computes where a car ends up after `dtSeconds`, given the lights it currently
 * sees. Movement is constant-velocity; a red light stops the car on the spot
 * `stoppingMarginMeters` before the intersection, with no deceleration.
 */
export const advanceCar = (
  car: Readonly<Car>,
  intersections: ReadonlyArray<Readonly<Intersection>>,
  dtSeconds: number,
  options: CarMotionOptions = DEFAULT_MOTION_OPTIONS,
): CarMotion => {
  const desiredX = car.x + car.speedMps * dtSeconds;

  if (intersections.length === 0) {
    return {
      x: wrapToRoad(desiredX, options.roadLengthMeters),
      y: 0,
      targetIndex: car.targetIndex,
    };
  }

  const targetIndex =
    Number.isInteger(car.targetIndex) && car.targetIndex >= 0 && car.targetIndex < intersections.length
      ? car.targetIndex
      : 0;
  const target = intersections[targetIndex];
  if (!target) {
    return { x: desiredX, y: 0, targetIndex: 0 };
  }

  switch (classifyApproach(car.x, desiredX, target.x, options)) {
    case "passed":
      return { x: desiredX, y: 0, targetIndex: (targetIndex + 1) % intersections.length };
    case "approaching": {
      if (target.color !== "RED") {
        return { x: desiredX, y: 0, targetIndex };
      }
      const stoppingPoint = target.x - options.stoppingMarginMeters;
      return { x: desiredX >= stoppingPoint ? stoppingPoint : desiredX, y: 0, targetIndex };
    }
    default:
      return { x: desiredX, y: 0, targetIndex };
  }
};

/**
 * Physics stepper: applies {@link advanceCar} to every car inside one write
 * section, so readers see either the whole tick or none of it.
 */
export class CarService {
  constructor(
    private readonly world: WorldState,
    private readonly options: CarMotionOptions = DEFAULT_MOTION_OPTIONS,
  ) {}

  tick(dtSeconds: number): number {
    return this.world.write(({ cars, intersections }) => {
      const carsAtTick = [...cars];
      const lightsAtTick = [...intersections];
      carsAtTick.forEach((car) => {
        const motion = advanceCar(car, lightsAtTick, dtSeconds, this.options);
        car.x = motion.x;
        car.y = motion.y;
        car.targetIndex = motion.targetIndex;
      });
      return carsAtTick.length;
    });
  }
}
