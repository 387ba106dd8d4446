import { shellConfig } from "../config/simulation";
import type {
  Car,
  CarInput,
  Intersection,
  IntersectionInput,
  PhaseDurations,
  SimulationStateView,
} from "../models/simulation";
import { logger } from "../utils/logger";
import { ClockService } from "./clockService";
import { buildDemoScenario, type Scenario } from "./scenarioService";
import { SimulationService, type SimulationServiceOptions } from "./simulationService";
import { TrafficLightService, type TrafficLightServiceOptions } from "./trafficLightService";
import { WorldState } from "./worldState";

const log = logger.child("runtime");

type WithOptionalId<T extends { id: number }> = Omit<T, "id"> & { id?: number };

export interface SimulationRuntimeOptions {
  world?: WorldState;
  simulation?: SimulationServiceOptions;
  lights?: TrafficLightServiceOptions;
  clockNow?: () => Date;
  pauseLightsOnPause?: boolean;
}

const nextId = (entities: ReadonlyArray<{ id: number }>) =>
  entities.reduce((highest, entity) => Math.max(highest, entity.id), 0) + 1;

/**
 * Wires the coordinator, the light service and the clock around one world, and
 * carries the operations a shell needs on top of them: entity management that
 * keeps light tasks in step with intersections, combined pause/resume, demo
 * loading and shutdown.
 */
export class SimulationRuntime {
  readonly world: WorldState;
  readonly simulation: SimulationService;
  readonly lights: TrafficLightService;
  readonly clock: ClockService;
  private readonly pauseLightsOnPause: boolean;

  constructor(options: SimulationRuntimeOptions = {}) {
    this.world = options.world ?? new WorldState();
    this.simulation = new SimulationService(this.world, options.simulation);
    this.lights = new TrafficLightService(this.world, options.lights);
    this.clock = new ClockService(options.clockNow);
    this.pauseLightsOnPause = options.pauseLightsOnPause ?? shellConfig.pauseLightsOnPause;
  }

  /** Ids default to one above the highest id currently on the road. */
  nextCarId(): number {
    return this.world.read(({ cars }) => nextId(cars));
  }

  nextIntersectionId(): number {
    return this.world.read(({ intersections }) => nextId(intersections));
  }

  addCar(input: WithOptionalId<CarInput>): Car {
    const car = this.world.addCar({ ...input, id: input.id ?? this.nextCarId() });
    log.info("Car added", { car });
    return car;
  }

  addIntersection(input: WithOptionalId<IntersectionInput>): Intersection {
    const intersection = this.world.addIntersection({ ...input, id: input.id ?? this.nextIntersectionId() });
    if (this.lights.isRunning()) {
      this.lights.startLight(intersection.id);
    }
    log.info("Intersection added", { intersection });
    return intersection;
  }

  removeCar(id: number): void {
    this.world.removeCar(id);
    log.info("Car removed", { id });
  }

  removeIntersection(id: number): void {
    this.world.removeIntersection(id);
    this.lights.stopLight(id);
    log.info("Intersection removed", { id });
  }

  updateIntersectionTiming(id: number, durations: Partial<PhaseDurations>): Intersection {
    return this.world.updateIntersectionTiming(id, durations);
  }

  /** Starts the light service and a cycle for every intersection already on the road. */
  startLights(): void {
    this.lights.start();
    const ids = this.world.read(({ intersections }) => intersections.map((intersection) => intersection.id));
    ids.forEach((id) => this.lights.startLight(id));
  }

  async stopLights(): Promise<void> {
    await this.lights.stop();
  }

  pauseAll(options: { pauseLights?: boolean } = {}): void {
    this.simulation.pause();
    if (options.pauseLights ?? this.pauseLightsOnPause) {
      this.lights.pause();
    }
  }

  resumeAll(): void {
    this.simulation.resume();
    this.lights.resume();
  }

  /** Cars stop moving; lights keep cycling so their behaviour stays observable. */
  stopSimulation(): void {
    this.simulation.stop();
  }

  loadScenario(scenario: Scenario): void {
    const previous = this.world.read(({ intersections }) => intersections.map((intersection) => intersection.id));
    previous.forEach((id) => this.lights.stopLight(id));

    this.world.clear();
    scenario.intersections.forEach((intersection) => this.world.addIntersection(intersection));
    scenario.cars.forEach((car) => this.world.addCar(car));

    if (this.lights.isRunning()) {
      scenario.intersections.forEach((intersection) => this.lights.startLight(intersection.id));
    }
    log.info("Scenario loaded", {
      intersections: scenario.intersections.length,
      cars: scenario.cars.length,
    });
  }

  loadDemoScenario(seed: number = shellConfig.scenarioSeed): Scenario {
    const scenario = buildDemoScenario(seed);
    this.loadScenario(scenario);
    return scenario;
  }

  getStateView(): SimulationStateView {
    return {
      status: this.simulation.getStatus(),
      lights: this.lights.getStatus(),
      clock: this.clock.getCurrentTime(),
      world: this.simulation.snapshot(),
    };
  }

  async shutdown(): Promise<void> {
    this.simulation.stop();
    this.clock.stop();
    await this.lights.stop();
    log.info("Runtime shut down");
  }
}
