import type {
  Car,
  CarInput,
  Intersection,
  IntersectionInput,
  PhaseDurations,
  WorldSnapshot,
} from "../models/simulation";
import { DuplicateEntityError, EntityNotFoundError, InvalidEntityError } from "../models/errors";

export interface MutableWorld {
  readonly intersections: Intersection[];
  readonly cars: Car[];
}

export interface ReadonlyWorld {
  readonly intersections: ReadonlyArray<Readonly<Intersection>>;
  readonly cars: ReadonlyArray<Readonly<Car>>;
}

const isThenable = (value: unknown): value is PromiseLike<unknown> =>
  typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";

const assertSynchronous = (result: unknown) => {
  if (isThenable(result)) {
    throw new Error("World state write sections must be synchronous");
  }
};

const copyIntersection = (intersection: Intersection): Intersection => ({ ...intersection });
const copyCar = (car: Car): Car => ({ ...car });

const assertFinite = (label: string, value: number) => {
  if (!Number.isFinite(value)) {
    throw new InvalidEntityError(`${label} must be a finite number`);
  }
};

const assertId = (id: number) => {
  if (!Number.isInteger(id)) {
    throw new InvalidEntityError("id must be an integer");
  }
};

const assertDurations = (durations: PhaseDurations) => {
  const entries: Array<[string, number]> = [
    ["greenMs", durations.greenMs],
    ["yellowMs", durations.yellowMs],
    ["redMs", durations.redMs],
  ];
  entries.forEach(([label, value]) => {
    assertFinite(label, value);
    if (value <= 0) {
      throw new InvalidEntityError(`${label} must be strictly positive`);
    }
  });
};

/**
 * Shared model of the road: intersections and cars.
 *
 * Every mutation goes through {@link WorldState.write}, and every consistent read
 * through {@link WorldState.snapshot} or {@link WorldState.read}. Callbacks run
 * synchronously on the event loop, so a write section always completes before
 * another writer or any reader gets to run. The physics stepper and the light
 * tasks share this single path; there is no second way to touch the entities.
 */
export class WorldState {
  private readonly intersections: Intersection[] = [];
  private readonly cars: Car[] = [];
  private version = 0;
  private writing = false;

  constructor(private readonly now: () => number = () => Date.now()) {}

  /**
   * Runs `mutate` as one exclusive write section. The callback must be
   * synchronous: one that returns a promise throws and leaves the version
   * unchanged. Nested writes join the enclosing section.
   */
  write<T>(mutate: (world: MutableWorld) => T): T {
    const world: MutableWorld = { intersections: this.intersections, cars: this.cars };
    if (this.writing) {
      const nested = mutate(world);
      assertSynchronous(nested);
      return nested;
    }
    this.writing = true;
    try {
      const result = mutate(world);
      assertSynchronous(result);
      this.version += 1;
      return result;
    } finally {
      this.writing = false;
    }
  }

  read<T>(query: (world: ReadonlyWorld) => T): T {
    this.assertNotWriting();
    return query({ intersections: this.intersections, cars: this.cars });
  }

  snapshot(): WorldSnapshot {
    this.assertNotWriting();
    return {
      version: this.version,
      takenAt: this.now(),
      intersections: this.intersections.map(copyIntersection),
      cars: this.cars.map(copyCar),
    };
  }

  getVersion(): number {
    return this.version;
  }

  addCar(input: CarInput): Car {
    assertId(input.id);
    assertFinite("x", input.x);
    assertFinite("speedMps", input.speedMps);
    if (input.speedMps < 0) {
      throw new InvalidEntityError("speedMps must not be negative");
    }

    return this.write(({ cars }) => {
      if (cars.some((car) => car.id === input.id)) {
        throw new DuplicateEntityError("car", input.id);
      }
      const car: Car = { id: input.id, x: input.x, y: 0, speedMps: input.speedMps, targetIndex: 0 };
      cars.push(car);
      return copyCar(car);
    });
  }

  /** Inserts after every intersection whose position is not greater, keeping the list sorted by x. */
  addIntersection(input: IntersectionInput): Intersection {
    assertId(input.id);
    assertFinite("x", input.x);
    assertDurations(input);

    return this.write(({ intersections }) => {
      if (intersections.some((intersection) => intersection.id === input.id)) {
        throw new DuplicateEntityError("intersection", input.id);
      }
      const intersection: Intersection = {
        id: input.id,
        x: input.x,
        color: "RED",
        greenMs: input.greenMs,
        yellowMs: input.yellowMs,
        redMs: input.redMs,
      };
      const insertAt = intersections.findIndex((existing) => existing.x > input.x);
      if (insertAt < 0) {
        intersections.push(intersection);
      } else {
        intersections.splice(insertAt, 0, intersection);
      }
      return copyIntersection(intersection);
    });
  }

  removeCar(id: number): void {
    this.write(({ cars }) => {
      const index = cars.findIndex((car) => car.id === id);
      if (index < 0) {
        throw new EntityNotFoundError("car", id);
      }
      cars.splice(index, 1);
    });
  }

  removeIntersection(id: number): void {
    this.write(({ intersections }) => {
      const index = intersections.findIndex((intersection) => intersection.id === id);
      if (index < 0) {
        throw new EntityNotFoundError("intersection", id);
      }
      intersections.splice(index, 1);
    });
  }

  updateIntersectionTiming(id: number, durations: Partial<PhaseDurations>): Intersection {
    return this.write(({ intersections }) => {
      const intersection = intersections.find((candidate) => candidate.id === id);
      if (!intersection) {
        throw new EntityNotFoundError("intersection", id);
      }
      const next: PhaseDurations = {
        greenMs: durations.greenMs ?? intersection.greenMs,
        yellowMs: durations.yellowMs ?? intersection.yellowMs,
        redMs: durations.redMs ?? intersection.redMs,
      };
      assertDurations(next);
      Object.assign(intersection, next);
      return copyIntersection(intersection);
    });
  }

  clear(): void {
    this.write(({ intersections, cars }) => {
      intersections.splice(0, intersections.length);
      cars.splice(0, cars.length);
    });
  }

  private assertNotWriting() {
    if (this.writing) {
      throw new Error("World state cannot be read from inside a write section");
    }
  }
}
