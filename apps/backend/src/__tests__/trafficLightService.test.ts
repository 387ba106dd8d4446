import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { TrafficLightService } from "../services/trafficLightService";
import { WorldState } from "../services/worldState";
import type { LightColor } from "../models/simulation";

const flushMicrotasks = async () => {
  for (let i = 0; i < 10; i += 1) {
    await Promise.resolve();
  }
};

describe("TrafficLightService", () => {
  let world: WorldState;
  let lights: TrafficLightService;

  const colorOf = (id: number) => world.snapshot().intersections.find((intersection) => intersection.id === id)?.color;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    world = new WorldState();
    world.addIntersection({ id: 1, x: 200, greenMs: 10_000, yellowMs: 2_000, redMs: 12_000 });
    lights = new TrafficLightService(world);
  });

  afterEach(async () => {
    const stopping = lights.stop();
    await vi.advanceTimersByTimeAsync(200);
    await stopping;
    vi.useRealTimers();
  });

  it("does not cycle anything until the service is started", () => {
    expect(lights.startLight(1)).toBe(false);
    expect(lights.activeLights()).toEqual([]);
    expect(colorOf(1)).toBe("RED");
  });

  it("enters green immediately and runs one task per intersection", () => {
    lights.start();
    expect(lights.startLight(1)).toBe(true);
    expect(lights.startLight(1)).toBe(false);

    expect(colorOf(1)).toBe("GREEN");
    expect(lights.activeLights()).toEqual([1]);
  });

  it("cycles green, yellow, red on the configured durations", async () => {
    lights.start();
    lights.startLight(1);

    await vi.advanceTimersByTimeAsync(9_950);
    expect(colorOf(1)).toBe("GREEN");
    await vi.advanceTimersByTimeAsync(100);
    expect(colorOf(1)).toBe("YELLOW");
    await vi.advanceTimersByTimeAsync(1_900);
    expect(colorOf(1)).toBe("YELLOW");
    await vi.advanceTimersByTimeAsync(100);
    expect(colorOf(1)).toBe("RED");
    await vi.advanceTimersByTimeAsync(11_900);
    expect(colorOf(1)).toBe("RED");
    await vi.advanceTimersByTimeAsync(100);
    expect(colorOf(1)).toBe("GREEN");
  });

  it("spends time in each color in proportion to its duration", async () => {
    lights.start();
    lights.startLight(1);
    const samples: Record<LightColor, number> = { GREEN: 0, YELLOW: 0, RED: 0 };

    await vi.advanceTimersByTimeAsync(50);
    for (let sample = 0; sample < 240; sample += 1) {
      const color = colorOf(1);
      if (color) {
        samples[color] += 1;
      }
      await vi.advanceTimersByTimeAsync(100);
    }

    expect(samples).toEqual({ GREEN: 100, YELLOW: 20, RED: 120 });
  });

  it("holds the remaining phase time while paused", async () => {
    lights.start();
    lights.startLight(1);
    await vi.advanceTimersByTimeAsync(5_000);

    lights.pause();
    expect(lights.isPaused()).toBe(true);
    await vi.advanceTimersByTimeAsync(20_000);
    expect(colorOf(1)).toBe("GREEN");

    lights.resume();
    await vi.advanceTimersByTimeAsync(4_950);
    expect(colorOf(1)).toBe("GREEN");
    await vi.advanceTimersByTimeAsync(100);
    expect(colorOf(1)).toBe("YELLOW");
  });

  it("ignores pause and resume while stopped", () => {
    lights.pause();
    expect(lights.isPaused()).toBe(false);
    lights.start();
    lights.resume();
    expect(lights.isPaused()).toBe(false);
  });

  it("stops a single intersection at its next poll and leaves its color as it was", async () => {
    world.addIntersection({ id: 2, x: 500, greenMs: 1_000, yellowMs: 1_000, redMs: 1_000 });
    lights.start();
    lights.startLight(1);
    lights.startLight(2);

    expect(lights.stopLight(1)).toBe(true);
    expect(lights.stopLight(1)).toBe(false);
    expect(lights.activeLights()).toEqual([2]);

    await vi.advanceTimersByTimeAsync(30_000);
    expect(colorOf(1)).toBe("GREEN");
    expect(colorOf(2)).not.toBe(undefined);
    expect(lights.activeLights()).toEqual([2]);
  });

  it("can restart a light right after stopping it", async () => {
    lights.start();
    lights.startLight(1);
    await vi.advanceTimersByTimeAsync(10_050);
    expect(colorOf(1)).toBe("YELLOW");

    lights.stopLight(1);
    expect(lights.startLight(1)).toBe(true);
    expect(colorOf(1)).toBe("GREEN");

    await vi.advanceTimersByTimeAsync(9_950);
    expect(colorOf(1)).toBe("GREEN");
    expect(lights.activeLights()).toEqual([1]);
  });

  it("applies new durations from the next phase entry", async () => {
    lights.start();
    lights.startLight(1);
    await vi.advanceTimersByTimeAsync(5_000);
    world.updateIntersectionTiming(1, { yellowMs: 500 });

    await vi.advanceTimersByTimeAsync(5_050);
    expect(colorOf(1)).toBe("YELLOW");
    await vi.advanceTimersByTimeAsync(500);
    expect(colorOf(1)).toBe("RED");
  });

  it("ends the task once its intersection is gone", async () => {
    lights.start();
    lights.startLight(1);
    world.removeIntersection(1);

    await vi.advanceTimersByTimeAsync(10_000);
    await flushMicrotasks();

    expect(lights.activeLights()).toEqual([]);
  });

  it("abandons tasks that outlive the shutdown bound", async () => {
    const slow = new TrafficLightService(world, { pollIntervalMs: 5_000, shutdownTimeoutMs: 100 });
    slow.start();
    slow.startLight(1);

    let stopped = false;
    const stopping = slow.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(99);
    expect(stopped).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await stopping;

    expect(Date.now()).toBe(100);
    expect(slow.isRunning()).toBe(false);
    expect(slow.activeLights()).toEqual([]);

    await vi.advanceTimersByTimeAsync(5_000);
    expect(colorOf(1)).toBe("GREEN");
  });

  it("stops every task and can be started again", async () => {
    lights.start();
    lights.startLight(1);

    const stopping = lights.stop();
    await vi.advanceTimersByTimeAsync(200);
    await stopping;

    expect(lights.isRunning()).toBe(false);
    expect(lights.activeLights()).toEqual([]);
    await vi.advanceTimersByTimeAsync(30_000);
    expect(colorOf(1)).toBe("GREEN");

    lights.start();
    expect(lights.startLight(1)).toBe(true);
  });
});
