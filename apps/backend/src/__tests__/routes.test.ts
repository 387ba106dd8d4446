import type { Server } from "node:http";
import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { buildApp } from "../app";
import { SimulationRuntime } from "../services/simulationRuntime";

describe("HTTP routes", () => {
  let runtime: SimulationRuntime;
  let server: Server;
  let baseUrl = "";

  const request = async (method: string, path: string, body?: unknown) => {
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await response.text();
    return { status: response.status, body: text ? JSON.parse(text) : undefined };
  };

  beforeAll(async () => {
    runtime = new SimulationRuntime({ pauseLightsOnPause: true });
    const app = buildApp(runtime);
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Expected a TCP address");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await runtime.shutdown();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  it("answers the health check", async () => {
    const { status, body } = await request("GET", "/health");
    expect(status).toBe(200);
    expect(body).toEqual({ status: "ok" });
  });

  it("adds a car and rejects bad or duplicate input", async () => {
    const missing = await request("POST", "/api/simulation/cars", { speedMps: 5 });
    expect(missing).toEqual({ status: 400, body: { error: "x must be a number" } });

    const hex = await request("POST", "/api/simulation/cars", { x: "0x10", speedMps: 5 });
    expect(hex).toEqual({ status: 400, body: { error: "x must be a number" } });

    const exponent = await request("POST", "/api/simulation/intersections", {
      x: 100,
      greenSeconds: "1e3",
      yellowSeconds: 2,
      redSeconds: 12,
    });
    expect(exponent).toEqual({ status: 400, body: { error: "greenSeconds must be a positive number" } });

    const negative = await request("POST", "/api/simulation/cars", { x: 1, speedMps: -2 });
    expect(negative).toEqual({ status: 400, body: { error: "speedMps must be a non-negative number" } });

    const created = await request("POST", "/api/simulation/cars", { id: 40, x: "12.5", speedMps: 8 });
    expect(created).toEqual({
      status: 201,
      body: { id: 40, x: 12.5, y: 0, speedMps: 8, targetIndex: 0 },
    });

    const duplicate = await request("POST", "/api/simulation/cars", { id: 40, x: 0, speedMps: 1 });
    expect(duplicate).toEqual({ status: 409, body: { error: "A car with id 40 already exists" } });
  });

  it("removes cars and reports unknown ones", async () => {
    await request("POST", "/api/simulation/cars", { id: 41, x: 0, speedMps: 1 });

    expect((await request("DELETE", "/api/simulation/cars/41")).status).toBe(204);
    expect(await request("DELETE", "/api/simulation/cars/41")).toEqual({
      status: 404,
      body: { error: "No car with id 41" },
    });
    expect(await request("DELETE", "/api/simulation/cars/abc")).toEqual({
      status: 400,
      body: { error: "id must be an integer" },
    });
  });

  it("creates intersections from durations in seconds", async () => {
    const created = await request("POST", "/api/simulation/intersections", {
      id: 50,
      x: 300,
      greenSeconds: 10,
      yellowSeconds: 2,
      redSeconds: 12,
    });
    expect(created).toEqual({
      status: 201,
      body: { id: 50, x: 300, color: "RED", greenMs: 10_000, yellowMs: 2_000, redMs: 12_000 },
    });

    const incomplete = await request("POST", "/api/simulation/intersections", {
      x: 400,
      greenSeconds: 10,
      yellowSeconds: 2,
    });
    expect(incomplete).toEqual({ status: 400, body: { error: "redSeconds must be a positive number" } });

    const updated = await request("PATCH", "/api/simulation/intersections/50", { yellowSeconds: 3 });
    expect(updated.status).toBe(200);
    expect(updated.body).toMatchObject({ id: 50, greenMs: 10_000, yellowMs: 3_000, redMs: 12_000 });

    expect(await request("PATCH", "/api/simulation/intersections/999", { greenSeconds: 1 })).toEqual({
      status: 404,
      body: { error: "No intersection with id 999" },
    });
    expect((await request("DELETE", "/api/simulation/intersections/50")).status).toBe(204);
  });

  it("drives the simulation lifecycle", async () => {
    expect((await request("POST", "/api/simulation/start")).body).toMatchObject({
      state: "running",
      running: true,
      paused: false,
    });

    const badPause = await request("POST", "/api/simulation/pause", { pauseLights: "yes" });
    expect(badPause).toEqual({ status: 400, body: { error: "pauseLights must be a boolean" } });

    expect((await request("POST", "/api/simulation/pause", {})).body).toMatchObject({ state: "paused", paused: true });
    expect((await request("POST", "/api/simulation/resume")).body).toMatchObject({ state: "running", paused: false });
    expect((await request("POST", "/api/simulation/stop")).body).toMatchObject({
      state: "stopped",
      running: false,
      paused: false,
    });
  });

  it("loads the demo and serves the combined state", async () => {
    const demo = await request("POST", "/api/simulation/scenario/demo", { seed: 42 });
    expect(demo.status).toBe(200);
    expect(demo.body.intersections).toHaveLength(3);

    const { status, body } = await request("GET", "/api/simulation/state");
    expect(status).toBe(200);
    expect(body.world.intersections.map((intersection: { id: number }) => intersection.id)).toEqual([1, 2, 3]);
    expect(body.world.cars).toHaveLength(3);
    expect(body.lights).toEqual({ running: false, paused: false, activeIntersectionIds: [] });
    expect(typeof body.clock).toBe("string");
  });

  it("starts and stops the traffic lights", async () => {
    await request("POST", "/api/simulation/scenario/demo", { seed: 42 });

    expect((await request("POST", "/api/lights/start")).body).toEqual({
      running: true,
      paused: false,
      activeIntersectionIds: [1, 2, 3],
    });
    expect((await request("POST", "/api/lights/pause")).body).toMatchObject({ paused: true });
    expect((await request("POST", "/api/lights/resume")).body).toMatchObject({ paused: false });
    expect((await request("POST", "/api/lights/stop")).body).toEqual({
      running: false,
      paused: false,
      activeIntersectionIds: [],
    });
  });

  it("reports the wall clock", async () => {
    const { status, body } = await request("GET", "/api/clock");
    expect(status).toBe(200);
    expect(body.running).toBe(false);
    expect(body.time).toMatch(/^\d{2}:\d{2}:\d{2}$/);
  });
});
