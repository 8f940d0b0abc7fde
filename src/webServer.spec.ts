import { afterEach, beforeEach, expect, it, vi } from "vitest";
import { createE2ETestContext, type E2ETestContext } from "./e2e/testHelpers.js";

let ctx: E2ETestContext;

beforeEach(() => {
  ctx = createE2ETestContext();
});

afterEach(async () => {
  vi.restoreAllMocks();
  await ctx.cleanup();
});

it("responds to health checks", async () => {
  const response = await ctx.server.getApp().inject({ method: "GET", url: "/health" });

  expect(response.statusCode).toBe(200);
  expect(response.json()).toMatchObject({ status: "ok" });
});

it("reports readiness", async () => {
  ctx.simulator.create("flash_drive", "basic", "usb");

  const response = await ctx.server.getApp().inject({ method: "GET", url: "/api/status" });

  expect(response.statusCode).toBe(200);
  expect(response.json()).toEqual({
    status: "ok",
    aiAvailable: false,
    wordsLoaded: 3,
    samplesLoaded: 2,
    devices: 1,
    attacksRun: 0,
  });
});

it("returns 404 for unknown routes", async () => {
  const response = await ctx.server.getApp().inject({ method: "GET", url: "/nope" });

  expect(response.statusCode).toBe(404);
});

it("returns 400 for malformed JSON", async () => {
  const response = await ctx.server.getApp().inject({
    method: "POST",
    url: "/api/validate-hash",
    headers: { "content-type": "application/json" },
    payload: "{not json",
  });

  expect(response.statusCode).toBe(400);
});

it("hides details of unexpected errors", async () => {
  vi.spyOn(ctx.orchestrator, "statistics").mockImplementation(() => {
    throw new Error("database exploded");
  });

  const response = await ctx.server.getApp().inject({ method: "GET", url: "/api/attack/statistics" });

  expect(response.statusCode).toBe(500);
  expect(response.json()).toEqual({ error: "Internal server error" });
});
