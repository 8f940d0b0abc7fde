import { beforeEach, expect, it } from "vitest";
import { log } from "./logger.js";
import { RateLimiter } from "./rateLimiter.js";

let limiter: RateLimiter;

beforeEach(() => {
  limiter = new RateLimiter(10, 60, log);
});

it("allows requests when under limit", () => {
  const result = limiter.consume("client1");

  expect(result.allowed).toBe(true);
  expect(result.remainingTokens).toBe(9);
});

it("tracks remaining tokens correctly", () => {
  limiter.consume("client1", new Date(0));
  limiter.consume("client1", new Date(0));
  const result = limiter.consume("client1", new Date(0));

  expect(result.allowed).toBe(true);
  expect(result.remainingTokens).toBe(7);
});

it("blocks requests when limit exceeded", () => {
  for (let i = 0; i < 10; i++) {
    limiter.consume("client1", new Date(0));
  }
  const result = limiter.consume("client1", new Date(0));

  expect(result.allowed).toBe(false);
  expect(result.remainingTokens).toBe(0);
});

it("tracks different clients separately", () => {
  for (let i = 0; i < 10; i++) {
    limiter.consume("client1", new Date(0));
  }
  const result = limiter.consume("client2", new Date(0));

  expect(result.allowed).toBe(true);
  expect(result.remainingTokens).toBe(9);
});

it("refills tokens over time", () => {
  limiter = new RateLimiter(10, 1, log);

  for (let i = 0; i < 10; i++) {
    limiter.consume("client1", new Date(0));
  }

  let result = limiter.consume("client1", new Date(0));
  expect(result.allowed).toBe(false);

  result = limiter.consume("client1", new Date(150));
  expect(result.allowed).toBe(true);
});

it("reports when the next token is available after a refusal", () => {
  limiter = new RateLimiter(2, 2, log);

  limiter.consume("client1", new Date(0));
  limiter.consume("client1", new Date(0));
  const result = limiter.consume("client1", new Date(0));

  expect(result.allowed).toBe(false);
  expect(result.resetAt.getTime()).toBe(1000);
});

it("caps tokens at maximum", () => {
  limiter = new RateLimiter(5, 1, log);

  limiter.consume("client1", new Date(0));

  const state = limiter.getState("client1", new Date(2000));
  expect(state.remainingTokens).toBe(5);
});

it("reports full capacity for unknown clients without creating them", () => {
  const state = limiter.getState("unknown", new Date(0));

  expect(state.allowed).toBe(true);
  expect(state.remainingTokens).toBe(10);
  expect(limiter.consume("unknown", new Date(0)).remainingTokens).toBe(9);
});

it("forgets every client on clear", () => {
  for (let i = 0; i < 10; i++) {
    limiter.consume("client1", new Date(0));
  }
  limiter.clear();

  const result = limiter.consume("client1", new Date(0));
  expect(result.allowed).toBe(true);
  expect(result.remainingTokens).toBe(9);
});
