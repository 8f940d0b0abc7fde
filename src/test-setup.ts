/**
 * Test setup configuration for test environment.
 */
import { setMaxListeners } from "node:events";
import { vi } from "vitest";

/**
 * Tests create many Fastify instances, each of which may add process listeners.
 */
setMaxListeners(0, process);

/**
 * Mock fetch globally to prevent network requests in tests.
 * Individual tests can override this mock with vi.mocked(fetch).mockResolvedValue(...).
 */
vi.stubGlobal(
  "fetch",
  vi.fn(() => Promise.reject(new Error("Network requests not allowed in tests"))),
);
