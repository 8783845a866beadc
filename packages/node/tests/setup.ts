/**
 * Test helpers for @swapledger/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

export const TEST_TIME = "2024-03-01T12:00:00.000Z";

/**
 * Create a test app in open mode with a fixed clock.
 */
export function createTestApp(options: CreateAppOptions = {}): AppInstance {
  return createApp({ ledger: { clock: () => TEST_TIME }, ...options });
}

/**
 * Headers naming the caller in open mode.
 */
export function as(principal: string): Record<string, string> {
  return { "X-Principal": principal };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

export interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}
