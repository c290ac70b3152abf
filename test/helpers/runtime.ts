import { vi } from "vitest";
import type { RuntimeEnv } from "../../src/runtime.js";

export function createTestRuntime() {
  const log = vi.fn();
  const error = vi.fn();
  const exit = vi.fn<(code: number) => never>();
  const runtime: RuntimeEnv = { log, error, exit };
  return { runtime, log, error, exit };
}
