/**
 * Rotation Warden — tests/lib/constants.test.ts
 * WHAT: Exit code helpers.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { EXIT_CONFIG_ERROR, SHUTDOWN_SIGNALS, signalExitCode } from "../../src/lib/constants.js";

describe("exit codes", () => {
  it("uses 128 + signal number on shutdown", () => {
    expect(signalExitCode("SIGINT")).toBe(130);
    expect(signalExitCode("SIGTERM")).toBe(143);
  });

  it("handles both shutdown signals", () => {
    expect(SHUTDOWN_SIGNALS).toEqual(["SIGINT", "SIGTERM"]);
  });

  it("uses EX_CONFIG for configuration errors", () => {
    expect(EXIT_CONFIG_ERROR).toBe(78);
  });
});
