/**
 * Rotation Warden — tests/scheduler/rotationEnforcer.test.ts
 * WHAT: Unit tests for the enforcement loop.
 * WHY: Verify tick outcomes, no-overlap, timeouts, scheduling and shutdown.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const { mockLogger } = vi.hoisted(() => ({
  mockLogger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn() },
}));

vi.mock("../../src/lib/logger.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../../src/lib/logger.js")>()),
  logger: mockLogger,
}));

import {
  RotationEnforcer,
  type RotationEnforcerOptions,
  type SelectionEnforcer,
} from "../../src/scheduler/rotationEnforcer.js";
import { FallbackChannelError } from "../../src/lib/errors.js";
import { _resetTickHealth, getTickHealth } from "../../src/lib/tickHealth.js";
import type { ActiveSelection, EnforcementResult } from "../../src/features/rotation/types.js";
import { buildDocument } from "../utils/scheduleFixtures.js";

// Monday of cycle week 0, peak block → rotation_A, ["a_peak_1"]
const MONDAY_PEAK = new Date("2025-01-06T15:00:00Z");

const UPDATED: EnforcementResult = {
  channel: "primary",
  live: ["b_peak_1"],
  removed: ["b_peak_1"],
  added: ["a_peak_1"],
  noop: false,
};

type EnforceFn = (selection: ActiveSelection, signal?: AbortSignal) => Promise<EnforcementResult>;

function fakeReconciler(impl: EnforceFn = async () => UPDATED) {
  const enforce = vi.fn(impl);
  const reconciler: SelectionEnforcer = { enforce };
  return { reconciler, enforce };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

function buildEnforcer(reconciler: SelectionEnforcer, overrides: Partial<RotationEnforcerOptions> = {}) {
  return new RotationEnforcer({
    document: buildDocument(),
    resolveOptions: { timeZone: "UTC" },
    reconciler,
    intervalMs: 60_000,
    tickTimeoutMs: 10_000,
    alignToTransitions: false,
    clock: () => MONDAY_PEAK,
    ...overrides,
  });
}

describe("RotationEnforcer", () => {
  let enforcer: RotationEnforcer | undefined;

  beforeEach(() => {
    vi.useFakeTimers();
    _resetTickHealth();
  });

  afterEach(async () => {
    await enforcer?.stop();
    enforcer = undefined;
  });

  describe("runTick", () => {
    it("resolves the active block and hands it to the reconciler", async () => {
      const { reconciler, enforce } = fakeReconciler();
      enforcer = buildEnforcer(reconciler);

      const outcome = await enforcer.runTick();

      expect(outcome.ok).toBe(true);
      expect(outcome.selection).toEqual({
        rotationName: "rotation_A",
        weekInCycle: 0,
        weekday: "monday",
        blockName: "peak",
        desiredMaps: ["a_peak_1"],
      });
      expect(enforce).toHaveBeenCalledWith(outcome.selection, expect.any(AbortSignal));
      expect(mockLogger.info).toHaveBeenCalledWith(
        { rotation: "rotation_A", weekday: "monday", block: "peak", channel: "primary", removed: 1, added: 1 },
        "[enforcer] tick complete, rotation enforced"
      );
      expect(getTickHealth()).toMatchObject({ totalRuns: 1, consecutiveFailures: 0, lastChannel: "primary" });
    });

    it("logs an already-correct rotation at debug", async () => {
      const { reconciler } = fakeReconciler(async () => ({ ...UPDATED, removed: [], added: [], noop: true }));
      enforcer = buildEnforcer(reconciler);

      await enforcer.runTick();

      expect(mockLogger.info).not.toHaveBeenCalled();
      expect(mockLogger.debug).toHaveBeenCalledWith(
        expect.objectContaining({ removed: 0, added: 0 }),
        "[enforcer] tick complete, rotation already in place"
      );
      expect(getTickHealth().noopRuns).toBe(1);
    });

    it("reports a fallback failure without throwing", async () => {
      const failure = new FallbackChannelError("connect", "Could not connect to 127.0.0.1:7779");
      const { reconciler } = fakeReconciler(() => Promise.reject(failure));
      enforcer = buildEnforcer(reconciler);

      const outcome = await enforcer.runTick();

      expect(outcome).toMatchObject({ ok: false, error: { kind: "fallback_channel", operation: "connect" } });
      expect(mockLogger.error).toHaveBeenCalledWith(
        expect.objectContaining({ err: failure, errorKind: "fallback_channel", rotation: "rotation_A", block: "peak" }),
        "[enforcer] tick failed"
      );
      expect(getTickHealth()).toMatchObject({ consecutiveFailures: 1, lastErrorKind: "fallback_channel" });
    });

    it("skips the reconciler when the schedule has no entry, logging at warn", async () => {
      const { reconciler, enforce } = fakeReconciler();
      enforcer = buildEnforcer(reconciler, {
        document: buildDocument({
          rotationOrder: ["rotation_A"],
          rotations: { rotation_A: { monday: { off_peak: ["a_off_1"] } } },
        }),
      });

      const outcome = await enforcer.runTick();

      expect(outcome).toMatchObject({ ok: false, error: { kind: "schedule", code: "SCHEDULE_LOOKUP_MISS" } });
      expect(outcome.selection).toBeUndefined();
      expect(enforce).not.toHaveBeenCalled();
      expect(mockLogger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ errorKind: "schedule", resolutionCode: "SCHEDULE_LOOKUP_MISS" }),
        "[enforcer] tick failed"
      );
    });

    it("never runs two ticks at once", async () => {
      const gate = deferred<EnforcementResult>();
      const { reconciler, enforce } = fakeReconciler(() => gate.promise);
      enforcer = buildEnforcer(reconciler);

      const first = enforcer.runTick();
      const second = enforcer.runTick();
      expect(second).toBe(first);

      gate.resolve(UPDATED);
      await first;
      expect(enforce).toHaveBeenCalledTimes(1);

      await enforcer.runTick();
      expect(enforce).toHaveBeenCalledTimes(2);
    });

    it("aborts a tick that runs past its timeout", async () => {
      let seen: AbortSignal | undefined;
      const { reconciler } = fakeReconciler(
        (_selection, signal) =>
          new Promise((_resolve, reject) => {
            seen = signal;
            signal?.addEventListener("abort", () => {
              const err = new Error("enforcement cancelled");
              err.name = "AbortError";
              reject(err);
            });
          })
      );
      enforcer = buildEnforcer(reconciler, { tickTimeoutMs: 1000 });

      const pending = enforcer.runTick();
      await vi.advanceTimersByTimeAsync(1000);
      const outcome = await pending;

      expect(seen?.aborted).toBe(true);
      expect(outcome).toMatchObject({
        ok: false,
        error: { kind: "unknown", message: "enforcement tick exceeded 1000ms" },
      });
      expect(mockLogger.error).toHaveBeenCalledWith(
        expect.objectContaining({ errorKind: "unknown" }),
        "[enforcer] tick failed"
      );
    });
  });

  describe("start/stop", () => {
    it("ticks immediately, then once per interval", async () => {
      const { reconciler, enforce } = fakeReconciler();
      enforcer = buildEnforcer(reconciler);

      enforcer.start();
      expect(enforcer.isRunning).toBe(true);
      await vi.advanceTimersByTimeAsync(0);
      expect(enforce).toHaveBeenCalledTimes(1);
      expect(mockLogger.debug).toHaveBeenCalledWith({ nextTickInSeconds: 60 }, "[enforcer] next tick scheduled");

      await vi.advanceTimersByTimeAsync(59_999);
      expect(enforce).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(enforce).toHaveBeenCalledTimes(2);
    });

    it("keeps ticking after a failed tick", async () => {
      const { reconciler, enforce } = fakeReconciler(() => Promise.reject(new Error("boom")));
      enforcer = buildEnforcer(reconciler);

      enforcer.start();
      await vi.advanceTimersByTimeAsync(60_000);

      expect(enforce).toHaveBeenCalledTimes(2);
      expect(getTickHealth().consecutiveFailures).toBe(2);
    });

    it("stops scheduling after stop()", async () => {
      const { reconciler, enforce } = fakeReconciler();
      enforcer = buildEnforcer(reconciler);

      enforcer.start();
      await vi.advanceTimersByTimeAsync(0);
      await enforcer.stop();
      await vi.advanceTimersByTimeAsync(120_000);

      expect(enforce).toHaveBeenCalledTimes(1);
      expect(enforcer.isRunning).toBe(false);
      expect(mockLogger.info).toHaveBeenCalledWith("[enforcer] stopped");
    });

    it("aborts and waits for the in-flight tick on stop()", async () => {
      const gate = deferred<EnforcementResult>();
      let seen: AbortSignal | undefined;
      const { reconciler } = fakeReconciler((_selection, signal) => {
        seen = signal;
        return gate.promise;
      });
      enforcer = buildEnforcer(reconciler);

      enforcer.start();
      await vi.advanceTimersByTimeAsync(0);

      let stopped = false;
      const stopping = enforcer.stop().then(() => {
        stopped = true;
      });
      expect(seen?.aborted).toBe(true);
      await vi.advanceTimersByTimeAsync(0);
      expect(stopped).toBe(false);

      gate.resolve(UPDATED);
      await stopping;
      expect(stopped).toBe(true);
    });

    it("stops when the external signal fires", async () => {
      const { reconciler, enforce } = fakeReconciler();
      enforcer = buildEnforcer(reconciler);
      const controller = new AbortController();

      enforcer.start(controller.signal);
      await vi.advanceTimersByTimeAsync(0);
      controller.abort();
      await vi.advanceTimersByTimeAsync(60_000);

      expect(enforcer.isRunning).toBe(false);
      expect(enforce).toHaveBeenCalledTimes(1);
    });

    it("never starts with an already-aborted signal", async () => {
      const { reconciler, enforce } = fakeReconciler();
      enforcer = buildEnforcer(reconciler);
      const controller = new AbortController();
      controller.abort();

      enforcer.start(controller.signal);
      await vi.advanceTimersByTimeAsync(60_000);

      expect(enforcer.isRunning).toBe(false);
      expect(enforce).not.toHaveBeenCalled();
    });
  });

  describe("nextDelayMs", () => {
    const { reconciler } = fakeReconciler();

    it("uses the plain interval when alignment is off", () => {
      enforcer = buildEnforcer(reconciler, { intervalMs: 300_000 });
      expect(enforcer.nextDelayMs(new Date("2025-01-06T14:30:45.500Z"))).toBe(300_000);
    });

    it("wakes just after the next block starts", () => {
      enforcer = buildEnforcer(reconciler, { intervalMs: 300_000, alignToTransitions: true });
      // peak starts 14:31:00; 14.5s away, plus a second of grace
      expect(enforcer.nextDelayMs(new Date("2025-01-06T14:30:45.500Z"))).toBe(15_500);
    });

    it("caps the wait at the interval", () => {
      enforcer = buildEnforcer(reconciler, { intervalMs: 300_000, alignToTransitions: true });
      expect(enforcer.nextDelayMs(new Date("2025-01-06T15:00:00Z"))).toBe(300_000);
    });
  });
});
