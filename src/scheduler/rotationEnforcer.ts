/**
 * Rotation Warden — src/scheduler/rotationEnforcer.ts
 * WHAT: Periodic driver: resolve the active block, reconcile, repeat.
 * WHY: The server's rotation drifts (block changes, admins, restarts); enforcement
 *      has to keep happening forever and shrug off any single bad tick.
 * FLOWS:
 *  - start() → tick now → wait → tick → ...   (setTimeout chain, never setInterval)
 *  - tick: resolveActiveSelection → reconciler.enforce (with timeout) → log + tickHealth
 *  - stop() / external AbortSignal → no new ticks; in-flight tick aborted at its next
 *    safe boundary and awaited
 * DOCS:
 *  - setTimeout: https://nodejs.org/api/timers.html#settimeoutcallback-delay-args
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  classifyError,
  errorContext,
  tickFailureLevel,
  type ClassifiedError,
} from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { recordTickFailure, recordTickSuccess } from "../lib/tickHealth.js";
import { resolveActiveSelection } from "../features/rotation/resolver.js";
import { msUntilNextBlockStart } from "../features/rotation/timeBlocks.js";
import type {
  ActiveSelection,
  EnforcementResult,
  ResolveOptions,
  ScheduleDocument,
} from "../features/rotation/types.js";

// Wake a second after a block starts so the local clock is clearly inside it.
export const TRANSITION_GRACE_MS = 1000;

/** Anything that can reconcile a selection; RotationReconciler in production. */
export interface SelectionEnforcer {
  enforce(selection: ActiveSelection, signal?: AbortSignal): Promise<EnforcementResult>;
}

export interface RotationEnforcerOptions {
  document: ScheduleDocument;
  resolveOptions: ResolveOptions;
  reconciler: SelectionEnforcer;
  intervalMs: number;
  tickTimeoutMs: number;
  /** Shorten the wait so a tick lands right after each block start. Default true. */
  alignToTransitions?: boolean;
  /** Injected for tests. */
  clock?: () => Date;
}

export type TickOutcome =
  | { ok: true; selection: ActiveSelection; result: EnforcementResult }
  | { ok: false; error: ClassifiedError; selection?: ActiveSelection };

function tickTimeoutError(timeoutMs: number): Error {
  const err = new Error(`enforcement tick exceeded ${timeoutMs}ms`);
  err.name = "TickTimeoutError";
  return err;
}

export class RotationEnforcer {
  private readonly clock: () => Date;
  private readonly alignToTransitions: boolean;
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<TickOutcome> | null = null;
  private currentTick: AbortController | null = null;
  private detachSignal: (() => void) | null = null;

  constructor(private readonly options: RotationEnforcerOptions) {
    this.clock = options.clock ?? (() => new Date());
    this.alignToTransitions = options.alignToTransitions ?? true;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Start ticking, first tick immediately. An already-aborted signal means we
   * never start.
   *
   * The timer is not unref()'d; it keeps the process alive.
   */
  start(signal?: AbortSignal): void {
    if (this.running || signal?.aborted) return;
    this.running = true;

    if (signal) {
      const onAbort = () => {
        this.stop().catch((err: unknown) => {
          logger.error({ err }, "[enforcer] stop after abort signal failed");
        });
      };
      signal.addEventListener("abort", onAbort, { once: true });
      this.detachSignal = () => signal.removeEventListener("abort", onAbort);
    }

    logger.info(
      {
        intervalSeconds: this.options.intervalMs / 1000,
        tickTimeoutSeconds: this.options.tickTimeoutMs / 1000,
        alignToTransitions: this.alignToTransitions,
        timeZone: this.options.resolveOptions.timeZone,
      },
      "[enforcer] starting"
    );
    this.scheduleNext(0);
  }

  /**
   * Stop scheduling ticks. Resolves once the in-flight tick (if any) has settled.
   * Safe to call repeatedly.
   */
  async stop(): Promise<void> {
    const wasRunning = this.running;
    this.running = false;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.detachSignal?.();
    this.detachSignal = null;

    // Remote consoles have no cancel; the reconciler stops before its next command.
    this.currentTick?.abort();
    if (this.inFlight) {
      await this.inFlight;
    }

    if (wasRunning) {
      logger.info("[enforcer] stopped");
    }
  }

  /**
   * Delay before the next tick: the interval, or less when a block starts sooner.
   */
  nextDelayMs(now: Date = this.clock()): number {
    const { intervalMs } = this.options;
    if (!this.alignToTransitions) return intervalMs;
    const untilTransition = msUntilNextBlockStart(
      now,
      this.options.document.timeBlocks,
      this.options.resolveOptions.timeZone
    );
    return Math.min(intervalMs, untilTransition + TRANSITION_GRACE_MS);
  }

  /**
   * Run one tick. Never rejects. A call while another tick is in flight gets that
   * tick's outcome instead of starting a second one.
   */
  runTick(): Promise<TickOutcome> {
    if (this.inFlight) return this.inFlight;
    const tick = this.executeTick().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = tick;
    return tick;
  }

  private scheduleNext(delayMs: number): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runTick()
        .then(() => {
          if (!this.running) return;
          const delay = this.nextDelayMs();
          logger.debug({ nextTickInSeconds: Math.round(delay / 1000) }, "[enforcer] next tick scheduled");
          this.scheduleNext(delay);
        })
        .catch((err: unknown) => {
          // runTick handles its own errors; reaching this means a bug in the loop itself.
          logger.error({ err }, "[enforcer] tick scheduling failed");
          this.scheduleNext(this.options.intervalMs);
        });
    }, delayMs);
  }

  private async executeTick(): Promise<TickOutcome> {
    const controller = new AbortController();
    this.currentTick = controller;
    let selection: ActiveSelection | undefined;

    try {
      selection = resolveActiveSelection(this.clock(), this.options.document, this.options.resolveOptions);
      const result = await this.withTimeout(
        this.options.reconciler.enforce(selection, controller.signal),
        controller
      );

      recordTickSuccess(result);
      const fields = {
        rotation: selection.rotationName,
        weekday: selection.weekday,
        block: selection.blockName,
        channel: result.channel,
        removed: result.removed.length,
        added: result.added.length,
      };
      if (result.noop) {
        logger.debug(fields, "[enforcer] tick complete, rotation already in place");
      } else {
        logger.info(fields, "[enforcer] tick complete, rotation enforced");
      }
      return { ok: true, selection, result };
    } catch (err) {
      const classified = classifyError(err);
      recordTickFailure(classified.kind);
      logger[tickFailureLevel(classified)](
        {
          err,
          ...errorContext(classified, {
            rotation: selection?.rotationName,
            weekday: selection?.weekday,
            block: selection?.blockName,
          }),
        },
        "[enforcer] tick failed"
      );
      return { ok: false, error: classified, selection };
    } finally {
      if (this.currentTick === controller) {
        this.currentTick = null;
      }
    }
  }

  /**
   * Race the tick against its timeout. On expiry the tick is aborted and we wait
   * for it to reach a safe boundary before reporting, so ticks never overlap.
   */
  private async withTimeout<T>(work: Promise<T>, controller: AbortController): Promise<T> {
    const { tickTimeoutMs } = this.options;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject first so the race reports the timeout, not the abort it causes.
        reject(tickTimeoutError(tickTimeoutMs));
        controller.abort();
      }, tickTimeoutMs);
    });

    try {
      return await Promise.race([work, timeout]);
    } catch (err) {
      if (controller.signal.aborted) {
        await work.then(
          () => logger.debug("[enforcer] abandoned tick completed after abort"),
          (lateErr: unknown) => logger.debug({ err: lateErr }, "[enforcer] abandoned tick settled")
        );
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}
