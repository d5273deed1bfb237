/**
 * Rotation Warden — src/features/rotation/reconciler.ts
 * WHAT: Make the live rotation match an ActiveSelection, with primary → fallback failover.
 * WHY: The HTTP API is the normal path but goes down more often than the game server;
 *      the legacy console keeps enforcement alive when it does.
 * FLOWS:
 *  - primary: list → diff → remove → add
 *  - PrimaryChannelError anywhere → open fallback → same sequence → close fallback
 *  - fallback failure → FallbackChannelError to the caller (terminal for this tick)
 *
 * Re-running enforce() with the same selection and no outside interference ends
 * in a no-op: the diff of an already-matching queue is empty.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { FallbackChannelError, PrimaryChannelError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import type {
  ClosableRotationChannel,
  OpenRotationChannel,
  RotationChannel,
} from "../channels/types.js";
import { isNoopDiff, planRotationDiff } from "./diff.js";
import type { ActiveSelection, EnforcementResult } from "./types.js";

export interface RotationReconcilerOptions {
  primary: RotationChannel;
  /** Absent when RCON_* is not configured; primary failures are then terminal. */
  openFallback?: OpenRotationChannel;
}

function ensureNotAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    const err = new Error("enforcement cancelled");
    err.name = "AbortError";
    throw err;
  }
}

function selectionContext(selection: ActiveSelection): Record<string, unknown> {
  return {
    rotation: selection.rotationName,
    weekday: selection.weekday,
    block: selection.blockName,
  };
}

export class RotationReconciler {
  private readonly primary: RotationChannel;
  private readonly openFallback: OpenRotationChannel | undefined;

  constructor(options: RotationReconcilerOptions) {
    this.primary = options.primary;
    this.openFallback = options.openFallback;
  }

  /**
   * Reconcile once. `signal` is checked before every remote command; an aborted
   * tick stops at the next boundary and still closes the fallback connection.
   *
   * @throws FallbackChannelError when the fallback fails or isn't configured
   * @throws AbortError-named Error when `signal` fired
   */
  async enforce(selection: ActiveSelection, signal?: AbortSignal): Promise<EnforcementResult> {
    const context = selectionContext(selection);

    let primaryError: PrimaryChannelError;
    try {
      return await this.applyOn(this.primary, selection, signal);
    } catch (err) {
      if (!(err instanceof PrimaryChannelError)) throw err;
      primaryError = err;
    }

    logger.warn(
      { err: primaryError, ...context, operation: primaryError.operation, transient: primaryError.transient },
      "[reconcile] primary channel failed, switching to fallback"
    );

    if (!this.openFallback) {
      throw new FallbackChannelError("open", "Primary channel failed and no fallback channel is configured", {
        cause: primaryError,
        transient: primaryError.transient,
      });
    }

    ensureNotAborted(signal);

    let channel: ClosableRotationChannel;
    try {
      channel = await this.openFallback();
    } catch (err) {
      if (err instanceof FallbackChannelError) throw err;
      throw new FallbackChannelError("open", "Could not open the fallback channel", { cause: err });
    }

    try {
      const result = await this.applyOn(channel, selection, signal);
      return { ...result, primaryError: primaryError.message };
    } finally {
      try {
        await channel.close();
      } catch (closeErr) {
        logger.warn({ err: closeErr, ...context }, "[reconcile] fallback channel close failed");
      }
    }
  }

  private async applyOn(
    channel: RotationChannel,
    selection: ActiveSelection,
    signal: AbortSignal | undefined
  ): Promise<EnforcementResult> {
    ensureNotAborted(signal);
    const live = await channel.listRotation();
    const diff = planRotationDiff(live, selection.desiredMaps);

    if (isNoopDiff(diff)) {
      logger.debug(
        { ...selectionContext(selection), channel: channel.kind, maps: live.length },
        "[reconcile] live rotation already matches"
      );
      return { channel: channel.kind, live, removed: [], added: [], noop: true };
    }

    // Removals first: the server then appends additions after whatever survived.
    if (diff.remove.length > 0) {
      ensureNotAborted(signal);
      await channel.removeMaps(diff.remove);
    }
    if (diff.add.length > 0) {
      ensureNotAborted(signal);
      await channel.addMaps(diff.add);
    }

    logger.info(
      {
        ...selectionContext(selection),
        channel: channel.kind,
        removed: diff.remove,
        added: diff.add,
        kept: diff.kept,
      },
      "[reconcile] rotation updated"
    );

    return { channel: channel.kind, live, removed: diff.remove, added: diff.add, noop: false };
  }
}
