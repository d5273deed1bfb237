/**
 * Rotation Warden — src/features/channels/types.ts
 * WHAT: The capability interface both control channels implement.
 * WHY: The reconciler only knows list/remove/add; it never imports a concrete client.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ChannelKind } from "../../lib/errors.js";

export type { ChannelKind };

/**
 * A path to the game server's rotation. Implementations throw their own channel
 * error class (PrimaryChannelError / FallbackChannelError) on any failure and never
 * retry internally.
 */
export interface RotationChannel {
  readonly kind: ChannelKind;
  listRotation(): Promise<string[]>;
  /** Remove the given maps. Order is the order commands are issued in. */
  removeMaps(maps: readonly string[]): Promise<void>;
  /** Append the given maps, in order. */
  addMaps(maps: readonly string[]): Promise<void>;
}

/** A channel scoped to one reconciliation attempt. */
export interface ClosableRotationChannel extends RotationChannel {
  close(): Promise<void>;
}

/** Opens a fresh fallback connection for one tick. */
export type OpenRotationChannel = () => Promise<ClosableRotationChannel>;
