/**
 * Rotation Warden — tests/utils/fakeChannels.ts
 * WHAT: In-memory rotation channel that records every call.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ChannelKind, ClosableRotationChannel } from "../../src/features/channels/types.js";

type Step = "list" | "remove" | "add" | "close";

export class InMemoryChannel implements ClosableRotationChannel {
  readonly calls: string[] = [];
  closed = 0;
  /** Error to throw from the given step instead of doing it. */
  readonly failures: Partial<Record<Step, Error>> = {};
  /** Runs before a step does its work; lets a test abort mid-tick. */
  onStep: ((step: Step) => void) | null = null;

  constructor(
    readonly kind: ChannelKind,
    public rotation: string[]
  ) {}

  async listRotation(): Promise<string[]> {
    this.step("list", "list");
    return [...this.rotation];
  }

  async removeMaps(maps: readonly string[]): Promise<void> {
    this.step("remove", `remove ${maps.join(",")}`);
    for (const map of maps) {
      const index = this.rotation.indexOf(map);
      if (index !== -1) this.rotation.splice(index, 1);
    }
  }

  async addMaps(maps: readonly string[]): Promise<void> {
    this.step("add", `add ${maps.join(",")}`);
    this.rotation.push(...maps);
  }

  async close(): Promise<void> {
    this.closed++;
    const failure = this.failures.close;
    if (failure) throw failure;
  }

  private step(step: Step, call: string): void {
    this.calls.push(call);
    this.onStep?.(step);
    const failure = this.failures[step];
    if (failure) throw failure;
  }
}
