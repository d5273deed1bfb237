/**
 * Rotation Warden — src/features/channels/rconCodec.ts
 * WHAT: Framing and XOR obfuscation for the legacy remote-console protocol.
 * WHY: Kept apart from the socket code so the byte-level rules can be tested
 *      without a connection.
 * FLOWS:
 *  - deriveKeystream(password) → 32-byte key
 *  - encodeFrame(text, key) → [u32 LE length][payload XOR key]
 *  - FrameDecoder.push(chunk) → complete frames (buffers partial reads)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { createHash } from "node:crypto";

export const FRAME_HEADER_BYTES = 4;
export const MAX_FRAME_BYTES = 1024 * 1024;

/**
 * Keystream is the SHA-256 digest of the UTF-8 password. Obfuscation, not
 * encryption: anyone holding the password can read the traffic.
 */
export function deriveKeystream(password: string): Buffer {
  return createHash("sha256").update(password, "utf8").digest();
}

/**
 * XOR `data` against the repeating keystream starting at offset 0. The same call
 * obfuscates and de-obfuscates.
 */
export function xorCrypt(data: Uint8Array, key: Uint8Array): Buffer {
  if (key.length === 0) {
    throw new RangeError("xorCrypt: key must not be empty");
  }
  const out = Buffer.allocUnsafe(data.length);
  for (let i = 0; i < data.length; i++) {
    out[i] = (data[i] ?? 0) ^ (key[i % key.length] ?? 0);
  }
  return out;
}

export function encodeFrame(text: string, key: Uint8Array): Buffer {
  const payload = xorCrypt(Buffer.from(text, "utf8"), key);
  if (payload.length > MAX_FRAME_BYTES) {
    throw new RangeError(`Frame of ${payload.length} bytes exceeds ${MAX_FRAME_BYTES}`);
  }
  const header = Buffer.alloc(FRAME_HEADER_BYTES);
  header.writeUInt32LE(payload.length, 0);
  return Buffer.concat([header, payload]);
}

/**
 * Incremental frame reader. Sockets hand us arbitrary slices: half a header, a
 * frame and a bit, three frames at once. Push whatever arrived; get back every
 * frame that is now complete, already decoded to text.
 */
export class FrameDecoder {
  private buffered: Buffer = Buffer.alloc(0);

  constructor(private readonly key: Uint8Array) {}

  /** Bytes received but not yet part of a complete frame. */
  get pendingBytes(): number {
    return this.buffered.length;
  }

  /**
   * @throws RangeError when a header announces a frame larger than MAX_FRAME_BYTES
   */
  push(chunk: Uint8Array): string[] {
    this.buffered = this.buffered.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffered, chunk]);
    const frames: string[] = [];

    while (this.buffered.length >= FRAME_HEADER_BYTES) {
      const length = this.buffered.readUInt32LE(0);
      if (length > MAX_FRAME_BYTES) {
        throw new RangeError(`Incoming frame of ${length} bytes exceeds ${MAX_FRAME_BYTES}`);
      }
      const end = FRAME_HEADER_BYTES + length;
      if (this.buffered.length < end) break;

      const payload = this.buffered.subarray(FRAME_HEADER_BYTES, end);
      frames.push(xorCrypt(payload, this.key).toString("utf8"));
      this.buffered = this.buffered.subarray(end);
    }

    return frames;
  }
}
