/**
 * Rotation Warden — tests/features/channels/rconCodec.test.ts
 * WHAT: Tests for console framing and keystream obfuscation.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { createHash } from "node:crypto";
import { describe, it, expect } from "vitest";
import {
  deriveKeystream,
  encodeFrame,
  FrameDecoder,
  MAX_FRAME_BYTES,
  xorCrypt,
} from "../../../src/features/channels/rconCodec.js";

const identity = Uint8Array.from([0]);

describe("deriveKeystream", () => {
  it("is the SHA-256 digest of the password", () => {
    const key = deriveKeystream("test-secret");
    expect(key).toHaveLength(32);
    expect(key.equals(createHash("sha256").update("test-secret").digest())).toBe(true);
  });
});

describe("xorCrypt", () => {
  it("xors each byte against the repeating key from offset 0", () => {
    expect([...xorCrypt(Uint8Array.from([0x00, 0xff, 0x10]), Uint8Array.from([0x0f]))]).toEqual([0x0f, 0xf0, 0x1f]);
    expect([...xorCrypt(Uint8Array.from([0, 0, 0]), Uint8Array.from([1, 2]))]).toEqual([1, 2, 1]);
  });

  it("is its own inverse", () => {
    const key = deriveKeystream("test-secret");
    const data = Buffer.from("rotadd some_map_id", "utf8");
    expect(xorCrypt(xorCrypt(data, key), key).toString("utf8")).toBe("rotadd some_map_id");
  });

  it("rejects an empty key", () => {
    expect(() => xorCrypt(Uint8Array.from([1]), new Uint8Array(0))).toThrow(RangeError);
  });
});

describe("encodeFrame", () => {
  it("prefixes the payload with its little-endian length", () => {
    expect([...encodeFrame("abc", identity)]).toEqual([3, 0, 0, 0, 97, 98, 99]);
  });

  it("restarts the keystream for every frame", () => {
    const key = Uint8Array.from([1, 2]);
    expect([...encodeFrame("A", key)]).toEqual([1, 0, 0, 0, 0x40]);
    expect([...encodeFrame("A", key)]).toEqual([1, 0, 0, 0, 0x40]);
  });

  it("counts bytes, not characters", () => {
    expect(encodeFrame("café", identity).readUInt32LE(0)).toBe(5);
  });
});

describe("FrameDecoder", () => {
  const key = deriveKeystream("test-secret");

  it("returns every complete frame in a chunk", () => {
    const decoder = new FrameDecoder(key);
    const chunk = Buffer.concat([encodeFrame("SUCCESS", key), encodeFrame("map_a\nmap_b", key)]);
    expect(decoder.push(chunk)).toEqual(["SUCCESS", "map_a\nmap_b"]);
    expect(decoder.pendingBytes).toBe(0);
  });

  it("buffers partial headers and payloads", () => {
    const decoder = new FrameDecoder(key);
    const frame = encodeFrame("SUCCESS", key);
    expect(decoder.push(frame.subarray(0, 2))).toEqual([]);
    expect(decoder.pendingBytes).toBe(2);
    expect(decoder.push(frame.subarray(2, 6))).toEqual([]);
    expect(decoder.push(frame.subarray(6))).toEqual(["SUCCESS"]);
  });

  it("decodes a frame delivered one byte at a time", () => {
    const decoder = new FrameDecoder(key);
    const frame = encodeFrame("café", key);
    const frames: string[] = [];
    for (const byte of frame) {
      frames.push(...decoder.push(Uint8Array.from([byte])));
    }
    expect(frames).toEqual(["café"]);
  });

  it("keeps the start of the next frame", () => {
    const decoder = new FrameDecoder(key);
    const second = encodeFrame("FAIL", key);
    const chunk = Buffer.concat([encodeFrame("SUCCESS", key), second.subarray(0, 5)]);
    expect(decoder.push(chunk)).toEqual(["SUCCESS"]);
    expect(decoder.pendingBytes).toBe(5);
    expect(decoder.push(second.subarray(5))).toEqual(["FAIL"]);
  });

  it("decodes an empty frame", () => {
    expect(new FrameDecoder(key).push(Uint8Array.from([0, 0, 0, 0]))).toEqual([""]);
  });

  it("rejects a header announcing an oversized frame", () => {
    const header = Buffer.alloc(4);
    header.writeUInt32LE(MAX_FRAME_BYTES + 1, 0);
    expect(() => new FrameDecoder(key).push(header)).toThrow(
      `Incoming frame of ${MAX_FRAME_BYTES + 1} bytes exceeds ${MAX_FRAME_BYTES}`
    );
  });
});
