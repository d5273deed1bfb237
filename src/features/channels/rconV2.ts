/**
 * Rotation Warden — src/features/channels/rconV2.ts
 * WHAT: Minimal client for the legacy remote-console protocol (fallback channel).
 * WHY: When the HTTP API is down, the game server's own console still works.
 * FLOWS:
 *  - connect() → TCP → `login <password>` → SUCCESS
 *  - listRotation() → `rotlist` → one map per line
 *  - removeMap(id) / addMap(id) → `rotdel <id>` / `rotadd <id>` → SUCCESS | FAIL
 *  - close() → destroy socket (idempotent)
 * DOCS:
 *  - net.createConnection: https://nodejs.org/api/net.html#netcreateconnection
 *
 * One request in flight at a time. The protocol has no request ids, so replies are
 * matched to requests purely by order.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import net from "node:net";
import type { Duplex } from "node:stream";
import { FallbackChannelError } from "../../lib/errors.js";
import type { FallbackChannelConfig } from "../../lib/env.js";
import { logger, redact } from "../../lib/logger.js";
import { deriveKeystream, encodeFrame, FrameDecoder } from "./rconCodec.js";
import type { ClosableRotationChannel, OpenRotationChannel } from "./types.js";

export type SocketFactory = (host: string, port: number, timeoutMs: number) => Promise<Duplex>;

export interface RconV2Options extends FallbackChannelConfig {
  /** Replaces the TCP connect; tests hand in an in-memory duplex. */
  connectSocket?: SocketFactory;
}

const SUCCESS_REPLY = "SUCCESS";

function timeoutError(message: string): Error {
  const err = new Error(message);
  err.name = "TimeoutError";
  return err;
}

const connectTcp: SocketFactory = (host, port, timeoutMs) =>
  new Promise<Duplex>((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    const timer = setTimeout(() => {
      socket.destroy();
      reject(timeoutError(`connect to ${host}:${port} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const onError = (err: Error) => {
      clearTimeout(timer);
      socket.destroy();
      reject(err);
    };

    socket.once("error", onError);
    socket.once("connect", () => {
      clearTimeout(timer);
      socket.off("error", onError);
      socket.setNoDelay(true);
      resolve(socket);
    });
  });

interface PendingReply {
  resolve: (frame: string) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

export class RconV2Client {
  private stream: Duplex | null = null;
  private readonly key: Buffer;
  private decoder: FrameDecoder;
  private frames: string[] = [];
  private pending: PendingReply | null = null;
  private failure: Error | null = null;
  private readonly connectSocket: SocketFactory;

  constructor(private readonly options: RconV2Options) {
    this.key = deriveKeystream(options.password);
    this.decoder = new FrameDecoder(this.key);
    this.connectSocket = options.connectSocket ?? connectTcp;
  }

  get connected(): boolean {
    return this.stream !== null;
  }

  /**
   * Open the connection and authenticate. Safe to call twice; the second call is
   * a no-op while connected.
   *
   * @throws FallbackChannelError("connect" | "login")
   */
  async connect(): Promise<void> {
    if (this.stream) return;
    const { host, port, timeoutMs } = this.options;

    let stream: Duplex;
    try {
      stream = await this.connectSocket(host, port, timeoutMs);
    } catch (err) {
      throw new FallbackChannelError("connect", `Could not connect to ${host}:${port}`, { cause: err });
    }

    this.attach(stream);
    logger.debug({ host, port }, "[rcon] connected");

    let reply: string;
    try {
      reply = await this.request("login", `login ${this.options.password}`);
    } catch (err) {
      await this.close();
      throw err;
    }
    if (reply.trim() !== SUCCESS_REPLY) {
      await this.close();
      throw new FallbackChannelError("login", "Server rejected the console password", {
        transient: false,
      });
    }
  }

  /**
   * @returns queued map identifiers in server order
   * @throws FallbackChannelError("list_rotation")
   */
  async listRotation(): Promise<string[]> {
    const reply = await this.request("list_rotation", "rotlist");
    return reply
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  /** @throws FallbackChannelError("remove_map") */
  async removeMap(mapId: string): Promise<void> {
    await this.command("remove_map", "rotdel", mapId);
  }

  /** @throws FallbackChannelError("add_map") */
  async addMap(mapId: string): Promise<void> {
    await this.command("add_map", "rotadd", mapId);
  }

  /**
   * Tear down the socket. Idempotent; any request still waiting for a reply is
   * rejected.
   */
  async close(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    this.stream = null;
    this.fail(new Error("connection closed by client"));
    stream.removeAllListeners("data");
    stream.destroy();
    logger.debug({ host: this.options.host, port: this.options.port }, "[rcon] closed");
  }

  private async command(operation: string, verb: string, mapId: string): Promise<void> {
    // Line protocol: an identifier with whitespace would turn into two arguments.
    if (!mapId || /\s/.test(mapId)) {
      throw new FallbackChannelError(operation, `Invalid map identifier "${mapId}"`, {
        transient: false,
      });
    }
    const reply = (await this.request(operation, `${verb} ${mapId}`)).trim();
    if (reply !== SUCCESS_REPLY) {
      throw new FallbackChannelError(operation, `${verb} ${mapId} answered "${redact(reply)}"`, {
        transient: false,
      });
    }
  }

  private attach(stream: Duplex): void {
    this.stream = stream;
    this.decoder = new FrameDecoder(this.key);
    this.frames = [];
    this.failure = null;

    stream.on("data", (chunk: Buffer) => {
      try {
        this.frames.push(...this.decoder.push(chunk));
      } catch (err) {
        this.fail(err instanceof Error ? err : new Error(String(err)));
        return;
      }
      this.deliver();
    });
    stream.on("error", (err: Error) => this.fail(err));
    stream.on("close", () => this.fail(new Error("connection closed by server")));
    stream.on("end", () => this.fail(new Error("connection closed by server")));
  }

  private deliver(): void {
    const pending = this.pending;
    const frame = this.frames[0];
    if (!pending || frame === undefined) return;
    this.frames.shift();
    this.pending = null;
    clearTimeout(pending.timer);
    pending.resolve(frame);
  }

  private fail(err: Error): void {
    this.failure ??= err;
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      clearTimeout(pending.timer);
      pending.reject(err);
    }
  }

  private nextFrame(): Promise<string> {
    if (this.failure) return Promise.reject(this.failure);
    const frame = this.frames.shift();
    if (frame !== undefined) return Promise.resolve(frame);

    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        const err = timeoutError(`no reply within ${this.options.timeoutMs}ms`);
        this.pending = null;
        // A late reply would be paired with the next request. The session is done.
        this.failure ??= err;
        reject(err);
      }, this.options.timeoutMs);
      this.pending = { resolve, reject, timer };
    });
  }

  private write(buffer: Buffer): Promise<void> {
    const stream = this.stream;
    if (!stream) {
      return Promise.reject(new Error("not connected"));
    }
    return new Promise<void>((resolve, reject) => {
      stream.write(buffer, (err) => (err ? reject(err) : resolve()));
    });
  }

  private async request(operation: string, line: string): Promise<string> {
    if (!this.stream) {
      throw new FallbackChannelError(operation, "Not connected", { transient: false });
    }
    if (this.pending) {
      throw new FallbackChannelError(operation, "Another request is still waiting for a reply", {
        transient: false,
      });
    }

    logger.debug({ operation, command: redact(line) }, "[rcon] →");
    try {
      // After a timeout or hang-up the reply order is unknown; nothing more is sent.
      if (this.failure) throw this.failure;
      await this.write(encodeFrame(line, this.key));
      const reply = await this.nextFrame();
      logger.debug({ operation, bytes: reply.length }, "[rcon] ←");
      return reply;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new FallbackChannelError(operation, `${operation} failed: ${message}`, { cause: err });
    }
  }
}

/**
 * Present an RCON session through the channel interface. The legacy protocol has
 * no batch form, so every map is its own command.
 */
export function rconRotationChannel(client: RconV2Client): ClosableRotationChannel {
  return {
    kind: "fallback",
    listRotation: () => client.listRotation(),
    async removeMaps(maps) {
      for (const mapId of maps) {
        await client.removeMap(mapId);
      }
    },
    async addMaps(maps) {
      for (const mapId of maps) {
        await client.addMap(mapId);
      }
    },
    close: () => client.close(),
  };
}

/**
 * Factory the reconciler calls once per fallback attempt: fresh client, connected
 * and logged in, or a FallbackChannelError.
 */
export function createRconChannelOpener(options: RconV2Options): OpenRotationChannel {
  return async () => {
    const client = new RconV2Client(options);
    await client.connect();
    return rconRotationChannel(client);
  };
}
