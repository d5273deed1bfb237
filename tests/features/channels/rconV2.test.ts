/**
 * Rotation Warden — tests/features/channels/rconV2.test.ts
 * WHAT: Tests for the legacy console client against an in-memory server.
 * WHY: The fallback only runs when something else already broke; it has to work
 *      the first time, including when the server misbehaves.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.mock("../../../src/lib/logger.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../../../src/lib/logger.js")>()),
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import {
  createRconChannelOpener,
  RconV2Client,
  type RconV2Options,
} from "../../../src/features/channels/rconV2.js";
import { FallbackChannelError } from "../../../src/lib/errors.js";
import { createRotationConsole, FakeRconServer } from "../../utils/fakeRconServer.js";

function options(server: FakeRconServer, overrides: Partial<RconV2Options> = {}): RconV2Options {
  return {
    host: "127.0.0.1",
    port: 7779,
    password: "test-secret",
    timeoutMs: 1000,
    connectSocket: server.connect,
    ...overrides,
  };
}

async function connected(server: FakeRconServer, overrides: Partial<RconV2Options> = {}): Promise<RconV2Client> {
  const client = new RconV2Client(options(server, overrides));
  await client.connect();
  return client;
}

describe("RconV2Client.connect", () => {
  it("logs in with the password", async () => {
    const server = createRotationConsole([]);
    const client = await connected(server);

    expect(client.connected).toBe(true);
    expect(server.commands).toEqual(["login test-secret"]);
    await client.close();
  });

  it("does not reconnect while connected", async () => {
    const server = createRotationConsole([]);
    const client = await connected(server);
    await client.connect();

    expect(server.connections).toBe(1);
    await client.close();
  });

  it("fails the login on anything but SUCCESS", async () => {
    const server = createRotationConsole([]);
    const client = new RconV2Client(options(server, { password: "wrong-secret" }));

    const err = await client.connect().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FallbackChannelError);
    expect(err).toMatchObject({
      operation: "login",
      message: "Server rejected the console password",
      transient: false,
    });
    expect(client.connected).toBe(false);
  });

  it("wraps connection failures as transient", async () => {
    const refused = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:7779"), { code: "ECONNREFUSED" });
    const client = new RconV2Client({
      host: "127.0.0.1",
      port: 7779,
      password: "test-secret",
      timeoutMs: 1000,
      connectSocket: () => Promise.reject(refused),
    });

    const err = await client.connect().catch((e: unknown) => e);
    expect(err).toMatchObject({
      name: "FallbackChannelError",
      operation: "connect",
      message: "Could not connect to 127.0.0.1:7779",
      transient: true,
    });
  });
});

describe("RconV2Client commands", () => {
  it("lists the rotation one map per line", async () => {
    const server = new FakeRconServer("test-secret", (command) =>
      command.startsWith("login") ? "SUCCESS" : "map_a\nmap_b\r\n\n  map_c  \n"
    );
    const client = await connected(server);

    await expect(client.listRotation()).resolves.toEqual(["map_a", "map_b", "map_c"]);
    expect(server.commands).toEqual(["login test-secret", "rotlist"]);
    await client.close();
  });

  it("reads replies that arrive in small pieces", async () => {
    const server = createRotationConsole(["map_a", "map_b"]);
    server.chunkSize = 3;
    const client = await connected(server);

    await expect(client.listRotation()).resolves.toEqual(["map_a", "map_b"]);
    await client.close();
  });

  it("sends rotdel and rotadd", async () => {
    const rotation = ["map_a", "map_b"];
    const client = await connected(createRotationConsole(rotation));

    await client.removeMap("map_a");
    await client.addMap("map_c");

    expect(rotation).toEqual(["map_b", "map_c"]);
    await client.close();
  });

  it("turns a FAIL reply into an error naming the command", async () => {
    const client = await connected(createRotationConsole(["map_a"]));

    const err = await client.removeMap("map_x").catch((e: unknown) => e);
    expect(err).toMatchObject({
      operation: "remove_map",
      message: 'rotdel map_x answered "FAIL"',
      transient: false,
    });
    await client.close();
  });

  it("refuses identifiers that would split into two arguments", async () => {
    const server = createRotationConsole([]);
    const client = await connected(server);

    await expect(client.addMap("two words")).rejects.toThrow('Invalid map identifier "two words"');
    await expect(client.addMap("")).rejects.toThrow('Invalid map identifier ""');
    expect(server.commands).toEqual(["login test-secret"]);
    await client.close();
  });

  it("fails a request before connect", async () => {
    const client = new RconV2Client(options(createRotationConsole([])));
    await expect(client.listRotation()).rejects.toMatchObject({ operation: "list_rotation", message: "Not connected" });
  });

  it("times out a silent server and stays failed", async () => {
    let answerRotlist = false;
    const server = new FakeRconServer("test-secret", (command) => {
      if (command.startsWith("login")) return "SUCCESS";
      return answerRotlist ? "map_a" : null;
    });
    const client = await connected(server, { timeoutMs: 50 });

    const err = await client.listRotation().catch((e: unknown) => e);
    expect(err).toMatchObject({
      operation: "list_rotation",
      message: "list_rotation failed: no reply within 50ms",
      transient: true,
    });

    // A reply now could belong to either request; the session is not reused.
    answerRotlist = true;
    await expect(client.listRotation()).rejects.toThrow("list_rotation failed: no reply within 50ms");
    await client.close();
  });

  it("fails the pending request when the server hangs up", async () => {
    const server = new FakeRconServer("test-secret", (command, self) => {
      if (command.startsWith("login")) return "SUCCESS";
      self.hangUp();
      return null;
    });
    const client = await connected(server);

    await expect(client.listRotation()).rejects.toThrow("list_rotation failed: connection closed by server");
    await client.close();
  });

  it("fails the pending request on close and closes only once", async () => {
    const server = new FakeRconServer("test-secret", (command) => (command.startsWith("login") ? "SUCCESS" : null));
    const client = await connected(server);

    const pending = client.listRotation().catch((e: unknown) => e);
    // Let the command reach the server before closing.
    await vi.waitFor(() => expect(server.commands).toHaveLength(2));
    await client.close();
    await client.close();

    expect(await pending).toMatchObject({ message: "list_rotation failed: connection closed by client" });
    expect(client.connected).toBe(false);
  });
});

describe("createRconChannelOpener", () => {
  it("opens a logged-in channel that issues one command per map", async () => {
    const rotation = ["map_a", "map_b", "map_c"];
    const server = createRotationConsole(rotation);
    const open = createRconChannelOpener(options(server));

    const channel = await open();
    expect(channel.kind).toBe("fallback");
    await expect(channel.listRotation()).resolves.toEqual(["map_a", "map_b", "map_c"]);
    await channel.removeMaps(["map_a", "map_c"]);
    await channel.addMaps(["map_d"]);
    await channel.close();

    expect(server.commands).toEqual([
      "login test-secret",
      "rotlist",
      "rotdel map_a",
      "rotdel map_c",
      "rotadd map_d",
    ]);
    expect(rotation).toEqual(["map_b", "map_d"]);
  });

  it("opens a fresh connection on every call", async () => {
    const server = createRotationConsole([]);
    const open = createRconChannelOpener(options(server));

    await (await open()).close();
    await (await open()).close();
    expect(server.connections).toBe(2);
  });
});
