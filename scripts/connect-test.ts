/**
 * Rotation Warden — scripts/connect-test.ts
 * WHAT: TCP reachability probe for the game server's console port.
 * WHY: "Fallback failed to connect" is usually a firewall; this checks that alone,
 *      without a password or the schedule.
 * USAGE: tsx scripts/connect-test.ts <host> [port]
 * EXIT: 0 reachable, 1 unreachable, 2 usage error
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import net from "node:net";

const DEFAULT_PORT = 7779;
const TIMEOUT_MS = 10_000;

function usage(message: string): never {
  console.error(`[connect-test] ${message}`);
  console.error("Usage: tsx scripts/connect-test.ts <host> [port]");
  process.exit(2);
}

function probe(host: string, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    const startedAt = Date.now();
    const socket = net.createConnection({ host, port });
    socket.setTimeout(TIMEOUT_MS);

    socket.once("connect", () => {
      socket.destroy();
      resolve(Date.now() - startedAt);
    });
    socket.once("timeout", () => {
      socket.destroy();
      reject(new Error(`no answer within ${TIMEOUT_MS / 1000}s`));
    });
    socket.once("error", (err) => {
      socket.destroy();
      reject(err);
    });
  });
}

async function main(): Promise<void> {
  const [host, rawPort] = process.argv.slice(2);
  if (!host) usage("missing host");

  const port = rawPort === undefined ? DEFAULT_PORT : Number(rawPort);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    usage(`invalid port "${rawPort ?? ""}"`);
  }

  console.log(`[connect-test] Connecting to ${host}:${port} ...`);
  try {
    const elapsed = await probe(host, port);
    console.log(`[connect-test] OK: ${host}:${port} accepted the connection in ${elapsed}ms`);
    process.exit(0);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[connect-test] FAILED: ${host}:${port}: ${message}`);
    process.exit(1);
  }
}

await main();
