/**
 * Rotation Warden — src/index.ts
 * WHAT: Process entrypoint. Loads configuration, wires the channels, runs the enforcement loop.
 * WHY: One place to see startup order and shutdown order.
 * FLOWS:
 *  - startup: .env + env → ServiceConfig → Sentry → schedule file → channels → enforcer.start()
 *  - ConfigError during startup → exit 78, no tick ever runs
 *  - SIGINT/SIGTERM → enforcer.stop() → close HTTP pool → flush Sentry → exit 128+signal
 * DOCS:
 *  - process signals: https://nodejs.org/api/process.html#signal-events
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { readFileSync } from "node:fs";
import path from "node:path";
import { loadScheduleDocument } from "./config/scheduleStore.js";
import { CrconHttpClient } from "./features/channels/crconHttp.js";
import { createRconChannelOpener } from "./features/channels/rconV2.js";
import { RotationReconciler } from "./features/rotation/reconciler.js";
import {
  EXIT_CONFIG_ERROR,
  EXIT_FAILURE,
  SHUTDOWN_SIGNALS,
  SHUTDOWN_TIMEOUT_MS,
  UNCAUGHT_EXCEPTION_EXIT_DELAY_MS,
  signalExitCode,
  type ShutdownSignal,
} from "./lib/constants.js";
import { loadServiceConfig } from "./lib/env.js";
import { ConfigError } from "./lib/errors.js";
import { logger, normalizeLogLevel } from "./lib/logger.js";
import { captureException, flushSentry, initializeSentry } from "./lib/sentry.js";
import { getTickHealth } from "./lib/tickHealth.js";
import { RotationEnforcer } from "./scheduler/rotationEnforcer.js";

// ===== Global Error Handlers =====
// DOCS: https://nodejs.org/api/process.html#event-uncaughtexception

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
});

process.on("uncaughtException", (error, origin) => {
  logger.fatal({ evt: "uncaught_exception", err: error, origin }, "[process] Uncaught exception");
  captureException(error, { context: "uncaughtException", origin });
  // Give Sentry time to flush, then exit
  setTimeout(() => process.exit(EXIT_FAILURE), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

function packageVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(path.join(process.cwd(), "package.json"), "utf-8"));
    if (raw && typeof raw === "object" && "version" in raw && typeof raw.version === "string") {
      return raw.version;
    }
  } catch (err) {
    logger.debug({ err }, "[startup] package.json not readable, release unknown");
  }
  return "unknown";
}

async function main(): Promise<void> {
  const config = loadServiceConfig();
  // The logger was built before .env was read.
  logger.level = normalizeLogLevel(config.logLevel);

  initializeSentry({
    dsn: config.sentry.dsn,
    environment: config.sentry.environment,
    release: `rotation-warden@${packageVersion()}`,
  });

  const document = await loadScheduleDocument(config.schedulePath);

  const primary = new CrconHttpClient(config.primary);
  const reconciler = new RotationReconciler({
    primary,
    openFallback: config.fallback ? createRconChannelOpener(config.fallback) : undefined,
  });
  if (!config.fallback) {
    logger.warn("[startup] RCON_* not set; primary channel failures will skip the tick");
  }

  const enforcer = new RotationEnforcer({
    document,
    resolveOptions: {
      timeZone: config.timeZone,
      rotationName: config.rotationName,
      cycleAnchor: config.cycleAnchor,
    },
    reconciler,
    intervalMs: config.enforcer.intervalMs,
    tickTimeoutMs: config.enforcer.tickTimeoutMs,
    alignToTransitions: config.enforcer.alignToTransitions,
  });

  let shuttingDown = false;
  const shutdown = async (signal: ShutdownSignal): Promise<void> => {
    if (shuttingDown) {
      logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

    const forceExit = setTimeout(() => {
      logger.error({ signal, timeoutMs: SHUTDOWN_TIMEOUT_MS }, "[shutdown] Timed out, exiting anyway");
      process.exit(signalExitCode(signal));
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    try {
      await enforcer.stop();
      await primary.close();
      logger.info({ health: getTickHealth() }, "[shutdown] Graceful shutdown complete");
    } catch (err) {
      logger.error({ err }, "[shutdown] Error during graceful shutdown");
    }

    await flushSentry();
    process.exit(signalExitCode(signal));
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err, signal }, "[shutdown] Shutdown handler failed");
        process.exit(signalExitCode(signal));
      });
    });
  }

  logger.info(
    {
      schedule: config.schedulePath,
      timeZone: config.timeZone,
      rotationName: config.rotationName ?? null,
      fallback: config.fallback ? `${config.fallback.host}:${config.fallback.port}` : null,
    },
    "[startup] rotation enforcement ready"
  );
  enforcer.start();
}

try {
  await main();
} catch (err) {
  if (err instanceof ConfigError) {
    logger.fatal({ err, key: err.key }, "[startup] Configuration error, refusing to start");
    await flushSentry();
    process.exit(EXIT_CONFIG_ERROR);
  }
  logger.fatal({ err }, "[startup] Failed to start");
  captureException(err, { context: "startup" });
  await flushSentry();
  process.exit(EXIT_FAILURE);
}
