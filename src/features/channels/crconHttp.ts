/**
 * Rotation Warden — src/features/channels/crconHttp.ts
 * WHAT: Client for the community RCON web API (primary channel).
 * WHY: Structured JSON beats scraping console text; this is the normal path.
 * FLOWS:
 *  - listRotation() → GET  {apiRoot}/get_map_rotation
 *  - removeMaps()   → POST {apiRoot}/remove_maps_from_rotation { map_names }
 *  - addMaps()      → POST {apiRoot}/add_maps_to_rotation      { map_names }
 * DOCS:
 *  - undici Agent: https://undici.nodejs.org/#/docs/api/Agent
 *
 * No retries here. A failure surfaces as PrimaryChannelError and the reconciler
 * decides what happens next (the fallback channel, this tick).
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { Agent, fetch, type Dispatcher } from "undici";
import { z } from "zod";
import { PrimaryChannelError } from "../../lib/errors.js";
import type { PrimaryChannelConfig } from "../../lib/env.js";
import { logger, redact } from "../../lib/logger.js";
import type { RotationChannel } from "./types.js";

// Keep idle connections around between ticks; the default is only 4s.
const KEEP_ALIVE_MS = 60_000;

/**
 * Every endpoint wraps its payload the same way. `failed: true` means the API
 * rejected the whole call; it doesn't report per-map outcomes.
 */
const envelopeSchema = z.object({
  result: z.unknown(),
  failed: z.boolean().optional().default(false),
  error: z.string().nullable().optional(),
});

// Older API versions return bare ids, newer ones return map objects.
const rotationSchema = z.array(
  z.union([z.string().min(1), z.object({ id: z.string().min(1) }).passthrough()])
);

export interface CrconHttpOptions extends PrimaryChannelConfig {
  /** Replaces the keep-alive agent; tests pass an undici MockAgent. */
  dispatcher?: Dispatcher;
}

type HttpMethod = "GET" | "POST";

export class CrconHttpClient implements RotationChannel {
  readonly kind = "primary" as const;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(private readonly options: CrconHttpOptions) {
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher =
      options.dispatcher ??
      new Agent({
        keepAliveTimeout: KEEP_ALIVE_MS,
        // Certificate checks are off unless CRCON_HTTP_VERIFY is truthy (env.ts default: false).
        connect: { rejectUnauthorized: options.verifyTls },
      });
  }

  /**
   * Builds the endpoint URL from base URL, API root and endpoint name.
   *
   * @example
   * // baseUrl "https://crcon.example/", apiRoot "/api"
   * client.endpointUrl("get_map_rotation") // "https://crcon.example/api/get_map_rotation"
   */
  endpointUrl(endpoint: string): string {
    const base = this.options.baseUrl.replace(/\/+$/, "");
    const root = this.options.apiRoot.replace(/^\/+|\/+$/g, "");
    return root ? `${base}/${root}/${endpoint}` : `${base}/${endpoint}`;
  }

  /** @throws PrimaryChannelError("list_rotation") */
  async listRotation(): Promise<string[]> {
    const result = await this.call("list_rotation", "GET", "get_map_rotation");
    const parsed = rotationSchema.safeParse(result);
    if (!parsed.success) {
      throw new PrimaryChannelError("list_rotation", "Rotation payload did not match the expected shape", {
        cause: parsed.error,
        transient: false,
      });
    }
    return parsed.data.map((entry) => (typeof entry === "string" ? entry : entry.id));
  }

  /** @throws PrimaryChannelError("remove_maps") */
  async removeMaps(maps: readonly string[]): Promise<void> {
    if (maps.length === 0) return;
    await this.call("remove_maps", "POST", "remove_maps_from_rotation", { map_names: [...maps] });
  }

  /** @throws PrimaryChannelError("add_maps") */
  async addMaps(maps: readonly string[]): Promise<void> {
    if (maps.length === 0) return;
    await this.call("add_maps", "POST", "add_maps_to_rotation", { map_names: [...maps] });
  }

  /** Close the keep-alive pool. Only the agent this client created is closed. */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async call(
    operation: string,
    method: HttpMethod,
    endpoint: string,
    body?: Record<string, unknown>
  ): Promise<unknown> {
    const url = this.endpointUrl(endpoint);
    logger.debug({ operation, method, url }, "[crcon] →");

    let response: Awaited<ReturnType<typeof fetch>>;
    try {
      response = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.options.bearerToken}`,
          Accept: "application/json",
          ...(body ? { "Content-Type": "application/json" } : {}),
        },
        body: body ? JSON.stringify(body) : undefined,
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new PrimaryChannelError(operation, `${method} ${endpoint} failed: ${message}`, { cause: err });
    }

    if (!response.ok) {
      const text = await response.text().catch((err: unknown) => {
        logger.debug({ err, operation }, "[crcon] could not read error body");
        return "";
      });
      throw new PrimaryChannelError(operation, `HTTP ${response.status} from ${endpoint}: ${redact(text)}`, {
        // 5xx and 429 are the server having a bad moment; 4xx is us.
        transient: response.status >= 500 || response.status === 429,
      });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new PrimaryChannelError(operation, `${endpoint} returned a non-JSON body`, {
        cause: err,
        transient: false,
      });
    }

    const envelope = envelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new PrimaryChannelError(operation, `${endpoint} returned an unexpected envelope`, {
        cause: envelope.error,
        transient: false,
      });
    }
    if (envelope.data.failed) {
      throw new PrimaryChannelError(
        operation,
        `${endpoint} reported failure: ${redact(envelope.data.error ?? "no details")}`,
        { transient: false }
      );
    }

    logger.debug({ operation, status: response.status }, "[crcon] ←");
    return envelope.data.result;
  }
}
