import { createHash } from "node:crypto";
import { toErrorMessage } from "../../core/entities/appError";
import type {
  CacheLookup,
  CacheSettings,
} from "../../core/entities/cache";
import type {
  CacheRepositoryPort,
  CacheSourceSummary,
  ClockPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";

export type CacheKeyParts = {
  sid: bigint;
  symbol: string;
  shape?: Record<string, unknown>;
};

export type CacheWrite = {
  cacheKey: string;
  apiSource: string;
  endpointUrl: string;
  payload: unknown;
  ttlMs?: number;
  statusCode?: number;
};

const stableStringify = (value: unknown): string => {
  if (typeof value === "bigint") {
    return JSON.stringify(value.toString());
  }
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
      .map(([key, entry]) => `${JSON.stringify(key)}:${stableStringify(entry)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
};

/**
 * Derives `<prefix>_<16 hex>` from the entity id, canonical symbol, and request shape.
 * Key order inside the shape does not affect the result.
 */
export const buildCacheKey = (prefix: string, parts: CacheKeyParts): string => {
  const material = [
    parts.sid.toString(),
    parts.symbol.trim().toUpperCase(),
    stableStringify(parts.shape ?? {}),
  ].join("|");
  const digest = createHash("sha256").update(material).digest("hex");
  return `${prefix}_${digest.slice(0, 16)}`;
};

/**
 * TTL response cache in front of vendor calls. Best-effort: storage failures become misses or no-ops.
 */
export class CacheStore {
  constructor(
    private readonly repository: CacheRepositoryPort,
    private readonly clock: ClockPort,
    private readonly settings: CacheSettings,
  ) {}

  /**
   * Returns a live payload, or a miss with its reason. Skips storage when caching is off or refresh is forced.
   */
  async get(cacheKey: string, apiSource: string): Promise<CacheLookup> {
    if (!this.settings.enabled || this.settings.forceRefresh) {
      return { status: "miss", reason: "disabled" };
    }

    try {
      const entry = await this.repository.find(cacheKey, apiSource);
      if (!entry) {
        return { status: "miss", reason: "absent" };
      }

      if (entry.expiresAt.getTime() <= this.clock.now().getTime()) {
        return { status: "miss", reason: "expired" };
      }

      return {
        status: "hit",
        payload: entry.responseData,
        cachedAt: entry.cachedAt,
        expiresAt: entry.expiresAt,
      };
    } catch (error) {
      logger.warn(
        { cacheKey, apiSource, error: toErrorMessage(error) },
        "Cache read failed; treating as miss",
      );
      return { status: "miss", reason: "error" };
    }
  }

  /**
   * Upserts a payload under `now + ttl`. Force-refresh still writes; a disabled cache does not.
   */
  async set(write: CacheWrite): Promise<boolean> {
    if (!this.settings.enabled) {
      return false;
    }

    const ttlMs = write.ttlMs ?? this.settings.defaultTtlMs;
    if (!(ttlMs > 0)) {
      logger.warn(
        { cacheKey: write.cacheKey, apiSource: write.apiSource, ttlMs },
        "Ignoring cache write with non-positive TTL",
      );
      return false;
    }

    const cachedAt = this.clock.now();
    try {
      await this.repository.upsert({
        cacheKey: write.cacheKey,
        apiSource: write.apiSource,
        endpointUrl: write.endpointUrl,
        responseData: write.payload,
        statusCode: write.statusCode ?? 200,
        cachedAt,
        expiresAt: new Date(cachedAt.getTime() + ttlMs),
      });
      return true;
    } catch (error) {
      logger.warn(
        {
          cacheKey: write.cacheKey,
          apiSource: write.apiSource,
          error: toErrorMessage(error),
        },
        "Cache write failed; continuing without cache",
      );
      return false;
    }
  }

  /**
   * Deletes expired rows of one source and returns how many went.
   */
  async cleanupExpired(apiSource: string): Promise<number> {
    try {
      const removed = await this.repository.deleteExpired(
        apiSource,
        this.clock.now(),
      );
      logger.debug({ apiSource, removed }, "Expired cache rows removed");
      return removed;
    } catch (error) {
      logger.warn(
        { apiSource, error: toErrorMessage(error) },
        "Cache cleanup failed",
      );
      return 0;
    }
  }

  async summarize(): Promise<CacheSourceSummary[]> {
    try {
      return await this.repository.summarize(this.clock.now());
    } catch (error) {
      logger.warn({ error: toErrorMessage(error) }, "Cache summary failed");
      return [];
    }
  }
}
