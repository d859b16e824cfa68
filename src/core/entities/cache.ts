export type CachedResponseEntity = {
  cacheKey: string;
  apiSource: string;
  endpointUrl: string;
  responseData: unknown;
  statusCode: number;
  cachedAt: Date;
  expiresAt: Date;
};

export type CacheMissReason = "disabled" | "absent" | "expired" | "error";

export type CacheLookup =
  | { status: "hit"; payload: unknown; cachedAt: Date; expiresAt: Date }
  | { status: "miss"; reason: CacheMissReason };

export type CacheSettings = {
  enabled: boolean;
  forceRefresh: boolean;
  defaultTtlMs: number;
};
