import type { EntityType } from "./entityId";

export type SymbolEntity = {
  sid: bigint;
  symbol: string;
  name: string;
  entityType: EntityType;
  createdAt: Date;
};

/**
 * Records which vendor identifier resolved an entity and when it last worked.
 */
export type SourceMappingEntity = {
  sid: bigint;
  sourceName: string;
  sourceIdentifier: string;
  verified: boolean;
  lastVerifiedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
};
