import {
  decodeEntityId,
  encodeEntityId,
  maxSequenceFor,
  type EntityType,
} from "../../core/entities/entityId";

/**
 * Issues identifiers of one entity type, continuing after the highest sequence number already persisted.
 * Counters are per instance; two generators over the same store can collide.
 */
export class IdGenerator {
  private constructor(
    readonly entityType: EntityType,
    private counter: bigint,
  ) {}

  /**
   * Seeds the counter from existing ids, ignoring ids of other types.
   */
  static async fromScan(
    entityType: EntityType,
    ids: Iterable<bigint> | AsyncIterable<bigint>,
  ): Promise<IdGenerator> {
    let maxSeq: bigint | null = null;

    for await (const id of ids) {
      const decoded = decodeEntityId(id);
      if (decoded.type !== entityType) {
        continue;
      }
      if (maxSeq === null || decoded.seq > maxSeq) {
        maxSeq = decoded.seq;
      }
    }

    return new IdGenerator(entityType, maxSeq === null ? 1n : maxSeq + 1n);
  }

  /**
   * Returns the next identifier; throws RangeError once the type's sequence space is exhausted.
   */
  next(): bigint {
    if (this.counter > maxSequenceFor(this.entityType)) {
      throw new RangeError(
        `Sequence space for ${this.entityType} is exhausted.`,
      );
    }

    const id = encodeEntityId(this.entityType, this.counter);
    this.counter += 1n;
    return id;
  }
}
