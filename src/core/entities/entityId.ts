import assetTypeAliases from "./assetTypeAliases.json";

export const entityTypes = [
  "equity",
  "preferred_stock",
  "etf",
  "mutual_fund",
  "option",
  "future",
  "warrant",
  "adr",
  "bond",
  "government_bond",
  "corporate_bond",
  "municipal_bond",
  "cryptocurrency",
  "reit",
  "currency",
  "index",
  "commodity",
  "certificate_of_deposit",
  "treasury_bill",
  "other",
] as const;

export type EntityType = (typeof entityTypes)[number];

/**
 * Binds an entity type to the prefix occupying the top bits of its identifiers.
 */
export type EntityTypeRegistration = {
  type: EntityType;
  prefixWidth: number;
  prefixValue: number;
  label: string;
};

export type DecodedEntityId = {
  type: EntityType;
  seq: bigint;
};

const ID_BITS = 64;

// Widths grow with the expected universe shrinking: 4-bit tags leave 60 bits of sequence.
export const entityTypeRegistry: readonly EntityTypeRegistration[] = [
  { type: "equity", prefixWidth: 4, prefixValue: 0b0000, label: "Equity" },
  {
    type: "preferred_stock",
    prefixWidth: 4,
    prefixValue: 0b0001,
    label: "Preferred Stock",
  },
  { type: "etf", prefixWidth: 4, prefixValue: 0b0010, label: "ETF" },
  {
    type: "mutual_fund",
    prefixWidth: 4,
    prefixValue: 0b0011,
    label: "Mutual Fund",
  },
  { type: "option", prefixWidth: 4, prefixValue: 0b0100, label: "Option" },
  { type: "future", prefixWidth: 4, prefixValue: 0b0101, label: "Future" },
  { type: "warrant", prefixWidth: 4, prefixValue: 0b0110, label: "Warrant" },
  { type: "adr", prefixWidth: 4, prefixValue: 0b0111, label: "ADR" },
  { type: "bond", prefixWidth: 5, prefixValue: 0b10000, label: "Bond" },
  {
    type: "government_bond",
    prefixWidth: 5,
    prefixValue: 0b10001,
    label: "Government Bond",
  },
  {
    type: "corporate_bond",
    prefixWidth: 5,
    prefixValue: 0b10010,
    label: "Corporate Bond",
  },
  {
    type: "municipal_bond",
    prefixWidth: 5,
    prefixValue: 0b10011,
    label: "Municipal Bond",
  },
  {
    type: "cryptocurrency",
    prefixWidth: 5,
    prefixValue: 0b10100,
    label: "Cryptocurrency",
  },
  { type: "reit", prefixWidth: 5, prefixValue: 0b10101, label: "REIT" },
  { type: "currency", prefixWidth: 6, prefixValue: 0b110000, label: "Currency" },
  { type: "index", prefixWidth: 6, prefixValue: 0b110001, label: "Index" },
  {
    type: "commodity",
    prefixWidth: 6,
    prefixValue: 0b110010,
    label: "Commodity",
  },
  {
    type: "certificate_of_deposit",
    prefixWidth: 6,
    prefixValue: 0b110011,
    label: "Certificate of Deposit",
  },
  {
    type: "treasury_bill",
    prefixWidth: 6,
    prefixValue: 0b110100,
    label: "Treasury Bill",
  },
  { type: "other", prefixWidth: 6, prefixValue: 0b111111, label: "Other" },
];

/**
 * Rejects registries with duplicate types, out-of-range prefixes, or a prefix that is a prefix of another.
 */
export const validateRegistry = (
  registry: readonly EntityTypeRegistration[],
): void => {
  const seen = new Set<EntityType>();

  registry.forEach((entry) => {
    if (seen.has(entry.type)) {
      throw new Error(`Entity type '${entry.type}' is registered twice.`);
    }
    seen.add(entry.type);

    if (
      !Number.isInteger(entry.prefixWidth) ||
      entry.prefixWidth < 1 ||
      entry.prefixWidth >= ID_BITS
    ) {
      throw new Error(
        `Entity type '${entry.type}' has invalid prefix width ${entry.prefixWidth}.`,
      );
    }

    if (
      !Number.isInteger(entry.prefixValue) ||
      entry.prefixValue < 0 ||
      entry.prefixValue >= 2 ** entry.prefixWidth
    ) {
      throw new Error(
        `Entity type '${entry.type}' prefix ${entry.prefixValue} does not fit in ${entry.prefixWidth} bits.`,
      );
    }
  });

  registry.forEach((left, index) => {
    registry.slice(index + 1).forEach((right) => {
      const [shorter, longer] =
        left.prefixWidth <= right.prefixWidth ? [left, right] : [right, left];
      const truncated =
        longer.prefixValue >> (longer.prefixWidth - shorter.prefixWidth);

      if (truncated === shorter.prefixValue) {
        throw new Error(
          `Entity type prefixes overlap: '${left.type}' and '${right.type}'.`,
        );
      }
    });
  });
};

validateRegistry(entityTypeRegistry);

const registrationsByType = new Map(
  entityTypeRegistry.map((entry) => [entry.type, entry] as const),
);

const registrationsByWidth = new Map<
  number,
  Map<number, EntityTypeRegistration>
>();
entityTypeRegistry.forEach((entry) => {
  const byPrefix =
    registrationsByWidth.get(entry.prefixWidth) ??
    new Map<number, EntityTypeRegistration>();
  byPrefix.set(entry.prefixValue, entry);
  registrationsByWidth.set(entry.prefixWidth, byPrefix);
});

const decodeWidths = [...registrationsByWidth.keys()].sort(
  (left, right) => left - right,
);

const registrationFor = (type: EntityType): EntityTypeRegistration => {
  const entry = registrationsByType.get(type);
  if (!entry) {
    throw new Error(`Entity type '${type}' has no registered prefix.`);
  }
  return entry;
};

const fallbackRegistration = registrationFor("other");

const shiftOf = (entry: EntityTypeRegistration): bigint =>
  BigInt(ID_BITS - entry.prefixWidth);

const seqMaskOf = (entry: EntityTypeRegistration): bigint =>
  (1n << shiftOf(entry)) - 1n;

/**
 * Largest sequence number an entity type can carry.
 */
export const maxSequenceFor = (type: EntityType): bigint =>
  seqMaskOf(registrationFor(type));

/**
 * Packs a type tag and sequence number into one signed 64-bit identifier.
 * Throws RangeError when the sequence number is outside the type's budget.
 */
export const encodeEntityId = (
  type: EntityType,
  seq: bigint | number,
): bigint => {
  const entry = registrationFor(type);

  if (typeof seq === "number" && !Number.isSafeInteger(seq)) {
    throw new RangeError(`Sequence number ${seq} is not a safe integer.`);
  }

  const sequence = BigInt(seq);
  const max = seqMaskOf(entry);
  if (sequence < 0n || sequence > max) {
    throw new RangeError(
      `Sequence number ${sequence} is outside the ${entry.label} range 0..${max}.`,
    );
  }

  return BigInt.asIntN(
    ID_BITS,
    (BigInt(entry.prefixValue) << shiftOf(entry)) | sequence,
  );
};

/**
 * Recovers the type tag and sequence number. Unknown prefixes decode as `other`.
 */
export const decodeEntityId = (id: bigint): DecodedEntityId => {
  const unsigned = BigInt.asUintN(ID_BITS, id);

  for (const width of decodeWidths) {
    const prefix = Number(unsigned >> BigInt(ID_BITS - width));
    const entry = registrationsByWidth.get(width)?.get(prefix);
    if (entry) {
      return { type: entry.type, seq: unsigned & seqMaskOf(entry) };
    }
  }

  return {
    type: fallbackRegistration.type,
    seq: unsigned & seqMaskOf(fallbackRegistration),
  };
};

/**
 * Returns the signed identifier range covering every id of one type, for range scans.
 */
export const entityIdRange = (
  type: EntityType,
): { min: bigint; max: bigint } => {
  const entry = registrationFor(type);
  const base = BigInt(entry.prefixValue) << shiftOf(entry);
  return {
    min: BigInt.asIntN(ID_BITS, base),
    max: BigInt.asIntN(ID_BITS, base | seqMaskOf(entry)),
  };
};

export const entityTypeLabel = (type: EntityType): string =>
  registrationFor(type).label;

export const isEntityType = (value: string): value is EntityType =>
  entityTypes.some((type) => type === value);

const aliasTable = new Map<string, EntityType>();
Object.entries(assetTypeAliases).forEach(([alias, type]) => {
  if (!isEntityType(type)) {
    throw new Error(`Asset type alias '${alias}' maps to unknown '${type}'.`);
  }
  aliasTable.set(alias, type);
});

/**
 * Maps vendor asset-type strings ("Common Stock", "ETF", "Digital Currency") to an entity type.
 */
export const parseEntityType = (raw: string): EntityType => {
  const normalized = raw.toUpperCase().replace(/[\s_-]/g, "");
  return aliasTable.get(normalized) ?? fallbackRegistration.type;
};

export const isEquityLike = (type: EntityType): boolean =>
  type === "equity" ||
  type === "preferred_stock" ||
  type === "etf" ||
  type === "reit" ||
  type === "adr";
