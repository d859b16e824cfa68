import {
  bigint,
  boolean,
  doublePrecision,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  varchar,
} from "drizzle-orm/pg-core";

export const symbolsTable = pgTable(
  "symbols",
  {
    sid: bigint("sid", { mode: "bigint" }).primaryKey(),
    symbol: text("symbol").notNull(),
    name: text("name").notNull(),
    entityType: text("entity_type").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    symbolIdx: uniqueIndex("symbols_symbol_uidx").on(table.symbol),
  }),
);

export const symbolMappingsTable = pgTable(
  "symbol_mappings",
  {
    sid: bigint("sid", { mode: "bigint" })
      .notNull()
      .references(() => symbolsTable.sid, { onDelete: "cascade" }),
    sourceName: varchar("source_name", { length: 50 }).notNull(),
    sourceIdentifier: text("source_identifier").notNull(),
    verified: boolean("verified").notNull().default(false),
    lastVerifiedAt: timestamp("last_verified_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    sidSourceIdx: uniqueIndex("symbol_mappings_sid_source_uidx").on(
      table.sid,
      table.sourceName,
    ),
  }),
);

export const apiResponseCacheTable = pgTable(
  "api_response_cache",
  {
    cacheKey: varchar("cache_key", { length: 255 }).primaryKey(),
    apiSource: varchar("api_source", { length: 50 }).notNull(),
    endpointUrl: text("endpoint_url").notNull(),
    responseData: jsonb("response_data").$type<unknown>().notNull(),
    statusCode: integer("status_code").notNull(),
    cachedAt: timestamp("cached_at", { withTimezone: true }).notNull(),
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    sourceExpiryIdx: index("api_response_cache_source_expiry_idx").on(
      table.apiSource,
      table.expiresAt,
    ),
  }),
);

export const quotesTable = pgTable(
  "quotes",
  {
    sid: bigint("sid", { mode: "bigint" })
      .notNull()
      .references(() => symbolsTable.sid, { onDelete: "cascade" }),
    source: varchar("source", { length: 50 }).notNull(),
    symbol: text("symbol").notNull(),
    price: doublePrecision("price").notNull(),
    open: doublePrecision("open"),
    high: doublePrecision("high"),
    low: doublePrecision("low"),
    previousClose: doublePrecision("previous_close"),
    change: doublePrecision("change"),
    changePercent: doublePrecision("change_percent"),
    volume: doublePrecision("volume"),
    asOf: timestamp("as_of", { withTimezone: true }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    sidAsOfIdx: uniqueIndex("quotes_sid_as_of_uidx").on(table.sid, table.asOf),
  }),
);

export const processRunsTable = pgTable(
  "process_runs",
  {
    id: text("id").primaryKey(),
    processName: text("process_name").notNull(),
    startedAt: timestamp("started_at", { withTimezone: true }).notNull(),
    endedAt: timestamp("ended_at", { withTimezone: true }),
    endState: text("end_state").notNull(),
    errorMessage: text("error_message"),
    recordsProcessed: integer("records_processed").notNull().default(0),
  },
  (table) => ({
    startedIdx: index("process_runs_started_idx").on(table.startedAt),
  }),
);
