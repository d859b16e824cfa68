import { err, ok, type Result } from "neverthrow";
import {
  boundaryError,
  toErrorMessage,
  type AppBoundaryError,
} from "../../core/entities/appError";
import {
  entityIdRange,
  parseEntityType,
  type EntityType,
} from "../../core/entities/entityId";
import type { FetchTask } from "../../core/entities/loader";
import type { SymbolEntity } from "../../core/entities/security";
import type {
  ClockPort,
  SymbolRepositoryPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { IdGenerator } from "./idGenerator";

export type SymbolRegistration = {
  symbol: string;
  name?: string;
  assetType: string;
};

export type RegisteredSymbol = {
  entity: SymbolEntity;
  created: boolean;
};

const symbolsError = (
  code: "validation_error" | "not_found" | "persistence_error",
  message: string,
  cause?: unknown,
): AppBoundaryError =>
  boundaryError({
    source: code === "persistence_error" ? "persistence" : "symbols",
    code,
    provider: "registry",
    message,
    cause,
  });

/**
 * Registers symbols under typed identifiers and turns symbol lists into fetch tasks.
 */
export class SymbolRegistryService {
  private readonly generators = new Map<EntityType, Promise<IdGenerator>>();

  constructor(
    private readonly symbols: SymbolRepositoryPort,
    private readonly clock: ClockPort,
    private readonly sources: readonly string[],
  ) {}

  /**
   * Assigns the next id of the parsed entity type. Registering a known symbol returns it unchanged.
   */
  async register(
    input: SymbolRegistration,
  ): Promise<Result<RegisteredSymbol, AppBoundaryError>> {
    const symbol = input.symbol.trim().toUpperCase();
    if (symbol.length === 0) {
      return err(symbolsError("validation_error", "Symbol must not be empty."));
    }

    try {
      const existing = await this.symbols.findBySymbol(symbol);
      if (existing) {
        return ok({ entity: existing, created: false });
      }

      const entityType = parseEntityType(input.assetType);
      const generator = await this.generatorFor(entityType);
      const entity: SymbolEntity = {
        sid: generator.next(),
        symbol,
        name: input.name?.trim() || symbol,
        entityType,
        createdAt: this.clock.now(),
      };
      const inserted = await this.insertOrAdopt(entity);
      if (inserted !== entity) {
        return ok({ entity: inserted, created: false });
      }

      logger.info(
        { sid: entity.sid.toString(), symbol, entityType },
        "Registered symbol",
      );
      return ok({ entity, created: true });
    } catch (error) {
      if (error instanceof RangeError) {
        return err(symbolsError("validation_error", error.message, error));
      }
      return err(
        symbolsError("persistence_error", toErrorMessage(error), error),
      );
    }
  }

  async list(): Promise<SymbolEntity[]> {
    return this.symbols.listAll();
  }

  /**
   * Resolves the requested symbols, or every registered symbol when none are given.
   * Each task carries the configured source priority.
   */
  async tasksFor(
    requested: readonly string[] = [],
  ): Promise<Result<FetchTask[], AppBoundaryError>> {
    try {
      if (requested.length === 0) {
        const all = await this.symbols.listAll();
        return ok(all.map((entity) => this.toTask(entity)));
      }

      const tasks: FetchTask[] = [];
      for (const raw of requested) {
        const found = await this.symbols.findBySymbol(raw);
        if (!found) {
          return err(
            symbolsError(
              "not_found",
              `Symbol ${raw.trim().toUpperCase()} is not registered.`,
            ),
          );
        }
        tasks.push(this.toTask(found));
      }
      return ok(tasks);
    } catch (error) {
      return err(
        symbolsError("persistence_error", toErrorMessage(error), error),
      );
    }
  }

  private toTask({ sid, symbol }: SymbolEntity): FetchTask {
    return { sid, symbol, sources: this.sources };
  }

  // A concurrent registration may win the unique symbol; return its row instead.
  private async insertOrAdopt(entity: SymbolEntity): Promise<SymbolEntity> {
    try {
      await this.symbols.insert(entity);
      return entity;
    } catch (error) {
      const winner = await this.symbols.findBySymbol(entity.symbol);
      if (winner) {
        logger.debug(
          { symbol: entity.symbol, sid: winner.sid.toString() },
          "Symbol registered concurrently; using existing row",
        );
        return winner;
      }
      throw error;
    }
  }

  private generatorFor(entityType: EntityType): Promise<IdGenerator> {
    const cached = this.generators.get(entityType);
    if (cached) {
      return cached;
    }

    const seeded = IdGenerator.fromScan(
      entityType,
      this.symbols.scanIds(entityIdRange(entityType)),
    );
    this.generators.set(entityType, seeded);
    // Forget failed scans so the next registration rescans.
    void seeded.catch(() => {
      this.generators.delete(entityType);
    });
    return seeded;
  }
}
