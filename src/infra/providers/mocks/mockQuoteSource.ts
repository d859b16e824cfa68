import { err, ok, type Result } from "neverthrow";
import {
  boundaryError,
  type AppBoundaryError,
} from "../../../core/entities/appError";
import type { QuotePayload } from "../../../core/entities/quote";
import type { ClockPort } from "../../../core/ports/outboundPorts";
import type {
  DataSourcePort,
  SourceFetchRequest,
  SourceFetchResult,
} from "../../../core/ports/inboundPorts";

const priceSeed = (symbol: string): number =>
  [...symbol].reduce(
    (total, char, index) => total + char.charCodeAt(0) * (index + 1),
    0,
  );

/**
 * Emits deterministic quotes so the loader can run end to end without vendor keys.
 */
export class MockQuoteSource implements DataSourcePort<QuotePayload> {
  readonly name = "mock";

  constructor(
    private readonly clock: ClockPort,
    private readonly unknownSymbols: ReadonlySet<string> = new Set(),
  ) {}

  async fetch(
    request: SourceFetchRequest,
  ): Promise<Result<SourceFetchResult<QuotePayload>, AppBoundaryError>> {
    const symbol = request.sourceIdentifier.trim().toUpperCase();
    if (!symbol || this.unknownSymbols.has(symbol)) {
      return err(
        boundaryError({
          source: "quotes",
          code: "not_found",
          provider: this.name,
          message: `Mock source has no quote for '${symbol}'.`,
        }),
      );
    }

    const previousClose = (priceSeed(symbol) % 500) + 10;
    const change = Number((((priceSeed(symbol) % 21) - 10) / 4).toFixed(2));
    const price = Number((previousClose + change).toFixed(2));

    return ok({
      payload: {
        symbol: request.canonicalSymbol,
        price,
        open: previousClose,
        high: Math.max(price, previousClose),
        low: Math.min(price, previousClose),
        previousClose,
        change,
        changePercent: Number(((change / previousClose) * 100).toFixed(4)),
        volume: priceSeed(symbol) * 1_000,
        asOf: this.clock.now().toISOString(),
      },
      endpointUrl: `mock://quote/${symbol}`,
      statusCode: 200,
      sourceIdentifier: symbol,
    });
  }
}
