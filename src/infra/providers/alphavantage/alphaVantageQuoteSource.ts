import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import {
  boundaryError,
  type AppBoundaryError,
} from "../../../core/entities/appError";
import type { QuotePayload } from "../../../core/entities/quote";
import type {
  DataSourcePort,
  SourceFetchRequest,
  SourceFetchResult,
} from "../../../core/ports/inboundPorts";
import { HttpJsonClient } from "../../http/httpJsonClient";
import {
  parseNumber,
  redactUrl,
  toQuoteBoundaryError,
} from "../utils/httpErrorMapping";

const globalQuoteResponseSchema = z
  .object({
    "Global Quote": z.record(z.string()).optional(),
    Note: z.string().optional(),
    Information: z.string().optional(),
    "Error Message": z.string().optional(),
  })
  .passthrough();

const PROVIDER = "alphavantage";

/**
 * Reads the latest price from Alpha Vantage's GLOBAL_QUOTE endpoint.
 * Throttling arrives as a 200 with a Note/Information body and is classified here.
 */
export class AlphaVantageQuoteSource implements DataSourcePort<QuotePayload> {
  readonly name = PROVIDER;

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error(
        "ALPHA_VANTAGE_API_KEY is required when QUOTE_SOURCES includes alphavantage.",
      );
    }
  }

  async fetch(
    request: SourceFetchRequest,
  ): Promise<Result<SourceFetchResult<QuotePayload>, AppBoundaryError>> {
    const symbol = request.sourceIdentifier.trim().toUpperCase();
    const url = new URL("/query", this.baseUrl);
    url.searchParams.set("function", "GLOBAL_QUOTE");
    url.searchParams.set("symbol", symbol);
    url.searchParams.set("apikey", this.apiKey);

    const response = await this.httpClient.getJson(url, {
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err(toQuoteBoundaryError(PROVIDER, response.error));
    }

    const parsed = globalQuoteResponseSchema.safeParse(response.value.body);
    if (!parsed.success) {
      return err(
        this.failure("malformed_response", "Global quote payload was not an object.", {
          cause: parsed.error,
        }),
      );
    }

    const payload = parsed.data;
    const note = payload.Note?.trim() || payload.Information?.trim();
    if (note) {
      if (/rate|frequency|limit|calls per minute/i.test(note)) {
        return err(this.failure("rate_limited", note, { retryAfterMs: 60_000 }));
      }
      if (/premium/i.test(note)) {
        return err(this.failure("unsupported", note));
      }
      return err(this.failure("provider_error", note));
    }

    const errorMessage = payload["Error Message"]?.trim();
    if (errorMessage) {
      const isAuthError = /api ?key|unauthorized|authentication/i.test(
        errorMessage,
      );
      return err(
        this.failure(isAuthError ? "auth_invalid" : "not_found", errorMessage),
      );
    }

    const quote = payload["Global Quote"] ?? {};
    const price = parseNumber(quote["05. price"]);
    if (price === undefined) {
      return err(
        this.failure("not_found", `No Alpha Vantage quote for ${symbol}.`),
      );
    }

    const tradingDay = quote["07. latest trading day"];
    const asOf =
      tradingDay && /^\d{4}-\d{2}-\d{2}$/.test(tradingDay)
        ? `${tradingDay}T00:00:00.000Z`
        : new Date().toISOString();

    return ok({
      payload: {
        symbol: request.canonicalSymbol,
        price,
        open: parseNumber(quote["02. open"]),
        high: parseNumber(quote["03. high"]),
        low: parseNumber(quote["04. low"]),
        volume: parseNumber(quote["06. volume"]),
        previousClose: parseNumber(quote["08. previous close"]),
        change: parseNumber(quote["09. change"]),
        changePercent: parseNumber(quote["10. change percent"]),
        asOf,
      },
      endpointUrl: redactUrl(url, ["apikey"]),
      statusCode: response.value.status,
      sourceIdentifier: quote["01. symbol"] ?? symbol,
    });
  }

  private failure(
    code: AppBoundaryError["code"],
    message: string,
    extra: { retryAfterMs?: number; cause?: unknown } = {},
  ): AppBoundaryError {
    return boundaryError({
      source: "quotes",
      code,
      provider: PROVIDER,
      message,
      ...extra,
    });
  }
}
