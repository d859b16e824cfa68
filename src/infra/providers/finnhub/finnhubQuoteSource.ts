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
import { redactUrl, toQuoteBoundaryError } from "../utils/httpErrorMapping";

const finnhubQuoteSchema = z.object({
  c: z.number(),
  d: z.number().nullable().optional(),
  dp: z.number().nullable().optional(),
  h: z.number().optional(),
  l: z.number().optional(),
  o: z.number().optional(),
  pc: z.number().optional(),
  t: z.number().optional(),
});

const finnhubErrorSchema = z.object({ error: z.string() });

const PROVIDER = "finnhub";

/**
 * Translates Finnhub /quote responses into the normalized quote payload.
 */
export class FinnhubQuoteSource implements DataSourcePort<QuotePayload> {
  readonly name = PROVIDER;

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error(
        "FINNHUB_API_KEY is required when QUOTE_SOURCES includes finnhub.",
      );
    }
  }

  async fetch(
    request: SourceFetchRequest,
  ): Promise<Result<SourceFetchResult<QuotePayload>, AppBoundaryError>> {
    const symbol = request.sourceIdentifier.trim().toUpperCase();
    const url = new URL("/api/v1/quote", this.baseUrl);
    url.searchParams.set("symbol", symbol);
    url.searchParams.set("token", this.apiKey);

    const response = await this.httpClient.getJson(url, {
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err(toQuoteBoundaryError(PROVIDER, response.error));
    }

    const apiError = finnhubErrorSchema.safeParse(response.value.body);
    if (apiError.success) {
      const isAuthError = /api key|token|unauthorized/i.test(
        apiError.data.error,
      );
      return err(
        this.failure(
          isAuthError ? "auth_invalid" : "provider_error",
          apiError.data.error,
        ),
      );
    }

    const parsed = finnhubQuoteSchema.safeParse(response.value.body);
    if (!parsed.success) {
      return err(
        this.failure("malformed_response", "Finnhub quote payload had an unexpected shape.", parsed.error),
      );
    }

    const quote = parsed.data;
    // Finnhub answers unknown symbols with an all-zero quote.
    if (quote.c === 0 && !quote.t) {
      return err(this.failure("not_found", `No Finnhub quote for ${symbol}.`));
    }

    return ok({
      payload: {
        symbol: request.canonicalSymbol,
        price: quote.c,
        open: quote.o,
        high: quote.h,
        low: quote.l,
        previousClose: quote.pc,
        change: quote.d ?? undefined,
        changePercent: quote.dp ?? undefined,
        asOf: quote.t
          ? new Date(quote.t * 1000).toISOString()
          : new Date().toISOString(),
      },
      endpointUrl: redactUrl(url, ["token"]),
      statusCode: response.value.status,
      sourceIdentifier: symbol,
    });
  }

  private failure(
    code: AppBoundaryError["code"],
    message: string,
    cause?: unknown,
  ): AppBoundaryError {
    return boundaryError({
      source: "quotes",
      code,
      provider: PROVIDER,
      message,
      cause,
    });
  }
}
