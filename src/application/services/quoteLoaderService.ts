import { z } from "zod";
import { boundaryError } from "../../core/entities/appError";
import {
  decodeEntityId,
  entityTypeLabel,
  isEquityLike,
} from "../../core/entities/entityId";
import type { FetchTask, LoaderRunReport } from "../../core/entities/loader";
import type { QuoteEntity, QuotePayload } from "../../core/entities/quote";
import type { LoaderPort, LoadRequest } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  QuoteRepositoryPort,
} from "../../core/ports/outboundPorts";
import type { LoaderDefinition, LoaderPipeline } from "./loaderPipeline";

export const QUOTES_PROCESS_NAME = "quotes_latest";

const finite = z.number().finite();

export const quotePayloadSchema = z.object({
  symbol: z.string().min(1),
  price: finite,
  open: finite.optional(),
  high: finite.optional(),
  low: finite.optional(),
  previousClose: finite.optional(),
  change: finite.optional(),
  changePercent: finite.optional(),
  volume: finite.optional(),
  asOf: z.string().datetime({ offset: true }),
});

/**
 * Rejects entities that no quote vendor prices, before any network call.
 */
export const validateQuoteTask = (task: FetchTask) => {
  const { type } = decodeEntityId(task.sid);
  if (isEquityLike(type)) {
    return null;
  }
  return boundaryError({
    source: "quotes",
    code: "unsupported",
    provider: "quotes",
    message: `Latest quotes are not loaded for ${entityTypeLabel(type)} ${task.symbol}.`,
  });
};

export const toQuoteEntity = (
  task: FetchTask,
  payload: QuotePayload,
  source: string,
  createdAt: Date,
): QuoteEntity => ({
  sid: task.sid,
  source,
  symbol: task.symbol,
  price: payload.price,
  open: payload.open ?? null,
  high: payload.high ?? null,
  low: payload.low ?? null,
  previousClose: payload.previousClose ?? null,
  change: payload.change ?? null,
  changePercent: payload.changePercent ?? null,
  volume: payload.volume ?? null,
  asOf: new Date(payload.asOf),
  createdAt,
});

/**
 * Loads latest quotes for registered equity-like symbols through the shared loader pipeline.
 */
export class QuoteLoaderService implements LoaderPort {
  private readonly definition: LoaderDefinition<QuotePayload>;

  constructor(
    private readonly pipeline: LoaderPipeline<QuotePayload>,
    private readonly quotes: QuoteRepositoryPort,
    private readonly clock: ClockPort,
    ttlMs: number,
  ) {
    this.definition = {
      processName: QUOTES_PROCESS_NAME,
      cachePrefix: "quotes",
      ttlMs,
      payloadSchema: quotePayloadSchema,
      validate: validateQuoteTask,
      persist: async (task, payload, source) => {
        await this.quotes.upsert(
          toQuoteEntity(task, payload, source, this.clock.now()),
        );
      },
    };
  }

  async load(request: LoadRequest): Promise<LoaderRunReport> {
    return this.pipeline.run(this.definition, request.tasks);
  }

  async latest(sid: bigint): Promise<QuoteEntity | null> {
    return this.quotes.latestBySid(sid);
  }
}
