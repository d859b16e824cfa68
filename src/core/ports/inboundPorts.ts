import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { FetchTask, LoaderRunReport } from "../entities/loader";

export type SourceFetchRequest = {
  sid: bigint;
  canonicalSymbol: string;
  sourceIdentifier: string;
};

export type SourceFetchResult<P> = {
  payload: P;
  endpointUrl: string;
  statusCode: number;
  sourceIdentifier?: string;
};

/**
 * Vendor adapter contract: one identifier in, one normalized payload or a classified failure out.
 */
export interface DataSourcePort<P> {
  readonly name: string;
  fetch(
    request: SourceFetchRequest,
  ): Promise<Result<SourceFetchResult<P>, AppBoundaryError>>;
}

export type LoadRequest = {
  tasks: FetchTask[];
};

export interface LoaderPort {
  load(request: LoadRequest): Promise<LoaderRunReport>;
}
