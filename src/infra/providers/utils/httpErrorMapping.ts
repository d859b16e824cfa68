import {
  boundaryError,
  type AppBoundaryError,
  type AppBoundaryErrorCode,
} from "../../../core/entities/appError";
import type { HttpClientError } from "../../http/httpJsonClient";

const mapHttpCode = (failure: HttpClientError): AppBoundaryErrorCode => {
  if (failure.code === "timeout") {
    return "timeout";
  }

  if (failure.code === "invalid_json") {
    return "invalid_json";
  }

  if (failure.code === "transport_error") {
    return "transport_error";
  }

  switch (failure.httpStatus) {
    case 429:
      return "rate_limited";
    case 401:
    case 403:
      return "auth_invalid";
    case 404:
      return "not_found";
    default:
      return "provider_error";
  }
};

/**
 * Classifies an HTTP client failure once at the adapter boundary.
 */
export const toQuoteBoundaryError = (
  provider: string,
  failure: HttpClientError,
): AppBoundaryError =>
  boundaryError({
    source: "quotes",
    code: mapHttpCode(failure),
    provider,
    message: failure.message,
    httpStatus: failure.httpStatus,
    retryAfterMs: failure.retryAfterMs,
    cause: failure.cause,
  });

/**
 * Strips credentials from a request URL before it is cached or logged.
 */
export const redactUrl = (url: URL, secretParams: string[]): string => {
  const copy = new URL(url.toString());
  secretParams.forEach((name) => {
    if (copy.searchParams.has(name)) {
      copy.searchParams.set(name, "REDACTED");
    }
  });
  return copy.toString();
};

export const parseNumber = (raw: string | number | undefined): number | undefined => {
  if (raw === undefined) {
    return undefined;
  }
  const parsed =
    typeof raw === "number" ? raw : Number.parseFloat(raw.replace("%", ""));
  return Number.isFinite(parsed) ? parsed : undefined;
};
