/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "rate_limited"
  | "auth_invalid"
  | "config_invalid"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json"
  | "validation_error"
  | "not_found"
  | "unsupported"
  | "persistence_error";

/**
 * Groups error codes by the policy the loader applies to them.
 */
export type AppErrorKind =
  | "transient_rate_limited"
  | "transient_network"
  | "permanent_unsupported"
  | "permanent_auth_failure"
  | "data_integrity"
  | "not_found"
  | "persistence";

export type AppBoundarySource = "quotes" | "symbols" | "persistence";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: AppBoundarySource;
  code: AppBoundaryErrorCode;
  kind: AppErrorKind;
  provider: string;
  message: string;
  retryable: boolean;
  retryAfterMs?: number;
  httpStatus?: number;
  cause?: unknown;
};

const kindByCode: Record<AppBoundaryErrorCode, AppErrorKind> = {
  rate_limited: "transient_rate_limited",
  timeout: "transient_network",
  transport_error: "transient_network",
  provider_error: "transient_network",
  unsupported: "permanent_unsupported",
  auth_invalid: "permanent_auth_failure",
  config_invalid: "permanent_auth_failure",
  malformed_response: "data_integrity",
  invalid_json: "data_integrity",
  validation_error: "data_integrity",
  not_found: "not_found",
  persistence_error: "persistence",
};

export const errorKindFor = (code: AppBoundaryErrorCode): AppErrorKind =>
  kindByCode[code];

export const isTransientKind = (kind: AppErrorKind): boolean =>
  kind === "transient_rate_limited" || kind === "transient_network";

export type AppBoundaryErrorInput = Omit<AppBoundaryError, "kind" | "retryable">;

/**
 * Derives kind and retryability from the code so adapters never set them by hand.
 */
export const boundaryError = (
  input: AppBoundaryErrorInput,
): AppBoundaryError => {
  const kind = errorKindFor(input.code);
  return { ...input, kind, retryable: isTransientKind(kind) };
};

export const isAbortingError = (error: AppBoundaryError): boolean =>
  error.kind === "permanent_auth_failure";

export const toErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
