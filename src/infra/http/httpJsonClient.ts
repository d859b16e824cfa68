import { err, ok, type Result } from "neverthrow";

export type HttpGetOptions = {
  timeoutMs: number;
  headers?: Record<string, string>;
};

export type HttpJsonResponse = {
  status: number;
  body: unknown;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  retryAfterMs?: number;
  cause?: unknown;
};

/**
 * Converts a Retry-After header (delta seconds or HTTP date) to milliseconds.
 */
export const parseRetryAfterMs = (
  header: string | null,
  now: number = Date.now(),
): number | undefined => {
  if (!header) {
    return undefined;
  }

  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1_000;
  }

  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) {
    return undefined;
  }
  return Math.max(0, at - now);
};

const isAbort = (error: unknown): boolean =>
  error instanceof DOMException && error.name === "AbortError";

/**
 * One GET per call with a hard timeout. Retrying is the loader pipeline's job.
 */
export class HttpJsonClient {
  /**
   * Bodies come back as `unknown`; adapters validate them.
   */
  async getJson(
    url: URL | string,
    options: HttpGetOptions,
  ): Promise<Result<HttpJsonResponse, HttpClientError>> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method: "GET",
        headers: options.headers,
        signal: controller.signal,
      });
    } catch (error) {
      clearTimeout(timer);
      return err(
        isAbort(error)
          ? {
              code: "timeout",
              message: `HTTP request timed out after ${options.timeoutMs}ms.`,
              cause: error,
            }
          : {
              code: "transport_error",
              message:
                error instanceof Error ? error.message : "HTTP transport failed.",
              cause: error,
            },
      );
    }

    try {
      if (!response.ok) {
        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryAfterMs: parseRetryAfterMs(response.headers.get("retry-after")),
        });
      }

      const body: unknown = await response.json();
      return ok({ status: response.status, body });
    } catch (error) {
      return err(
        isAbort(error)
          ? {
              code: "timeout",
              message: `HTTP body read timed out after ${options.timeoutMs}ms.`,
              httpStatus: response.status,
              cause: error,
            }
          : {
              code: "invalid_json",
              message: "HTTP response body was not valid JSON.",
              httpStatus: response.status,
              cause: error,
            },
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
