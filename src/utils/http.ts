import { setDefaultResultOrder } from "node:dns";

setDefaultResultOrder("ipv4first");

export type HttpError = Error & {
  status?: number;
  url?: string;
  body?: string;
};

type FetchTextOptions = RequestInit & {
  timeoutMs?: number;
};

function buildError(
  message: string,
  status: number | undefined,
  url: string,
  body?: string
): HttpError {
  const err: HttpError = new Error(message);
  err.status = status;
  err.url = url;
  if (body) {
    err.body = body;
  }
  return err;
}

export function isHttpError(error: unknown): error is HttpError {
  return error instanceof Error && "url" in error;
}

/**
 * Returns the response body as text. Bodies are not parsed here because the
 * analytics backend may cut them off mid-document.
 */
export async function fetchText(
  url: string,
  options: FetchTextOptions = {}
): Promise<string> {
  const { timeoutMs, ...init } = options;
  const controller = timeoutMs ? new AbortController() : undefined;
  const timeoutId = timeoutMs
    ? setTimeout(() => controller?.abort(), timeoutMs)
    : undefined;

  try {
    const response = await fetch(url, {
      ...init,
      signal: controller?.signal
    });

    const text = await response.text();
    if (!response.ok) {
      throw buildError(
        `Request failed with status ${response.status}`,
        response.status,
        url,
        text
      );
    }
    return text;
  } catch (error) {
    if (isHttpError(error)) {
      throw error;
    }
    if (error instanceof Error && error.name === "AbortError") {
      throw buildError("Request timed out", undefined, url);
    }
    if (error instanceof Error) {
      throw buildError(error.message, undefined, url);
    }
    throw buildError("Unknown request error", undefined, url);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}
