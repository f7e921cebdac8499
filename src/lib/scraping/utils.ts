import { config } from "../config";
import { ProxyAgent, fetch as undiciFetch } from "undici";
import { FetchError, errorMessage } from "../errors";

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  return new ProxyAgent(proxyUrl);
}

export interface FetchPageOptions {
  /** Extra attempts after the first (0 or 1) */
  retries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  /** Text that marks a bot-check or access-denied page */
  blockMarkers?: string[];
}

function isRetryable(status: number): boolean {
  return status === 0 || status === 429 || status >= 500;
}

export function findBlockMarker(html: string, markers: string[]): string | null {
  for (const marker of markers) {
    if (html.includes(marker)) return marker;
  }
  return null;
}

async function attemptFetch(
  url: string,
  attempts: number,
  timeoutMs: number,
  blockMarkers: string[],
  dispatcher: ProxyAgent | undefined
): Promise<string | FetchError> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const fetchOptions: Parameters<typeof undiciFetch>[1] = {
      headers: {
        "User-Agent": config.getRandomUserAgent(),
        Accept:
          "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "en-US,en;q=0.9",
      },
      signal: controller.signal,
      dispatcher,
    };

    const response = await undiciFetch(url, fetchOptions);

    if (!response.ok) {
      return new FetchError(url, `HTTP ${response.status} for ${url}`, response.status, attempts);
    }

    const body = await response.text();
    const marker = findBlockMarker(body, blockMarkers);
    if (!marker) return body;
    // Block pages fail as a non-retryable 403
    return new FetchError(url, `Blocked ("${marker}") at ${url}`, 403, attempts);
  } catch (error: unknown) {
    const reason =
      error instanceof Error && error.name === "AbortError"
        ? `Timed out after ${timeoutMs}ms`
        : errorMessage(error);
    return new FetchError(url, `${reason} for ${url}`, 0, attempts, { cause: error });
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Fetch a page as text. Timeouts, network errors, 429 and 5xx get
 * `retries` more attempts; other statuses and block pages fail at once.
 */
export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<string> {
  const {
    retries = 1,
    retryDelayMs = 2000,
    timeoutMs = config.fetchTimeoutMs,
    blockMarkers = [],
  } = options;

  const dispatcher = getProxyDispatcher();

  for (let attempt = 0; ; attempt++) {
    const result = await attemptFetch(url, attempt + 1, timeoutMs, blockMarkers, dispatcher);
    if (typeof result === "string") return result;
    if (!isRetryable(result.status) || attempt >= retries) throw result;

    console.warn(`[fetch] ${result.message}, retrying (${attempt + 1}/${retries + 1})`);
    await delay(retryDelayMs);
  }
}
