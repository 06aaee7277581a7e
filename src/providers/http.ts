/**
 * JSON-over-HTTP transport shared by the three backend clients.
 *
 * One POST per call, a fixed timeout, no retries. Every failure
 * becomes a BackendError naming the service and URL.
 */

import { BackendError, type BackendService } from '../errors/index.js';
import { tryParseJson, isJsonObject } from '../utils/json.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Join a base URL and a path without doubling slashes.
 */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export interface PostJsonOptions {
  timeoutMs: number;
  logger?: Logger;
}

/**
 * POST a JSON body and return the decoded JSON object.
 *
 * @throws BackendError on transport failure, timeout, non-2xx status,
 *   a body that is not JSON, or JSON that is not an object
 */
export async function postJson(
  service: BackendService,
  url: string,
  payload: unknown,
  options: PostJsonOptions
): Promise<Record<string, unknown>> {
  const logger = options.logger ?? silentLogger;
  logger.debug?.(`POST ${url} (${service})`);

  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);

  let response: Response;
  let body: string;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify(payload),
      signal: controller.signal,
    });
    body = await response.text();
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    const message = timedOut
      ? `Request timed out after ${options.timeoutMs}ms`
      : `Request failed: ${cause.message}`;
    throw new BackendError(service, url, message, { cause });
  } finally {
    clearTimeout(timeout);
  }

  if (!response.ok) {
    throw new BackendError(service, url, `HTTP ${response.status} ${response.statusText}`.trim(), {
      status: response.status,
    });
  }

  const parsed = tryParseJson(body);
  if (!parsed.ok) {
    throw new BackendError(service, url, `Response is not valid JSON: ${parsed.error}`, {
      status: response.status,
    });
  }

  if (!isJsonObject(parsed.value)) {
    throw new BackendError(service, url, 'Response is not a JSON object', {
      status: response.status,
    });
  }

  return parsed.value;
}
