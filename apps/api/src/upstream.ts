import { externalError, serviceUnavailable } from "@playroom/shared";
import { log } from "./log.js";

export type UpstreamCall = {
  name: string;
  url: string;
  init: RequestInit;
  timeoutMs: number;
};

/**
 * One bounded attempt against a third-party API. Timeouts and network failures become
 * 503; any non-2xx answer becomes 502 with the provider's status in `details`.
 */
export const callUpstream = async ({ name, url, init, timeoutMs }: UpstreamCall) => {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(`${name}_timeout`), timeoutMs);
  timeout.unref?.();
  let response: Response;
  try {
    response = await fetch(url, { ...init, signal: controller.signal });
  } catch (error) {
    const timedOut = controller.signal.aborted && controller.signal.reason === `${name}_timeout`;
    log.warn("upstream.unreachable", {
      upstream: name,
      error: timedOut ? "timeout" : error instanceof Error ? error.message : "fetch_failed"
    });
    throw serviceUnavailable(`${name} is unavailable`);
  } finally {
    clearTimeout(timeout);
  }
  if (!response.ok) {
    const body = await response.text().catch(() => "");
    log.warn("upstream.rejected", { upstream: name, status: response.status, body: body.slice(0, 200) });
    throw externalError(`${name} rejected the request`, `status ${response.status}`);
  }
  return response;
};

export const readJson = async (name: string, response: Response): Promise<unknown> => {
  try {
    return await response.json();
  } catch {
    throw externalError(`${name} returned an unreadable response`);
  }
};
