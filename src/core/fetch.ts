import { Agent, fetch as undiciFetch, type RequestInit, type Response } from "undici";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export function createFetch(ignoreHttpsErrors: boolean): FetchFn {
  const dispatcher = getFetchDispatcher(ignoreHttpsErrors);
  return (url, init) => undiciFetch(url, { ...init, dispatcher });
}

/**
 * Aborts the request if no response headers arrive within `timeoutMs`.
 * The body is read by the caller after the timer is cleared.
 */
export async function fetchWithTimeout(
  fetchFn: FetchFn,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetchFn(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
  }
}
