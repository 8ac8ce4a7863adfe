import nodeFetch from 'node-fetch';

export const DEFAULT_FETCH_HEADERS: Record<string, string> = { 'User-Agent': 'FairdayPlanner/1.0 (+weather-aware event planning)' };

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
}

export interface FetchRequestInit {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export type FetchLike = (url: string, init?: FetchRequestInit) => Promise<FetchResponseLike>;

export type FetchWithTimeout = (url: string, options?: FetchRequestInit, timeoutMs?: number) => Promise<FetchResponseLike>;

const fetchImpl: FetchLike = typeof globalThis.fetch === 'function' ? globalThis.fetch.bind(globalThis) : nodeFetch;

export const createFetchWithTimeout = (defaultTimeoutMs: number, fetcher: FetchLike = fetchImpl): FetchWithTimeout => async (
  url,
  options = {},
  timeoutMs = defaultTimeoutMs,
) => {
  const controller = new AbortController();
  const upstreamSignal = options.signal;
  const abortFromUpstream = () => {
    controller.abort(upstreamSignal?.reason);
  };
  if (upstreamSignal) {
    if (upstreamSignal.aborted) {
      abortFromUpstream();
    } else {
      upstreamSignal.addEventListener('abort', abortFromUpstream, { once: true });
    }
  }
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetcher(url, { ...options, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
    if (upstreamSignal) {
      upstreamSignal.removeEventListener('abort', abortFromUpstream);
    }
  }
};
