import { setTimeout as sleep } from 'node:timers/promises';
import { performance } from 'node:perf_hooks';
import { FetchHttpClient, type HttpClient } from './httpClient.js';
import { parseDocument } from './dom.js';

/**
 * Shared by every fetch in a run. `lastReservedTime` only moves forward.
 */
export interface FetcherState {
  readonly client: HttpClient;
  readonly minIntervalMs: number;
  lastReservedTime: number;
  readonly now: () => number;
  readonly sleep: (ms: number) => Promise<void>;
}

export interface FetcherOptions {
  minIntervalMs?: number;
  timeoutMs?: number;
  userAgent?: string;
  client?: HttpClient;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface FetchPageResult {
  document: Document | null;
  state: FetcherState;
  /** HTTP status when a response arrived. */
  status?: number;
  /** Why document is null. */
  reason?: string;
}

export interface SlotReservation {
  startAt: number;
  waitMs: number;
}

export function createFetcherState(options: FetcherOptions = {}): FetcherState {
  return {
    client:
      options.client ??
      new FetchHttpClient({ timeoutMs: options.timeoutMs, userAgent: options.userAgent }),
    minIntervalMs: options.minIntervalMs ?? 1000,
    lastReservedTime: Number.NEGATIVE_INFINITY,
    now: options.now ?? (() => performance.now()),
    sleep: options.sleep ?? ((ms) => sleep(ms)),
  };
}

/**
 * Claim the next start slot. Synchronous on purpose: with no await inside,
 * the read-modify-write cannot interleave with another caller.
 */
export function reserveSlot(state: FetcherState): SlotReservation {
  const now = state.now();
  const elapsed = now - state.lastReservedTime;
  const waitMs = elapsed < state.minIntervalMs ? state.minIntervalMs - elapsed : 0;
  const startAt = now + waitMs;
  state.lastReservedTime = Math.max(state.lastReservedTime, startAt);
  return { startAt, waitMs };
}

/**
 * Fetch and parse one page. The slot is reserved first; waiting and network
 * I/O happen afterwards so concurrent callers overlap their requests.
 * Anything but a 200 yields a null document. No retries.
 */
export async function fetchPage(state: FetcherState, url: string): Promise<FetchPageResult> {
  const { waitMs } = reserveSlot(state);
  if (waitMs > 0) {
    await state.sleep(waitMs);
  }

  try {
    const response = await state.client.get(url);
    if (response.status !== 200) {
      return { document: null, state, status: response.status, reason: `HTTP ${response.status}` };
    }
    return { document: parseDocument(response.body, url), state, status: response.status };
  } catch (err) {
    return { document: null, state, reason: err instanceof Error ? err.message : String(err) };
  }
}

export async function closeFetcher(state: FetcherState): Promise<void> {
  await state.client.close();
}
