import type { Fix, RawFixPayload } from "../types";
import { normalizeFix, validateFix } from "../utils/fix";
import { errorMessage, logRejectedMessage } from "../utils/rejects";

export type PushResult =
  | { accepted: true; isLatest: boolean; fix: Fix }
  | { accepted: false; error: string };

type PositionFeedOptions = {
  historySize: number;
  historyWindowMs: number;
};

export type PositionFeed = {
  push: (fix: Fix, source?: string) => PushResult;
  ingest: (raw: RawFixPayload, source?: string, receivedAt?: number) => PushResult;
  latest: () => Fix | null;
  history: (windowMs?: number) => Fix[];
  size: () => number;
  reset: () => void;
};

export function createPositionFeed(options: PositionFeedOptions): PositionFeed {
  const capacity = Math.max(1, Math.floor(options.historySize));
  // ascending by timestamp
  let entries: Fix[] = [];
  let latestFix: Fix | null = null;

  function reject(error: unknown, source: string | undefined): PushResult {
    const message = errorMessage(error);
    logRejectedMessage("invalid_fix", { topic: source, message });
    return { accepted: false, error: message };
  }

  function insert(fix: Fix): void {
    let index = entries.length;
    while (index > 0 && entries[index - 1].timestamp > fix.timestamp) {
      index -= 1;
    }

    if (entries.length >= capacity) {
      if (index === 0) return;
      entries = [...entries.slice(1, index), fix, ...entries.slice(index)];
      return;
    }

    entries = [...entries.slice(0, index), fix, ...entries.slice(index)];
  }

  function accept(fix: Fix): PushResult {
    insert(fix);
    const isLatest = latestFix === null || fix.timestamp >= latestFix.timestamp;
    if (isLatest) {
      latestFix = fix;
    }
    return { accepted: true, isLatest, fix };
  }

  function push(fix: Fix, source?: string): PushResult {
    try {
      validateFix(fix);
    } catch (error) {
      return reject(error, source);
    }
    return accept(Object.isFrozen(fix) ? fix : Object.freeze({ ...fix }));
  }

  function ingest(
    raw: RawFixPayload,
    source?: string,
    receivedAt = Date.now(),
  ): PushResult {
    let fix: Fix;
    try {
      fix = normalizeFix(raw, receivedAt);
    } catch (error) {
      return reject(error, source);
    }
    return accept(fix);
  }

  function latest(): Fix | null {
    return latestFix;
  }

  function history(windowMs = options.historyWindowMs): Fix[] {
    if (!latestFix) return [];
    const since = latestFix.timestamp - Math.max(0, windowMs);
    return entries.filter((fix) => fix.timestamp >= since);
  }

  function size(): number {
    return entries.length;
  }

  function reset(): void {
    entries = [];
    latestFix = null;
  }

  return { push, ingest, latest, history, size, reset };
}
