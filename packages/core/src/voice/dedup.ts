import { fingerprint } from "../fingerprint/index.js";

/**
 * Remembers the last audio transcribed per session so a client that
 * re-delivers the same recording does not trigger a second transcription.
 * Only successful transcriptions are remembered; a failed one can be retried.
 */
export interface InputDeduplicator {
  /** True when `bytes` match the session's last processed input. */
  isDuplicate(sessionId: string, bytes: Uint8Array): boolean;
  markProcessed(sessionId: string, bytes: Uint8Array): void;
}

export interface InputDeduplicatorOptions {
  /** Sessions kept before the least recently used is dropped. Default 1000. */
  maxSessions?: number;
}

export function createInputDeduplicator(
  options: InputDeduplicatorOptions = {},
): InputDeduplicator {
  const maxSessions = options.maxSessions ?? 1000;
  const lastProcessed = new Map<string, string>();

  return {
    isDuplicate(sessionId, bytes) {
      return lastProcessed.get(sessionId) === fingerprint(bytes);
    },

    markProcessed(sessionId, bytes) {
      // Re-insert so iteration order tracks recency.
      lastProcessed.delete(sessionId);
      lastProcessed.set(sessionId, fingerprint(bytes));
      if (lastProcessed.size > maxSessions) {
        const oldest = lastProcessed.keys().next();
        if (!oldest.done) lastProcessed.delete(oldest.value);
      }
    },
  };
}
