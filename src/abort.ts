// src/abort.ts — Cooperative cancellation between files and stages

import { AnalysisAbortedError } from "./types.js";

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    const reason: unknown = signal.reason;
    throw new AnalysisAbortedError(
      reason instanceof Error ? `Analysis aborted: ${reason.message}` : "Analysis aborted",
    );
  }
}
