import type { TraceHop, TraceRecorder } from "@tracebound/types";

/**
 * Recorder for engines running without a ledger. Records nothing.
 */
export class NoopTraceRecorder implements TraceRecorder {
  readonly enabled = false;

  recordHop(): TraceHop | undefined {
    return undefined;
  }
}
