/**
 * @tracebound/trace: Execution trace ledger.
 *
 * @packageDocumentation
 */

export { ExecutionTraceLedger, HopRecordedSchema } from "./ledger.js";
export type {
  ExecutionTraceLedgerOptions,
  HopRecordedPayload,
  TraceSummary,
} from "./ledger.js";
export { NoopTraceRecorder } from "./noop-recorder.js";
export { TraceError } from "./errors.js";
