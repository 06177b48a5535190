import { ProtocolError } from "@tracebound/types";
import type { ProtocolErrorCode } from "@tracebound/types";

export class WorkflowError extends ProtocolError {
  constructor(code: ProtocolErrorCode, message: string) {
    super(code, message);
    this.name = "WorkflowError";
  }
}
