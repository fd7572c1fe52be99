/**
 * Aborts an admission call without rendering a decision. Raised for
 * infrastructure faults and for requests the webhook cannot interpret.
 */
export class AdmissionFaultError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AdmissionFaultError";
  }
}

export class AdmissionCanceledError extends AdmissionFaultError {
  constructor(stage: string) {
    super(`admission request canceled before ${stage}`);
    this.name = "AdmissionCanceledError";
  }
}
