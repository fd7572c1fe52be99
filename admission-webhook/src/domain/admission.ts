import type { Cause } from "./cause.js";

export const ADMISSION_API_VERSION = "admission.k8s.io/v1";
export const ADMISSION_REVIEW_KIND = "AdmissionReview";

export interface AdmissionResource {
  readonly group: string;
  readonly version?: string;
  readonly resource: string;
}

export interface AdmissionRequest {
  readonly uid: string;
  readonly operation: string;
  readonly resource: AdmissionResource;
  readonly namespace?: string;
  readonly object: unknown;
  readonly oldObject?: unknown;
}

export type AdmissionOutcome =
  | { readonly outcome: "allowed" }
  | { readonly outcome: "denied"; readonly causes: readonly Cause[] }
  | { readonly outcome: "error"; readonly message: string };

export interface AdmissionStatusCause {
  readonly reason: Cause["type"];
  readonly message: string;
  readonly field: string;
}

export interface AdmissionResponse {
  readonly uid: string;
  readonly allowed: boolean;
  readonly status?: {
    readonly code: number;
    readonly message: string;
    readonly reason?: "Invalid";
    readonly details?: { readonly causes: readonly AdmissionStatusCause[] };
  };
}

export interface AdmissionReviewResponse {
  readonly apiVersion: string;
  readonly kind: typeof ADMISSION_REVIEW_KIND;
  readonly response: AdmissionResponse;
}

export function toAdmissionResponse(
  uid: string,
  outcome: AdmissionOutcome,
): AdmissionResponse {
  switch (outcome.outcome) {
    case "allowed":
      return { uid, allowed: true };
    case "denied":
      return {
        uid,
        allowed: false,
        status: {
          code: 422,
          reason: "Invalid",
          message: outcome.causes.map((cause) => cause.message).join(", "),
          details: {
            causes: outcome.causes.map((cause) => ({
              reason: cause.type,
              message: cause.message,
              field: cause.field,
            })),
          },
        },
      };
    case "error":
      return {
        uid,
        allowed: false,
        status: { code: 400, message: outcome.message },
      };
  }
}

export function toAdmissionReview(
  uid: string,
  outcome: AdmissionOutcome,
  apiVersion: string = ADMISSION_API_VERSION,
): AdmissionReviewResponse {
  return {
    apiVersion,
    kind: ADMISSION_REVIEW_KIND,
    response: toAdmissionResponse(uid, outcome),
  };
}
