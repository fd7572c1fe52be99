import type { LookupResult } from "../domain/lookup-result.js";
import { AdmissionCanceledError, AdmissionFaultError } from "./errors.js";

export function throwIfCanceled(
  signal: AbortSignal | undefined,
  stage: string,
): void {
  if (signal?.aborted) {
    throw new AdmissionCanceledError(stage);
  }
}

/**
 * Runs one read and collapses its result to the value or null. Faults and
 * cancellation abort the admission call.
 */
export async function lookup<T>(
  description: string,
  signal: AbortSignal | undefined,
  read: () => Promise<LookupResult<T>>,
): Promise<T | null> {
  throwIfCanceled(signal, `reading ${description}`);
  const result = await read();
  throwIfCanceled(signal, `using ${description}`);

  switch (result.status) {
    case "found":
      return result.value;
    case "not_found":
      return null;
    case "fault":
      throw new AdmissionFaultError(
        `failed to get ${description}: ${result.error.message}`,
        { cause: result.error },
      );
  }
}
