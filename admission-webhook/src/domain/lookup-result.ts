/**
 * Outcome of a single read against the cluster. A missing object is an
 * expected answer, not an error; `fault` carries every other failure.
 */
export type LookupResult<T> =
  | { readonly status: "found"; readonly value: T }
  | { readonly status: "not_found" }
  | { readonly status: "fault"; readonly error: Error };

export function found<T>(value: T): LookupResult<T> {
  return { status: "found", value };
}

export function notFound<T>(): LookupResult<T> {
  return { status: "not_found" };
}

export function fault<T>(error: Error): LookupResult<T> {
  return { status: "fault", error };
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
