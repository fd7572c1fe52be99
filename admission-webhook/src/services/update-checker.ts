import { isDeepStrictEqual } from "node:util";
import { fieldPath, invalidCause, type Cause } from "../domain/cause.js";
import type { RestoreSpec } from "../domain/restore.js";

export function checkSpecImmutable(
  previous: RestoreSpec,
  next: RestoreSpec,
): Cause[] {
  if (isDeepStrictEqual(normalizeSpec(previous), normalizeSpec(next))) {
    return [];
  }
  return [invalidCause("spec is immutable after creation", fieldPath("spec"))];
}

// An absent list and an empty list are the same spec.
function normalizeSpec(spec: RestoreSpec): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(spec)) {
    if (value === undefined || value === null) {
      continue;
    }
    if (Array.isArray(value) && value.length === 0) {
      continue;
    }
    normalized[key] =
      key === "target" ? normalizeTarget(spec.target) : value;
  }
  return normalized;
}

function normalizeTarget(target: RestoreSpec["target"]): Record<string, string> {
  const normalized: Record<string, string> = {
    kind: target.kind,
    name: target.name,
  };
  if (target.apiGroup !== undefined) {
    normalized.apiGroup = target.apiGroup;
  }
  return normalized;
}
