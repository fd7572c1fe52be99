import { z } from "zod";
import { invalidCause, type Cause } from "../domain/cause.js";

const patchOperationSchema = z
  .object({
    op: z.string().optional(),
    path: z.string().optional(),
  })
  .passthrough();

const patchDocumentSchema = z.union([
  patchOperationSchema,
  z.array(patchOperationSchema).min(1),
]);

export type PatchOperation = z.infer<typeof patchOperationSchema>;

// A path must reach strictly below one of these.
const PERMITTED_PREFIXES: readonly (readonly string[])[] = [
  ["metadata", "labels"],
  ["metadata", "annotations"],
  ["spec"],
];

/**
 * Decodes one patch entry into its operations, or null when the entry is not
 * a JSON patch operation (or a list of them).
 */
export function decodePatch(raw: string): PatchOperation[] | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = patchDocumentSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }
  return Array.isArray(parsed.data) ? parsed.data : [parsed.data];
}

export function parsePointer(pointer: string): string[] | null {
  if (!pointer.startsWith("/")) {
    return null;
  }
  return pointer
    .slice(1)
    .split("/")
    .map((segment) => segment.replace(/~1/g, "/").replace(/~0/g, "~"));
}

export function isPermittedPatchPath(pointer: string): boolean {
  const segments = parsePointer(pointer);
  if (!segments) {
    return false;
  }
  return PERMITTED_PREFIXES.some(
    (prefix) =>
      segments.length > prefix.length &&
      prefix.every((segment, index) => segments[index] === segment),
  );
}

export function validatePatches(
  patches: readonly string[],
  field: string,
): Cause[] {
  const causes: Cause[] = [];

  for (const patch of patches) {
    const operations = decodePatch(patch);
    if (!operations) {
      causes.push(
        invalidCause(
          `patch format is not valid - expected a JSON patch operation object: ${patch}`,
          field,
        ),
      );
      continue;
    }

    for (const operation of operations) {
      if (operation.path === undefined || isPermittedPatchPath(operation.path)) {
        continue;
      }
      causes.push(
        invalidCause(
          `patching is valid only for elements under /spec/: ${operation.path}`,
          field,
        ),
      );
    }
  }

  return causes;
}
