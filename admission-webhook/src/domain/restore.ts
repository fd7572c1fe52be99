import { z } from "zod";

export const RESTORE_GROUP = "snapshot.kubevirt.io";
export const RESTORE_RESOURCE = "virtualmachinerestores";

export const restoreTargetSchema = z.object({
  apiGroup: z
    .string()
    .nullish()
    .transform((value) => value ?? undefined),
  kind: z.string().default(""),
  name: z.string().default(""),
});

export type RestoreTarget = z.infer<typeof restoreTargetSchema>;

// Absent members decode to zero values so that create checks report them as
// causes. Unknown spec members are kept so that they take part in the update
// check.
export const restoreSpecSchema = z
  .object({
    target: restoreTargetSchema.default({}),
    virtualMachineSnapshotName: z.string().default(""),
    patches: z.array(z.string()).nullish().transform((value) => value ?? undefined),
  })
  .passthrough();

export type RestoreSpec = z.infer<typeof restoreSpecSchema>;

export const virtualMachineRestoreSchema = z.object({
  metadata: z
    .object({
      name: z.string().optional(),
      namespace: z.string().optional(),
    })
    .passthrough()
    .default({}),
  spec: restoreSpecSchema.default({}),
  status: z
    .object({
      complete: z.boolean().nullish(),
    })
    .passthrough()
    .nullish(),
});

export type VirtualMachineRestore = z.infer<typeof virtualMachineRestoreSchema>;

export interface RestoreSummary {
  readonly name: string;
  readonly target: RestoreTarget;
  readonly complete?: boolean;
}

export type DecodeRestoreResult =
  | { readonly ok: true; readonly restore: VirtualMachineRestore }
  | { readonly ok: false; readonly message: string };

/**
 * Decodes an admission object into a restore. Accepts either the JSON text
 * of the object or the already parsed value.
 */
export function decodeRestore(raw: unknown): DecodeRestoreResult {
  let value: unknown = raw;
  if (typeof raw === "string") {
    try {
      value = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return { ok: false, message: `invalid JSON: ${reason}` };
    }
  }

  const parsed = virtualMachineRestoreSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, message: formatIssues(parsed.error) };
  }
  return { ok: true, restore: parsed.data };
}

export function targetsEqual(left: RestoreTarget, right: RestoreTarget): boolean {
  return (
    left.apiGroup === right.apiGroup &&
    left.kind === right.kind &&
    left.name === right.name
  );
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}
