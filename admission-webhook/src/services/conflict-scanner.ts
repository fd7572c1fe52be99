import { fieldPath, invalidCause, type Cause } from "../domain/cause.js";
import {
  targetsEqual,
  type RestoreSummary,
  type RestoreTarget,
} from "../domain/restore.js";
import type { RestoreIndex } from "../ports/cluster-readers.js";
import { AdmissionFaultError } from "./errors.js";
import { throwIfCanceled } from "./lookup.js";

export interface ScanConflictsInput {
  readonly namespace: string;
  readonly target: RestoreTarget;
  readonly signal?: AbortSignal;
}

/**
 * Flags incomplete restores aimed at the same target. The snapshot name is
 * not compared. Admission and persistence are not atomic, so this only
 * catches restores already visible in the index.
 */
export class ConflictScanner {
  constructor(private readonly index: RestoreIndex) {}

  async scan(input: ScanConflictsInput): Promise<Cause[]> {
    const { namespace, target, signal } = input;
    throwIfCanceled(signal, "listing VirtualMachineRestores");

    let restores: readonly RestoreSummary[];
    try {
      restores = await this.index.listRestoresInNamespace(namespace, { signal });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new AdmissionFaultError(
        `failed to list VirtualMachineRestores in ${namespace}: ${reason}`,
        { cause: error },
      );
    }
    throwIfCanceled(signal, "scanning VirtualMachineRestores");

    return restores
      .filter(
        (restore) =>
          targetsEqual(restore.target, target) && restore.complete !== true,
      )
      .map((restore) =>
        invalidCause(
          `VirtualMachineRestore ${JSON.stringify(restore.name)} in progress`,
          fieldPath("spec", "target"),
        ),
      );
  }
}
