import {
  fieldPath,
  invalidCause,
  notFoundCause,
  type Cause,
} from "../domain/cause.js";
import type { VirtualMachineSnapshotReader } from "../ports/cluster-readers.js";
import { lookup } from "./lookup.js";

export interface ValidateSnapshotInput {
  readonly namespace: string;
  readonly snapshotName: string;
  readonly targetUid?: string;
  readonly targetVmExists: boolean;
  readonly signal?: AbortSignal;
}

const SNAPSHOT_FIELD = fieldPath("spec", "virtualMachineSnapshotName");

export class SnapshotValidator {
  constructor(private readonly snapshots: VirtualMachineSnapshotReader) {}

  async validate(input: ValidateSnapshotInput): Promise<Cause[]> {
    const { namespace, snapshotName, signal } = input;
    const quotedName = JSON.stringify(snapshotName);

    const snapshot = await lookup(
      `VirtualMachineSnapshot ${namespace}/${snapshotName}`,
      signal,
      () =>
        this.snapshots.getVirtualMachineSnapshot(namespace, snapshotName, {
          signal,
        }),
    );
    if (!snapshot) {
      return [
        notFoundCause(
          `VirtualMachineSnapshot ${quotedName} does not exist`,
          SNAPSHOT_FIELD,
        ),
      ];
    }

    const causes: Cause[] = [];

    if (snapshot.phase === "Failed") {
      causes.push(
        invalidCause(
          `VirtualMachineSnapshot ${quotedName} has failed and is invalid to use`,
          SNAPSHOT_FIELD,
        ),
      );
    }

    if (snapshot.readyToUse !== true) {
      causes.push(
        invalidCause(
          `VirtualMachineSnapshot ${quotedName} is not ready to use`,
          SNAPSHOT_FIELD,
        ),
      );
    }

    const differentVm =
      input.targetUid !== undefined &&
      snapshot.sourceUID !== undefined &&
      input.targetUid !== snapshot.sourceUID;
    if (differentVm && input.targetVmExists) {
      causes.push(
        invalidCause(
          "when snapshot source and restore target VMs are different, target VM must not exist",
          SNAPSHOT_FIELD,
        ),
      );
    }

    return causes;
  }
}
