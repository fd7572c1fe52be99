import { fieldPath, invalidCause, type Cause } from "../domain/cause.js";
import { isBackendStorageNeeded } from "../domain/virtual-machine.js";
import type {
  VirtualMachineReader,
  VirtualMachineSnapshotContentReader,
  VirtualMachineSnapshotReader,
} from "../ports/cluster-readers.js";
import { AdmissionFaultError } from "./errors.js";
import { lookup } from "./lookup.js";

export interface ValidateSourceInput {
  readonly namespace: string;
  readonly targetName: string;
  readonly snapshotName: string;
  readonly signal?: AbortSignal;
}

/**
 * Rejects restoring onto a VM other than the snapshot's source when the
 * frozen source VM keeps state on backend storage.
 */
export class SourceValidator {
  constructor(
    private readonly deps: {
      readonly virtualMachines: VirtualMachineReader;
      readonly snapshots: VirtualMachineSnapshotReader;
      readonly snapshotContents: VirtualMachineSnapshotContentReader;
    },
  ) {}

  async validate(input: ValidateSourceInput): Promise<Cause[]> {
    const { namespace, targetName, snapshotName, signal } = input;

    const snapshot = await lookup(
      `VirtualMachineSnapshot ${namespace}/${snapshotName}`,
      signal,
      () =>
        this.deps.snapshots.getVirtualMachineSnapshot(namespace, snapshotName, {
          signal,
        }),
    );
    if (!snapshot) {
      // reported by the snapshot validator
      return [];
    }

    const target = await lookup(
      `VirtualMachine ${namespace}/${targetName}`,
      signal,
      () =>
        this.deps.virtualMachines.getVirtualMachine(namespace, targetName, {
          signal,
        }),
    );

    const differentVm =
      target === null ||
      (snapshot.sourceUID !== undefined && target.uid !== snapshot.sourceUID);
    if (!differentVm) {
      return [];
    }

    if (snapshot.contentName === undefined) {
      throw new AdmissionFaultError(
        `snapshot content name is missing in VirtualMachineSnapshot ${namespace}/${snapshotName} status`,
      );
    }

    const contentName = snapshot.contentName;
    const content = await lookup(
      `VirtualMachineSnapshotContent ${namespace}/${contentName}`,
      signal,
      () =>
        this.deps.snapshotContents.getVirtualMachineSnapshotContent(
          namespace,
          contentName,
          { signal },
        ),
    );
    if (!content) {
      throw new AdmissionFaultError(
        `VirtualMachineSnapshotContent ${namespace}/${contentName} not found`,
      );
    }
    if (!content.sourceVirtualMachine) {
      throw new AdmissionFaultError(
        `unexpected snapshot source in VirtualMachineSnapshotContent ${namespace}/${contentName}`,
      );
    }

    if (!isBackendStorageNeeded(content.sourceVirtualMachine.templateSpec)) {
      return [];
    }
    return [
      invalidCause(
        "restore to a different VM not supported when using backend storage",
        fieldPath("spec"),
      ),
    ];
  }
}
