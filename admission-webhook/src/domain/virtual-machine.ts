export const VIRTUAL_MACHINE_GROUP = "kubevirt.io";
export const VIRTUAL_MACHINE_KIND = "VirtualMachine";

export type SnapshotPhase = "InProgress" | "Succeeded" | "Failed" | "Unknown";

export interface VirtualMachineRecord {
  readonly namespace: string;
  readonly name: string;
  readonly uid: string;
}

export interface VirtualMachineInstanceRecord {
  readonly namespace: string;
  readonly name: string;
  readonly uid?: string;
}

export interface VirtualMachineSnapshotRecord {
  readonly namespace: string;
  readonly name: string;
  readonly phase: SnapshotPhase;
  readonly readyToUse?: boolean;
  readonly sourceUID?: string;
  readonly contentName?: string;
}

// Only the parts of the instance template that decide backend storage.
export interface VirtualMachineInstanceSpec {
  readonly domain?: {
    readonly devices?: {
      readonly tpm?: { readonly persistent?: boolean };
    };
    readonly firmware?: {
      readonly bootloader?: {
        readonly efi?: { readonly persistent?: boolean };
      };
    };
  };
}

export interface SnapshotSourceVirtualMachine {
  readonly templateSpec: VirtualMachineInstanceSpec;
}

export interface VirtualMachineSnapshotContentRecord {
  readonly namespace: string;
  readonly name: string;
  readonly sourceVirtualMachine?: SnapshotSourceVirtualMachine;
}

/**
 * A persistent TPM or a persistent EFI variable store lives on a volume owned
 * by exactly one VM.
 */
export function isBackendStorageNeeded(spec: VirtualMachineInstanceSpec): boolean {
  const persistentTpm = spec.domain?.devices?.tpm?.persistent === true;
  const persistentEfi =
    spec.domain?.firmware?.bootloader?.efi?.persistent === true;
  return persistentTpm || persistentEfi;
}

export function toSnapshotPhase(raw: string | undefined): SnapshotPhase {
  switch (raw) {
    case "InProgress":
    case "Succeeded":
    case "Failed":
      return raw;
    default:
      return "Unknown";
  }
}
