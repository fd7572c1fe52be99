import type { LookupResult } from "../domain/lookup-result.js";
import type { RestoreSummary } from "../domain/restore.js";
import type {
  VirtualMachineInstanceRecord,
  VirtualMachineRecord,
  VirtualMachineSnapshotContentRecord,
  VirtualMachineSnapshotRecord,
} from "../domain/virtual-machine.js";

export interface ReadOptions {
  readonly signal?: AbortSignal;
}

export interface VirtualMachineReader {
  getVirtualMachine(
    namespace: string,
    name: string,
    options?: ReadOptions,
  ): Promise<LookupResult<VirtualMachineRecord>>;
}

export interface VirtualMachineInstanceReader {
  getVirtualMachineInstance(
    namespace: string,
    name: string,
    options?: ReadOptions,
  ): Promise<LookupResult<VirtualMachineInstanceRecord>>;
}

export interface VirtualMachineSnapshotReader {
  getVirtualMachineSnapshot(
    namespace: string,
    name: string,
    options?: ReadOptions,
  ): Promise<LookupResult<VirtualMachineSnapshotRecord>>;
}

export interface VirtualMachineSnapshotContentReader {
  getVirtualMachineSnapshotContent(
    namespace: string,
    name: string,
    options?: ReadOptions,
  ): Promise<LookupResult<VirtualMachineSnapshotContentRecord>>;
}

/**
 * Read port over the restores already known in a namespace. Implementations
 * may list live or serve from a cache; failures are thrown.
 */
export interface RestoreIndex {
  listRestoresInNamespace(
    namespace: string,
    options?: ReadOptions,
  ): Promise<readonly RestoreSummary[]>;
}

export type ClusterReaders = VirtualMachineReader &
  VirtualMachineInstanceReader &
  VirtualMachineSnapshotReader &
  VirtualMachineSnapshotContentReader &
  RestoreIndex;
