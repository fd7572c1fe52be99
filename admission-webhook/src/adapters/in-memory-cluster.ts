import {
  fault,
  found,
  notFound,
  type LookupResult,
} from "../domain/lookup-result.js";
import type { RestoreSummary } from "../domain/restore.js";
import type {
  VirtualMachineInstanceRecord,
  VirtualMachineRecord,
  VirtualMachineSnapshotContentRecord,
  VirtualMachineSnapshotRecord,
} from "../domain/virtual-machine.js";
import type { ClusterReaders, ReadOptions } from "../ports/cluster-readers.js";

export type ClusterResourceKind =
  | "virtualMachine"
  | "virtualMachineInstance"
  | "snapshot"
  | "snapshotContent"
  | "restores";

/**
 * Cluster reads served from maps keyed by namespace/name. Used for local runs
 * without an API server and as the stand-in cluster in tests.
 */
export class InMemoryCluster implements ClusterReaders {
  private readonly virtualMachines = new Map<string, VirtualMachineRecord>();
  private readonly instances = new Map<string, VirtualMachineInstanceRecord>();
  private readonly snapshots = new Map<string, VirtualMachineSnapshotRecord>();
  private readonly contents = new Map<
    string,
    VirtualMachineSnapshotContentRecord
  >();
  private readonly restores = new Map<string, RestoreSummary[]>();
  private readonly faults = new Map<ClusterResourceKind, Error>();
  readonly reads: string[] = [];

  putVirtualMachine(record: VirtualMachineRecord): this {
    this.virtualMachines.set(key(record.namespace, record.name), clone(record));
    return this;
  }

  putVirtualMachineInstance(record: VirtualMachineInstanceRecord): this {
    this.instances.set(key(record.namespace, record.name), clone(record));
    return this;
  }

  putSnapshot(record: VirtualMachineSnapshotRecord): this {
    this.snapshots.set(key(record.namespace, record.name), clone(record));
    return this;
  }

  putSnapshotContent(record: VirtualMachineSnapshotContentRecord): this {
    this.contents.set(key(record.namespace, record.name), clone(record));
    return this;
  }

  putRestore(namespace: string, summary: RestoreSummary): this {
    const existing = this.restores.get(namespace) ?? [];
    this.restores.set(namespace, [
      ...existing.filter((item) => item.name !== summary.name),
      clone(summary),
    ]);
    return this;
  }

  failReads(kind: ClusterResourceKind, error: Error | null): this {
    if (error) {
      this.faults.set(kind, error);
    } else {
      this.faults.delete(kind);
    }
    return this;
  }

  async getVirtualMachine(
    namespace: string,
    name: string,
    _options?: ReadOptions,
  ): Promise<LookupResult<VirtualMachineRecord>> {
    return this.read("virtualMachine", this.virtualMachines, namespace, name);
  }

  async getVirtualMachineInstance(
    namespace: string,
    name: string,
    _options?: ReadOptions,
  ): Promise<LookupResult<VirtualMachineInstanceRecord>> {
    return this.read("virtualMachineInstance", this.instances, namespace, name);
  }

  async getVirtualMachineSnapshot(
    namespace: string,
    name: string,
    _options?: ReadOptions,
  ): Promise<LookupResult<VirtualMachineSnapshotRecord>> {
    return this.read("snapshot", this.snapshots, namespace, name);
  }

  async getVirtualMachineSnapshotContent(
    namespace: string,
    name: string,
    _options?: ReadOptions,
  ): Promise<LookupResult<VirtualMachineSnapshotContentRecord>> {
    return this.read("snapshotContent", this.contents, namespace, name);
  }

  async listRestoresInNamespace(
    namespace: string,
    _options?: ReadOptions,
  ): Promise<readonly RestoreSummary[]> {
    this.reads.push(`restores:${namespace}`);
    const failure = this.faults.get("restores");
    if (failure) {
      throw failure;
    }
    return (this.restores.get(namespace) ?? []).map((item) => clone(item));
  }

  private read<T>(
    kind: ClusterResourceKind,
    store: Map<string, T>,
    namespace: string,
    name: string,
  ): LookupResult<T> {
    this.reads.push(`${kind}:${key(namespace, name)}`);
    const failure = this.faults.get(kind);
    if (failure) {
      return fault(failure);
    }
    const value = store.get(key(namespace, name));
    return value === undefined ? notFound() : found(clone(value));
  }
}

function key(namespace: string, name: string): string {
  return `${namespace}/${name}`;
}

function clone<T>(value: T): T {
  return structuredClone(value);
}
