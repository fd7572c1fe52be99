import type { AdmissionRequest } from "../src/domain/admission.js";
import type {
  VirtualMachineSnapshotContentRecord,
  VirtualMachineSnapshotRecord,
} from "../src/domain/virtual-machine.js";
import type { LogContext, Logger } from "../src/observability/logger.js";

export const NAMESPACE = "default";

export const VM_TARGET = {
  apiGroup: "kubevirt.io",
  kind: "VirtualMachine",
  name: "vm1",
} as const;

export function restoreObject(
  input: {
    name?: string;
    namespace?: string;
    target?: Record<string, unknown>;
    snapshotName?: string;
    patches?: string[];
    status?: Record<string, unknown>;
  } = {},
): Record<string, unknown> {
  return {
    apiVersion: "snapshot.kubevirt.io/v1beta1",
    kind: "VirtualMachineRestore",
    metadata: {
      name: input.name ?? "restore-1",
      namespace: input.namespace ?? NAMESPACE,
    },
    spec: {
      target: input.target ?? { ...VM_TARGET },
      virtualMachineSnapshotName: input.snapshotName ?? "snap1",
      ...(input.patches ? { patches: input.patches } : {}),
    },
    ...(input.status ? { status: input.status } : {}),
  };
}

export function createRequest(
  overrides: Partial<AdmissionRequest> = {},
): AdmissionRequest {
  return {
    uid: "req-1",
    operation: "CREATE",
    resource: {
      group: "snapshot.kubevirt.io",
      version: "v1beta1",
      resource: "virtualmachinerestores",
    },
    namespace: NAMESPACE,
    object: restoreObject(),
    ...overrides,
  };
}

export function readySnapshot(
  overrides: Partial<VirtualMachineSnapshotRecord> = {},
): VirtualMachineSnapshotRecord {
  return {
    namespace: NAMESPACE,
    name: "snap1",
    phase: "Succeeded",
    readyToUse: true,
    sourceUID: "uid-vm1",
    contentName: "content-snap1",
    ...overrides,
  };
}

export function snapshotContent(
  options: { persistentTpm?: boolean; persistentEfi?: boolean } = {},
): VirtualMachineSnapshotContentRecord {
  return {
    namespace: NAMESPACE,
    name: "content-snap1",
    sourceVirtualMachine: {
      templateSpec: {
        domain: {
          devices: { tpm: { persistent: options.persistentTpm } },
          firmware: {
            bootloader: { efi: { persistent: options.persistentEfi } },
          },
        },
      },
    },
  };
}

export interface LogRecord {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly message: string;
  readonly fields: LogContext;
}

export class RecordingLogger implements Logger {
  constructor(
    readonly records: LogRecord[] = [],
    private readonly context: LogContext = {},
  ) {}

  child(context: LogContext): Logger {
    return new RecordingLogger(this.records, { ...this.context, ...context });
  }

  debug(message: string, fields?: LogContext): void {
    this.push("debug", message, fields);
  }

  info(message: string, fields?: LogContext): void {
    this.push("info", message, fields);
  }

  warn(message: string, fields?: LogContext): void {
    this.push("warn", message, fields);
  }

  error(message: string, fields?: LogContext): void {
    this.push("error", message, fields);
  }

  private push(
    level: LogRecord["level"],
    message: string,
    fields?: LogContext,
  ): void {
    this.records.push({ level, message, fields: { ...this.context, ...fields } });
  }
}
