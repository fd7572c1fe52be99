import type { AdmissionOutcome, AdmissionRequest } from "../domain/admission.js";
import type { Cause } from "../domain/cause.js";
import {
  decodeRestore,
  RESTORE_GROUP,
  RESTORE_RESOURCE,
  type VirtualMachineRestore,
} from "../domain/restore.js";
import type { Logger } from "../observability/logger.js";
import { createLogger } from "../observability/logger.js";
import type {
  RestoreIndex,
  VirtualMachineInstanceReader,
  VirtualMachineReader,
  VirtualMachineSnapshotContentReader,
  VirtualMachineSnapshotReader,
} from "../ports/cluster-readers.js";
import type { FeatureGate } from "../ports/feature-gate.js";
import { ConflictScanner } from "./conflict-scanner.js";
import { AdmissionFaultError } from "./errors.js";
import { SnapshotValidator } from "./snapshot-validator.js";
import { SourceValidator } from "./source-validator.js";
import { classifyTarget, TargetValidator } from "./target-validator.js";
import { checkSpecImmutable } from "./update-checker.js";

export interface RestoreAdmitterDependencies {
  readonly featureGate: FeatureGate;
  readonly virtualMachines: VirtualMachineReader;
  readonly virtualMachineInstances: VirtualMachineInstanceReader;
  readonly snapshots: VirtualMachineSnapshotReader;
  readonly snapshotContents: VirtualMachineSnapshotContentReader;
  readonly restoreIndex: RestoreIndex;
  readonly logger?: Logger;
}

export interface AdmitOptions {
  readonly signal?: AbortSignal;
}

/**
 * Validates create and update requests for VirtualMachineRestore objects.
 * Holds no per-request state; one instance serves concurrent calls.
 */
export class RestoreAdmitter {
  private readonly featureGate: FeatureGate;
  private readonly targetValidator: TargetValidator;
  private readonly sourceValidator: SourceValidator;
  private readonly snapshotValidator: SnapshotValidator;
  private readonly conflictScanner: ConflictScanner;
  private readonly logger: Logger;

  constructor(deps: RestoreAdmitterDependencies) {
    this.featureGate = deps.featureGate;
    this.targetValidator = new TargetValidator(deps);
    this.sourceValidator = new SourceValidator(deps);
    this.snapshotValidator = new SnapshotValidator(deps.snapshots);
    this.conflictScanner = new ConflictScanner(deps.restoreIndex);
    this.logger = (deps.logger ?? createLogger()).child({
      component: "restore-admitter",
    });
  }

  async admit(
    request: AdmissionRequest,
    options: AdmitOptions = {},
  ): Promise<AdmissionOutcome> {
    const logger = this.logger.child({
      uid: request.uid,
      namespace: request.namespace,
      operation: request.operation,
    });

    try {
      const causes = await this.evaluate(request, options.signal);
      if (causes.length === 0) {
        logger.info("restore admitted");
        return { outcome: "allowed" };
      }
      logger.info("restore denied", {
        causes: causes.length,
        fields: causes.map((cause) => cause.field),
      });
      return { outcome: "denied", causes };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error("restore admission aborted", {
        error: message,
        errorName: error instanceof Error ? error.name : undefined,
      });
      return { outcome: "error", message };
    }
  }

  private async evaluate(
    request: AdmissionRequest,
    signal: AbortSignal | undefined,
  ): Promise<Cause[]> {
    const { group, resource } = request.resource;
    if (group !== RESTORE_GROUP || resource !== RESTORE_RESOURCE) {
      throw new AdmissionFaultError(
        `unexpected resource ${group}/${resource}`,
      );
    }

    if (
      request.operation === "CREATE" &&
      !this.featureGate.isRestoreFeatureEnabled()
    ) {
      throw new AdmissionFaultError("Snapshot/Restore feature gate not enabled");
    }

    const restore = decodeOrThrow(request.object, "object");
    const namespace = request.namespace || restore.metadata.namespace || "";

    switch (request.operation) {
      case "CREATE":
        return this.validateCreate(restore, namespace, signal);
      case "UPDATE": {
        const previous = decodeOrThrow(request.oldObject, "oldObject");
        return checkSpecImmutable(previous.spec, restore.spec);
      }
      default:
        throw new AdmissionFaultError(
          `unexpected operation ${request.operation}`,
        );
    }
  }

  private async validateCreate(
    restore: VirtualMachineRestore,
    namespace: string,
    signal: AbortSignal | undefined,
  ): Promise<Cause[]> {
    const { target, virtualMachineSnapshotName: snapshotName } = restore.spec;
    const classified = classifyTarget(target);

    switch (classified.kind) {
      case "unsupported":
        return [classified.cause];
      case "virtual_machine": {
        const targetValidation = await this.targetValidator.validate({
          namespace,
          name: classified.name,
          patches: restore.spec.patches ?? [],
          signal,
        });
        const sourceCauses = await this.sourceValidator.validate({
          namespace,
          targetName: classified.name,
          snapshotName,
          signal,
        });
        const snapshotCauses = await this.snapshotValidator.validate({
          namespace,
          snapshotName,
          targetUid: targetValidation.resolution.uid,
          targetVmExists: targetValidation.resolution.vmExists,
          signal,
        });
        const conflictCauses = await this.conflictScanner.scan({
          namespace,
          target,
          signal,
        });

        return [
          ...targetValidation.causes,
          ...sourceCauses,
          ...snapshotCauses,
          ...conflictCauses,
        ];
      }
    }
  }
}

function decodeOrThrow(raw: unknown, label: string): VirtualMachineRestore {
  if (raw === undefined || raw === null) {
    throw new AdmissionFaultError(`missing ${label} in admission request`);
  }
  const decoded = decodeRestore(raw);
  if (!decoded.ok) {
    throw new AdmissionFaultError(
      `failed to decode VirtualMachineRestore ${label}: ${decoded.message}`,
    );
  }
  return decoded.restore;
}
