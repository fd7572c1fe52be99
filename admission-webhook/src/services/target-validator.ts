import {
  fieldPath,
  invalidCause,
  notFoundCause,
  type Cause,
} from "../domain/cause.js";
import type { RestoreTarget } from "../domain/restore.js";
import {
  VIRTUAL_MACHINE_GROUP,
  VIRTUAL_MACHINE_KIND,
} from "../domain/virtual-machine.js";
import type {
  VirtualMachineInstanceReader,
  VirtualMachineReader,
} from "../ports/cluster-readers.js";
import { lookup } from "./lookup.js";
import { validatePatches } from "./patch-validator.js";

export type ClassifiedTarget =
  | { readonly kind: "virtual_machine"; readonly name: string }
  | { readonly kind: "unsupported"; readonly cause: Cause };

export interface TargetResolution {
  readonly uid?: string;
  readonly vmExists: boolean;
  readonly instanceExists: boolean;
}

export interface TargetValidation {
  readonly causes: readonly Cause[];
  readonly resolution: TargetResolution;
}

export interface ValidateTargetInput {
  readonly namespace: string;
  readonly name: string;
  readonly patches: readonly string[];
  readonly signal?: AbortSignal;
}

const TARGET_FIELD = fieldPath("spec", "target");

export function classifyTarget(target: RestoreTarget): ClassifiedTarget {
  if (target.apiGroup === undefined) {
    return {
      kind: "unsupported",
      cause: notFoundCause(
        "missing apiGroup",
        fieldPath(TARGET_FIELD, "apiGroup"),
      ),
    };
  }
  if (target.apiGroup !== VIRTUAL_MACHINE_GROUP) {
    return {
      kind: "unsupported",
      cause: invalidCause("invalid apiGroup", fieldPath(TARGET_FIELD, "apiGroup")),
    };
  }
  if (target.kind !== VIRTUAL_MACHINE_KIND) {
    return {
      kind: "unsupported",
      cause: invalidCause("invalid kind", fieldPath(TARGET_FIELD, "kind")),
    };
  }
  return { kind: "virtual_machine", name: target.name };
}

export class TargetValidator {
  constructor(
    private readonly deps: {
      readonly virtualMachines: VirtualMachineReader;
      readonly virtualMachineInstances: VirtualMachineInstanceReader;
    },
  ) {}

  async validate(input: ValidateTargetInput): Promise<TargetValidation> {
    const { namespace, name, signal } = input;
    const causes = validatePatches(input.patches, fieldPath("spec", "patches"));

    const vm = await lookup(`VirtualMachine ${namespace}/${name}`, signal, () =>
      this.deps.virtualMachines.getVirtualMachine(namespace, name, { signal }),
    );
    if (!vm) {
      // The restore controller creates a missing target.
      return {
        causes,
        resolution: { vmExists: false, instanceExists: false },
      };
    }

    const instance = await lookup(
      `VirtualMachineInstance ${namespace}/${name}`,
      signal,
      () =>
        this.deps.virtualMachineInstances.getVirtualMachineInstance(
          namespace,
          name,
          { signal },
        ),
    );
    if (!instance) {
      return {
        causes,
        resolution: { uid: vm.uid, vmExists: true, instanceExists: false },
      };
    }

    return {
      causes: [
        ...causes,
        invalidCause(
          `VirtualMachineInstance ${JSON.stringify(name)} exists, VM must be stopped before restore`,
          TARGET_FIELD,
        ),
      ],
      resolution: { vmExists: true, instanceExists: true },
    };
  }
}
