import { z } from "zod";
import {
  fault,
  found,
  notFound,
  toError,
  type LookupResult,
} from "../domain/lookup-result.js";
import { restoreTargetSchema, type RestoreSummary } from "../domain/restore.js";
import {
  toSnapshotPhase,
  type VirtualMachineInstanceRecord,
  type VirtualMachineInstanceSpec,
  type VirtualMachineRecord,
  type VirtualMachineSnapshotContentRecord,
  type VirtualMachineSnapshotRecord,
} from "../domain/virtual-machine.js";
import type { ClusterReaders, ReadOptions } from "../ports/cluster-readers.js";

export interface KubeApiClientOptions {
  readonly baseUrl: string;
  readonly token?: string;
  readonly timeoutMs?: number;
}

export class KubeApiRequestError extends Error {
  constructor(
    message: string,
    readonly path: string,
    readonly status: number | null,
  ) {
    super(message);
    this.name = "KubeApiRequestError";
  }
}

const VM_API = "/apis/kubevirt.io/v1";
const SNAPSHOT_API = "/apis/snapshot.kubevirt.io/v1beta1";

const objectMetaSchema = z.object({
  name: z.string(),
  namespace: z.string().optional(),
  uid: z.string().optional(),
});

const virtualMachineSchema = z.object({
  metadata: objectMetaSchema.extend({ uid: z.string() }),
});

const virtualMachineInstanceSchema = z.object({
  metadata: objectMetaSchema,
});

const virtualMachineSnapshotSchema = z.object({
  metadata: objectMetaSchema,
  status: z
    .object({
      phase: z.string().nullish(),
      readyToUse: z.boolean().nullish(),
      sourceUID: z.string().nullish(),
      virtualMachineSnapshotContentName: z.string().nullish(),
    })
    .nullish(),
});

const persistentSchema = z.object({ persistent: z.boolean().nullish() }).nullish();

const instanceSpecSchema = z.object({
  domain: z
    .object({
      devices: z.object({ tpm: persistentSchema }).nullish(),
      firmware: z
        .object({
          bootloader: z.object({ efi: persistentSchema }).nullish(),
        })
        .nullish(),
    })
    .nullish(),
});

const virtualMachineSnapshotContentSchema = z.object({
  metadata: objectMetaSchema,
  spec: z.object({
    source: z
      .object({
        virtualMachine: z
          .object({
            spec: z
              .object({
                template: z.object({ spec: instanceSpecSchema.nullish() }).nullish(),
              })
              .nullish(),
          })
          .nullish(),
      })
      .nullish(),
  }),
});

const restoreListSchema = z.object({
  items: z.array(
    z.object({
      metadata: objectMetaSchema,
      spec: z.object({ target: restoreTargetSchema }),
      status: z.object({ complete: z.boolean().nullish() }).nullish(),
    }),
  ),
});

type FetchResult =
  | { readonly kind: "ok"; readonly body: unknown }
  | { readonly kind: "not_found" };

/**
 * Reads KubeVirt objects from the Kubernetes API server. Every read is a
 * single GET; nothing is retried.
 */
export class KubeApiClient implements ClusterReaders {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly token?: string;

  constructor(options: KubeApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.token = options.token;
  }

  async getVirtualMachine(
    namespace: string,
    name: string,
    options?: ReadOptions,
  ): Promise<LookupResult<VirtualMachineRecord>> {
    return this.getObject(
      namespacedPath(VM_API, namespace, "virtualmachines", name),
      virtualMachineSchema,
      (vm) => ({
        namespace: vm.metadata.namespace ?? namespace,
        name: vm.metadata.name,
        uid: vm.metadata.uid,
      }),
      options,
    );
  }

  async getVirtualMachineInstance(
    namespace: string,
    name: string,
    options?: ReadOptions,
  ): Promise<LookupResult<VirtualMachineInstanceRecord>> {
    return this.getObject(
      namespacedPath(VM_API, namespace, "virtualmachineinstances", name),
      virtualMachineInstanceSchema,
      (vmi) => ({
        namespace: vmi.metadata.namespace ?? namespace,
        name: vmi.metadata.name,
        uid: vmi.metadata.uid,
      }),
      options,
    );
  }

  async getVirtualMachineSnapshot(
    namespace: string,
    name: string,
    options?: ReadOptions,
  ): Promise<LookupResult<VirtualMachineSnapshotRecord>> {
    return this.getObject(
      namespacedPath(SNAPSHOT_API, namespace, "virtualmachinesnapshots", name),
      virtualMachineSnapshotSchema,
      (snapshot) => ({
        namespace: snapshot.metadata.namespace ?? namespace,
        name: snapshot.metadata.name,
        phase: toSnapshotPhase(snapshot.status?.phase ?? undefined),
        readyToUse: snapshot.status?.readyToUse ?? undefined,
        sourceUID: snapshot.status?.sourceUID ?? undefined,
        contentName:
          snapshot.status?.virtualMachineSnapshotContentName ?? undefined,
      }),
      options,
    );
  }

  async getVirtualMachineSnapshotContent(
    namespace: string,
    name: string,
    options?: ReadOptions,
  ): Promise<LookupResult<VirtualMachineSnapshotContentRecord>> {
    return this.getObject(
      namespacedPath(
        SNAPSHOT_API,
        namespace,
        "virtualmachinesnapshotcontents",
        name,
      ),
      virtualMachineSnapshotContentSchema,
      (content) => {
        const source = content.spec.source?.virtualMachine;
        return {
          namespace: content.metadata.namespace ?? namespace,
          name: content.metadata.name,
          sourceVirtualMachine: source
            ? { templateSpec: toInstanceSpec(source.spec?.template?.spec) }
            : undefined,
        };
      },
      options,
    );
  }

  async listRestoresInNamespace(
    namespace: string,
    options?: ReadOptions,
  ): Promise<readonly RestoreSummary[]> {
    const path = `${SNAPSHOT_API}/namespaces/${encodeURIComponent(namespace)}/virtualmachinerestores`;
    const result = await this.get(path, options?.signal);
    if (result.kind === "not_found") {
      throw new KubeApiRequestError(
        `kube api request failed: ${path} 404`,
        path,
        404,
      );
    }

    const parsed = restoreListSchema.safeParse(result.body);
    if (!parsed.success) {
      throw new KubeApiRequestError(
        `kube api returned an unexpected body: ${path}`,
        path,
        null,
      );
    }

    return parsed.data.items.map((item) => ({
      name: item.metadata.name,
      target: item.spec.target,
      complete: item.status?.complete ?? undefined,
    }));
  }

  private async getObject<S extends z.ZodTypeAny, T>(
    path: string,
    schema: S,
    map: (value: z.output<S>) => T,
    options?: ReadOptions,
  ): Promise<LookupResult<T>> {
    try {
      const result = await this.get(path, options?.signal);
      if (result.kind === "not_found") {
        return notFound();
      }
      const parsed = schema.safeParse(result.body);
      if (!parsed.success) {
        return fault(
          new KubeApiRequestError(
            `kube api returned an unexpected body: ${path}`,
            path,
            null,
          ),
        );
      }
      return found(map(parsed.data));
    } catch (error) {
      return fault(toError(error));
    }
  }

  private async get(path: string, signal?: AbortSignal): Promise<FetchResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener("abort", forwardAbort, { once: true });
    }

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method: "GET",
        headers: {
          accept: "application/json",
          ...(this.token ? { authorization: `Bearer ${this.token}` } : {}),
        },
        signal: controller.signal,
      });

      const text = await response.text();
      if (response.status === 404) {
        return { kind: "not_found" };
      }
      if (!response.ok) {
        throw new KubeApiRequestError(
          `kube api request failed: ${path} ${response.status} ${text}`,
          path,
          response.status,
        );
      }

      const body = safeParseJson(text);
      if (body === undefined) {
        throw new KubeApiRequestError(
          `kube api returned a non-JSON body: ${path}`,
          path,
          response.status,
        );
      }
      return { kind: "ok", body };
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }
}

function toInstanceSpec(
  spec: z.output<typeof instanceSpecSchema> | null | undefined,
): VirtualMachineInstanceSpec {
  const domain = spec?.domain;
  return {
    domain: {
      devices: {
        tpm: { persistent: domain?.devices?.tpm?.persistent ?? undefined },
      },
      firmware: {
        bootloader: {
          efi: {
            persistent: domain?.firmware?.bootloader?.efi?.persistent ?? undefined,
          },
        },
      },
    },
  };
}

function namespacedPath(
  api: string,
  namespace: string,
  resource: string,
  name: string,
): string {
  return `${api}/namespaces/${encodeURIComponent(namespace)}/${resource}/${encodeURIComponent(name)}`;
}

function safeParseJson(input: string): unknown {
  if (input.trim().length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(input);
  } catch {
    return undefined;
  }
}
