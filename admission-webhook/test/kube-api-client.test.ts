import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import { afterEach, describe, expect, test } from "vitest";
import {
  KubeApiClient,
  KubeApiRequestError,
} from "../src/adapters/kube-api-client.js";
import { isBackendStorageNeeded } from "../src/domain/virtual-machine.js";

describe("KubeApiClient", () => {
  const servers: Server[] = [];

  afterEach(async () => {
    await Promise.all(
      servers.map(
        (server) =>
          new Promise<void>((resolve, reject) => {
            server.close((error) => {
              if (error) {
                reject(error);
                return;
              }
              resolve();
            });
          }),
      ),
    );
    servers.length = 0;
  });

  test("should read a VirtualMachine with the bearer token", async () => {
    let authHeader = "";
    let requestPath = "";

    const baseUrl = await startServer(servers, (req, res) => {
      authHeader = String(req.headers.authorization ?? "");
      requestPath = req.url ?? "";
      sendJson(res, 200, {
        metadata: { name: "vm1", namespace: "default", uid: "uid-vm1" },
      });
    });

    const client = new KubeApiClient({ baseUrl: `${baseUrl}/`, token: "test-token" });
    const result = await client.getVirtualMachine("default", "vm1");

    expect(authHeader).toBe("Bearer test-token");
    expect(requestPath).toBe(
      "/apis/kubevirt.io/v1/namespaces/default/virtualmachines/vm1",
    );
    expect(result).toEqual({
      status: "found",
      value: { namespace: "default", name: "vm1", uid: "uid-vm1" },
    });
  });

  test("should map 404 to not_found", async () => {
    const baseUrl = await startServer(servers, (_req, res) => {
      sendJson(res, 404, { kind: "Status", reason: "NotFound" });
    });

    const client = new KubeApiClient({ baseUrl });

    await expect(
      client.getVirtualMachineInstance("default", "vm1"),
    ).resolves.toEqual({ status: "not_found" });
  });

  test("should map other failures to faults", async () => {
    const baseUrl = await startServer(servers, (_req, res) => {
      sendJson(res, 503, { message: "unavailable" });
    });

    const client = new KubeApiClient({ baseUrl });
    const result = await client.getVirtualMachineSnapshot("default", "snap1");

    expect(result.status).toBe("fault");
    if (result.status !== "fault") {
      return;
    }
    expect(result.error).toBeInstanceOf(KubeApiRequestError);
    expect(result.error).toMatchObject({
      status: 503,
      path: "/apis/snapshot.kubevirt.io/v1beta1/namespaces/default/virtualmachinesnapshots/snap1",
    });
  });

  test("should map snapshot status", async () => {
    const baseUrl = await startServer(servers, (req, res) => {
      if (req.url?.endsWith("/snap1")) {
        sendJson(res, 200, {
          metadata: { name: "snap1", namespace: "default" },
          status: {
            phase: "Failed",
            readyToUse: false,
            sourceUID: "uid-vm1",
            virtualMachineSnapshotContentName: "content-snap1",
          },
        });
        return;
      }
      sendJson(res, 200, { metadata: { name: "snap2" } });
    });

    const client = new KubeApiClient({ baseUrl });

    await expect(
      client.getVirtualMachineSnapshot("default", "snap1"),
    ).resolves.toEqual({
      status: "found",
      value: {
        namespace: "default",
        name: "snap1",
        phase: "Failed",
        readyToUse: false,
        sourceUID: "uid-vm1",
        contentName: "content-snap1",
      },
    });
    await expect(
      client.getVirtualMachineSnapshot("default", "snap2"),
    ).resolves.toEqual({
      status: "found",
      value: {
        namespace: "default",
        name: "snap2",
        phase: "Unknown",
        readyToUse: undefined,
        sourceUID: undefined,
        contentName: undefined,
      },
    });
  });

  test("should read the frozen source VM from snapshot content", async () => {
    const baseUrl = await startServer(servers, (_req, res) => {
      sendJson(res, 200, {
        metadata: { name: "content-snap1", namespace: "default" },
        spec: {
          source: {
            virtualMachine: {
              metadata: { name: "vm1" },
              spec: {
                template: {
                  spec: { domain: { devices: { tpm: { persistent: true } } } },
                },
              },
            },
          },
        },
      });
    });

    const client = new KubeApiClient({ baseUrl });
    const result = await client.getVirtualMachineSnapshotContent(
      "default",
      "content-snap1",
    );

    expect(result.status).toBe("found");
    if (result.status !== "found") {
      return;
    }
    expect(
      isBackendStorageNeeded(result.value.sourceVirtualMachine?.templateSpec ?? {}),
    ).toBe(true);
  });

  test("should report content without a source VM", async () => {
    const baseUrl = await startServer(servers, (_req, res) => {
      sendJson(res, 200, {
        metadata: { name: "content-snap1" },
        spec: { source: {} },
      });
    });

    const client = new KubeApiClient({ baseUrl });

    await expect(
      client.getVirtualMachineSnapshotContent("default", "content-snap1"),
    ).resolves.toEqual({
      status: "found",
      value: {
        namespace: "default",
        name: "content-snap1",
        sourceVirtualMachine: undefined,
      },
    });
  });

  test("should list restore summaries", async () => {
    let requestPath = "";
    const baseUrl = await startServer(servers, (req, res) => {
      requestPath = req.url ?? "";
      sendJson(res, 200, {
        items: [
          {
            metadata: { name: "restore-a" },
            spec: {
              target: { apiGroup: "kubevirt.io", kind: "VirtualMachine", name: "vm1" },
              virtualMachineSnapshotName: "snap1",
            },
            status: { complete: true },
          },
          {
            metadata: { name: "restore-b" },
            spec: { target: { kind: "VirtualMachine", name: "vm2" } },
          },
        ],
      });
    });

    const client = new KubeApiClient({ baseUrl });
    const restores = await client.listRestoresInNamespace("team a");

    expect(requestPath).toBe(
      "/apis/snapshot.kubevirt.io/v1beta1/namespaces/team%20a/virtualmachinerestores",
    );
    expect(restores).toEqual([
      {
        name: "restore-a",
        target: { apiGroup: "kubevirt.io", kind: "VirtualMachine", name: "vm1" },
        complete: true,
      },
      {
        name: "restore-b",
        target: { apiGroup: undefined, kind: "VirtualMachine", name: "vm2" },
        complete: undefined,
      },
    ]);
  });

  test("should throw when listing fails", async () => {
    const baseUrl = await startServer(servers, (_req, res) => {
      sendJson(res, 403, { message: "forbidden" });
    });

    const client = new KubeApiClient({ baseUrl });

    await expect(client.listRestoresInNamespace("default")).rejects.toBeInstanceOf(
      KubeApiRequestError,
    );
  });

  test("should not send a request for an aborted signal", async () => {
    let requests = 0;
    const baseUrl = await startServer(servers, (_req, res) => {
      requests += 1;
      sendJson(res, 200, { metadata: { name: "vm1", uid: "uid-vm1" } });
    });

    const controller = new AbortController();
    controller.abort();
    const client = new KubeApiClient({ baseUrl });
    const result = await client.getVirtualMachine("default", "vm1", {
      signal: controller.signal,
    });

    expect(result.status).toBe("fault");
    expect(requests).toBe(0);
  });
});

async function startServer(
  servers: Server[],
  handler: (req: IncomingMessage, res: ServerResponse) => void,
): Promise<string> {
  const server = createServer(handler);
  servers.push(server);
  await new Promise<void>((resolve, reject) => {
    server.listen(0, "127.0.0.1", () => resolve());
    server.on("error", reject);
  });
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("failed to resolve server address");
  }
  return `http://127.0.0.1:${address.port}`;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(body));
}
