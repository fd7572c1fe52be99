import { readFile } from "node:fs/promises";
import { createServer } from "node:https";
import { createAdmissionWebhookApp } from "./app.js";
import { InMemoryCluster } from "./adapters/in-memory-cluster.js";
import { KubeApiClient } from "./adapters/kube-api-client.js";
import { StaticFeatureGate } from "./adapters/static-feature-gate.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./observability/logger.js";
import type { ClusterReaders } from "./ports/cluster-readers.js";

const config = loadConfig();
const logger = createLogger(
  { component: "restore-admission" },
  { level: config.logLevel },
);

const cluster: ClusterReaders = config.kubeApiUrl
  ? new KubeApiClient({
      baseUrl: config.kubeApiUrl,
      token: await readToken(config.kubeTokenFile),
      timeoutMs: config.kubeApiTimeoutMs,
    })
  : new InMemoryCluster();

if (!config.kubeApiUrl) {
  logger.warn("KUBE_API_URL not set, serving lookups from an empty in-memory cluster");
}

const app = createAdmissionWebhookApp({
  cluster,
  featureGate: new StaticFeatureGate(config.restoreFeatureEnabled),
  admissionTimeoutMs: config.admissionTimeoutMs,
  jsonBodyLimit: config.jsonBodyLimit,
  logger,
});

if (config.tlsCertFile && config.tlsKeyFile) {
  const [cert, key] = await Promise.all([
    readFile(config.tlsCertFile),
    readFile(config.tlsKeyFile),
  ]);
  createServer({ cert, key }, app).listen(config.port, () => {
    logger.info("listening", { port: config.port, tls: true });
  });
} else {
  app.listen(config.port, () => {
    logger.info("listening", { port: config.port, tls: false });
  });
}

async function readToken(path: string): Promise<string | undefined> {
  try {
    const token = (await readFile(path, "utf8")).trim();
    return token.length > 0 ? token : undefined;
  } catch (error) {
    logger.warn("kube api token not readable, sending unauthenticated requests", {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}
