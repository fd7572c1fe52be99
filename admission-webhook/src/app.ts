import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { InMemoryCluster } from "./adapters/in-memory-cluster.js";
import { StaticFeatureGate } from "./adapters/static-feature-gate.js";
import { createLogger, type Logger } from "./observability/logger.js";
import type { ClusterReaders } from "./ports/cluster-readers.js";
import type { FeatureGate } from "./ports/feature-gate.js";
import { createAdmissionRouter } from "./routes/admission.js";
import { createHealthRouter } from "./routes/health.js";
import { RestoreAdmitter } from "./services/restore-admitter.js";

export interface CreateAdmissionWebhookAppOptions {
  readonly cluster?: ClusterReaders;
  readonly featureGate?: FeatureGate;
  readonly admissionTimeoutMs?: number;
  readonly jsonBodyLimit?: string;
  readonly logger?: Logger;
}

export function createAdmissionWebhookApp(
  options: CreateAdmissionWebhookAppOptions = {},
): Express {
  const app = express();
  app.use(express.json({ limit: options.jsonBodyLimit ?? "2mb" }));

  const cluster = options.cluster ?? new InMemoryCluster();
  const featureGate = options.featureGate ?? new StaticFeatureGate(true);
  const logger =
    options.logger ?? createLogger({ component: "restore-admission" });

  const admitter = new RestoreAdmitter({
    featureGate,
    virtualMachines: cluster,
    virtualMachineInstances: cluster,
    snapshots: cluster,
    snapshotContents: cluster,
    restoreIndex: cluster,
    logger,
  });

  app.use(createHealthRouter(featureGate));
  app.use(
    createAdmissionRouter({
      admitter,
      timeoutMs: options.admissionTimeoutMs ?? 10_000,
    }),
  );

  // Body parser failures land here; anything else is unexpected.
  app.use(
    (error: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const status = readStatus(error);
      if (status === 400 || status === 413) {
        res.status(status).json({ error: "invalid request body" });
        return;
      }
      logger.error("unhandled request error", {
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(500).json({ error: "internal error" });
    },
  );

  return app;
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("status" in error)) {
    return undefined;
  }
  return typeof error.status === "number" ? error.status : undefined;
}
