import { Router } from "express";
import type { FeatureGate } from "../ports/feature-gate.js";

export function createHealthRouter(featureGate: FeatureGate): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      restoreFeatureEnabled: featureGate.isRestoreFeatureEnabled(),
      time: new Date().toISOString(),
    });
  });

  return router;
}
