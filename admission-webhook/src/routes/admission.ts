import { Router } from "express";
import { z } from "zod";
import {
  ADMISSION_API_VERSION,
  toAdmissionReview,
} from "../domain/admission.js";
import type { RestoreAdmitter } from "../services/restore-admitter.js";

const admissionReviewSchema = z.object({
  apiVersion: z.string().optional(),
  kind: z.literal("AdmissionReview"),
  request: z.object({
    uid: z.string().min(1),
    operation: z.string().min(1),
    resource: z.object({
      group: z.string().default(""),
      version: z.string().optional(),
      resource: z.string(),
    }),
    namespace: z.string().optional(),
    object: z.unknown().optional(),
    oldObject: z.unknown().optional(),
  }),
});

export interface AdmissionRouterOptions {
  readonly admitter: RestoreAdmitter;
  readonly timeoutMs: number;
}

export function createAdmissionRouter(options: AdmissionRouterOptions): Router {
  const router = Router();

  router.post("/validate-virtualmachinerestores", async (req, res) => {
    const parsed = admissionReviewSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }

    const { request } = parsed.data;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
    const onClose = () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    };
    res.on("close", onClose);

    try {
      const outcome = await options.admitter.admit(
        {
          uid: request.uid,
          operation: request.operation,
          resource: request.resource,
          namespace: request.namespace,
          object: request.object,
          oldObject: request.oldObject,
        },
        { signal: controller.signal },
      );
      return res.json(
        toAdmissionReview(
          request.uid,
          outcome,
          parsed.data.apiVersion ?? ADMISSION_API_VERSION,
        ),
      );
    } finally {
      clearTimeout(timeout);
      res.off("close", onClose);
    }
  });

  return router;
}
