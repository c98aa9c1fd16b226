import { Router, type Response } from "express";
import { logInfo } from "../../observability/logger";
import {
  getHealth,
  getJobArtifact,
  getJobStatus,
  getQueueStats,
  processingTimeOf,
  statusUrl,
  waitForJob,
  type GenerationContext,
  type JobArtifact,
} from "./jobs.service";

function sendArtifact(res: Response, artifact: JobArtifact): void {
  res.setHeader("Content-Type", artifact.contentType);
  res.setHeader("Content-Disposition", `attachment; filename="${artifact.filename}"`);
  res.setHeader("Content-Length", String(artifact.data.length));
  res.status(200).send(artifact.data);
}

export function createJobsRouter(ctx: GenerationContext): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    res.status(200).json(getHealth(ctx));
  });

  router.get("/queue", (_req, res) => {
    res.status(200).json(getQueueStats(ctx));
  });

  router.post("/generate/async", (req, res, next) => {
    try {
      const { jobId, position } = ctx.admission.submit(req.body);
      res.status(202).json({
        job_id: jobId,
        status: "queued",
        position,
        status_url: statusUrl(jobId),
      });
    } catch (err) {
      next(err);
    }
  });

  router.get("/status/:jobId", (req, res, next) => {
    try {
      res.status(200).json(getJobStatus(ctx, req.params.jobId));
    } catch (err) {
      next(err);
    }
  });

  router.get("/download/:jobId", async (req, res, next) => {
    try {
      const artifact = await getJobArtifact(ctx, req.params.jobId);
      sendArtifact(res, artifact);
    } catch (err) {
      next(err);
    }
  });

  router.post("/generate", async (req, res, next) => {
    try {
      const { jobId } = ctx.admission.submit(req.body);
      const record = await waitForJob(ctx, jobId, ctx.config.syncWaitTimeoutMs);
      if (record.status !== "completed") {
        res.status(500).json({
          success: false,
          job_id: jobId,
          error: record.error ?? "Unknown error",
        });
        return;
      }

      const artifact = await getJobArtifact(ctx, jobId);
      logInfo("sync_generation_returned", { jobId, sizeBytes: artifact.data.length });
      res.status(200).json({
        success: true,
        job_id: jobId,
        model_data: artifact.data.toString("base64"),
        format: artifact.format,
        processing_time: processingTimeOf(record),
        ...(artifact.vertices !== undefined ? { vertices: artifact.vertices } : {}),
        ...(artifact.faces !== undefined ? { faces: artifact.faces } : {}),
      });
    } catch (err) {
      next(err);
    }
  });

  router.post("/generate-file", async (req, res, next) => {
    try {
      const { jobId } = ctx.admission.submit(req.body);
      const record = await waitForJob(ctx, jobId, ctx.config.syncWaitTimeoutMs);
      if (record.status !== "completed") {
        res.status(500).json({
          success: false,
          job_id: jobId,
          error: record.error ?? "Unknown error",
        });
        return;
      }
      sendArtifact(res, await getJobArtifact(ctx, jobId));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
