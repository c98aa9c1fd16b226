import "dotenv/config";
import type { Server } from "http";

import { buildApp } from "./app";
import {
  getArtifactDir,
  getImageFetchTimeoutMs,
  getImageMaxBytes,
  getInferenceTimeoutMs,
  getInferenceUrl,
  getPort,
  getQueueConfig,
} from "./config";
import { createFileArtifactStore } from "./modules/generation/artifact.storage";
import { createRemoteGenerationEngine } from "./modules/generation/generation.engine";
import { createImagePreparer } from "./modules/generation/image.preparer";
import { createGenerationContext, type GenerationContext } from "./modules/jobs/jobs.service";
import { initializeAppInsights } from "./observability/appInsights";
import { logError, logInfo } from "./observability/logger";
import { installProcessHandlers } from "./observability/processHandlers";
import { validateServiceEnv } from "./startup/envValidation";

export type RunningServer = {
  server: Server;
  context: GenerationContext;
  close: () => Promise<void>;
};

export async function startServer(): Promise<RunningServer> {
  installProcessHandlers();
  validateServiceEnv();
  initializeAppInsights();

  const artifacts = await createFileArtifactStore(getArtifactDir());
  const engine = createRemoteGenerationEngine({
    baseUrl: getInferenceUrl(),
    timeoutMs: getInferenceTimeoutMs(),
  });
  const preparer = createImagePreparer({
    fetchTimeoutMs: getImageFetchTimeoutMs(),
    maxBytes: getImageMaxBytes(),
  });

  const context = createGenerationContext({
    config: getQueueConfig(),
    engine,
    preparer,
    artifacts,
  });
  context.start();

  const app = buildApp(context);
  const port = getPort();
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(port, "0.0.0.0", () => resolve(listening));
  });
  logInfo("server_listening", { port, inferenceUrl: getInferenceUrl() });

  const close = async (): Promise<void> => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await context.stop();
    logInfo("server_stopped");
  };

  return { server, context, close };
}

if (require.main === module) {
  startServer()
    .then(({ close }) => {
      const shutdown = (signal: string): void => {
        logInfo("server_shutdown_requested", { signal });
        close().then(
          () => process.exit(0),
          (err: unknown) => {
            logError("server_shutdown_failed", {
              message: err instanceof Error ? err.message : String(err),
            });
            process.exit(1);
          }
        );
      };
      process.once("SIGTERM", () => shutdown("SIGTERM"));
      process.once("SIGINT", () => shutdown("SIGINT"));
    })
    .catch((err: unknown) => {
      logError("server_start_failed", {
        message: err instanceof Error ? err.message : String(err),
      });
      process.exit(1);
    });
}
