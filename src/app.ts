import express, { type Express } from "express";
import cors from "cors";

import { getCorsOrigins, getRequestBodyLimit } from "./config";
import { errorHandler, notFoundHandler } from "./middleware/errors";
import { requestId } from "./middleware/requestId";
import { requestLogger } from "./middleware/requestLogger";
import { createJobsRouter } from "./modules/jobs/jobs.routes";
import type { GenerationContext } from "./modules/jobs/jobs.service";

export function buildApp(ctx: GenerationContext): Express {
  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", 1);

  app.use(requestId);
  app.use(requestLogger);
  app.use(cors({ origin: getCorsOrigins() }));
  app.use(express.json({ limit: getRequestBodyLimit() }));

  app.use(createJobsRouter(ctx));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
