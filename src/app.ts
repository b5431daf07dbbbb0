import express from "express";
import { errorHandler } from "./api/middlewares/error.middleware";
import { createApplicationRouter } from "./api/routes/application.routes";
import { createJobRouter } from "./api/routes/job.routes";
import type { ApplicationJobQueue } from "./jobs/application-queue";
import type { ApplicationService } from "./services/application.services";

export interface AppDependencies {
  applicationService: ApplicationService;
  jobQueue: ApplicationJobQueue;
}

export function createApp({ applicationService, jobQueue }: AppDependencies) {
  const app = express();

  app.use(express.json({ limit: "2mb" }));

  app.get("/", (req, res) => {
    res.send("Job application copilot is running.");
  });

  app.use(createApplicationRouter(applicationService));
  app.use(createJobRouter(jobQueue));
  app.use(errorHandler);

  return app;
}
