import "dotenv/config";
import { createApp } from "./app";
import { createApplicationQueue } from "./jobs/application-queue";
import { ApplicationService } from "./services/application.services";
import { LLMService } from "./services/llm.services";
import { GeminiModelClient } from "./services/model-client";
import { PORT } from "./utils/constants";
import logger from "./utils/logger";

const applicationService = new ApplicationService(
  new LLMService(new GeminiModelClient()),
);

const app = createApp({
  applicationService,
  jobQueue: createApplicationQueue(),
});

app.listen(PORT, () => {
  logger.info(`Server started successfully`, { port: PORT });
});
