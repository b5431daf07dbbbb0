import { type JobsOptions, Queue } from "bullmq";
import type { ApplicationInput } from "../pipeline/application-state";
import type { ApplicationReport } from "../pipeline/report";
import { QUEUE_NAME } from "../utils/constants";
import { createRedisConnection } from "../utils/redis";

export type ApplicationJobData = ApplicationInput;

export interface ApplicationJobResult {
  report: ApplicationReport;
}

/* The parts of a BullMQ job the HTTP layer reads */
export interface ApplicationJobHandle {
  id?: string;
  returnvalue: ApplicationJobResult | null;
  failedReason: string;
  getState(): Promise<string>;
}

/* The parts of the BullMQ queue the HTTP layer uses */
export interface ApplicationJobQueue {
  add(
    name: string,
    data: ApplicationJobData,
    opts?: JobsOptions,
  ): Promise<ApplicationJobHandle>;
  getJob(id: string): Promise<ApplicationJobHandle | undefined>;
}

export function createApplicationQueue(): Queue<
  ApplicationJobData,
  ApplicationJobResult
> {
  return new Queue<ApplicationJobData, ApplicationJobResult>(QUEUE_NAME, {
    connection: createRedisConnection(),
  });
}
