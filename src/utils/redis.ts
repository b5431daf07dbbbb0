import Redis from "ioredis";

// BullMQ requires maxRetriesPerRequest to be null
export function createRedisConnection(): Redis {
  return new Redis(process.env.REDIS_URL ?? "redis://localhost:6379", {
    maxRetriesPerRequest: null,
  });
}
