function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

// Server Configuration
export const PORT = readNumber("PORT", 3000);

// Google Gemini Configuration
export const GEMINI_API_KEY =
  process.env.GEMINI_API_KEY || process.env.GOOGLE_API_KEY || "";
export const GEMINI_MODEL_NAME =
  process.env.GEMINI_MODEL_NAME || "gemini-2.5-flash";
export const MODEL_TEMPERATURE = readNumber("MODEL_TEMPERATURE", 0.7);

// Model call limits
export const MODEL_TIMEOUT_MS = readNumber("MODEL_TIMEOUT_MS", 60_000);
export const MODEL_MAX_ATTEMPTS = readNumber("MODEL_MAX_ATTEMPTS", 3);
export const MODEL_RETRY_BACKOFF_MS = [1000, 2000, 4000];

// Documents
export const MIN_DOCUMENT_LENGTH = 50;
export const MAX_UPLOAD_FILE_SIZE = 10 * 1024 * 1024; // 10 MB
export const MAX_LISTED_SKILLS = 15;

// Improvement suggestion caps per tier
export const MIN_DEEP_SUGGESTIONS = 4;
export const MAX_STANDARD_SUGGESTIONS = 3;
export const MAX_DEEP_SUGGESTIONS = 7;

// BullMQ Queue Configuration
export const QUEUE_NAME = "application-package";
export const WORKER_CONCURRENCY = readNumber("WORKER_CONCURRENCY", 2);
export const ATTEMPTS_RETRY = 2;
export const EXPONENTIAL_BACKOFF_DELAY = 5000;
export const REMOVE_ON_COMPLETE = { age: 60 * 60, count: 100 };
export const REMOVE_ON_FAIL = { age: 24 * 60 * 60 };
