import { GoogleGenAI, Schema } from "@google/genai";
import {
  GEMINI_API_KEY,
  GEMINI_MODEL_NAME,
  MODEL_TEMPERATURE,
  MODEL_TIMEOUT_MS,
} from "../utils/constants";
import { ModelResponseError } from "../utils/errors";

export interface ModelRequest {
  /* Pipeline step or operation the call belongs to */
  step: string;
  prompt: string;
  /* When set, the model is asked for JSON matching this schema */
  responseSchema?: Schema;
}

/**
 * Prompt string in, completion string out. The only boundary to the model
 * provider; everything above it works against this interface.
 */
export interface ModelClient {
  generate(request: ModelRequest): Promise<string>;
}

interface GeminiModelClientOptions {
  apiKey?: string;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
}

/* ModelClient backed by Google Gemini */
export class GeminiModelClient implements ModelClient {
  private geminiClient: GoogleGenAI;
  private readonly model: string;
  private readonly temperature: number;

  constructor(options: GeminiModelClientOptions = {}) {
    this.geminiClient = new GoogleGenAI({
      apiKey: options.apiKey ?? GEMINI_API_KEY,
      httpOptions: { timeout: options.timeoutMs ?? MODEL_TIMEOUT_MS },
    });
    this.model = options.model ?? GEMINI_MODEL_NAME;
    this.temperature = options.temperature ?? MODEL_TEMPERATURE;
  }

  async generate(request: ModelRequest): Promise<string> {
    const response = await this.geminiClient.models.generateContent({
      model: this.model,
      contents: request.prompt,
      config: request.responseSchema
        ? {
            temperature: this.temperature,
            responseMimeType: "application/json",
            responseSchema: request.responseSchema,
          }
        : { temperature: this.temperature },
    });

    if (!response?.text) {
      throw new ModelResponseError(
        `No response from LLM for step "${request.step}"`,
      );
    }

    return response.text;
  }
}
