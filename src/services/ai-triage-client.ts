import { randomUUID } from "node:crypto";
import { GoogleGenAI, type GenerateContentParameters, type Part } from "@google/genai";
import { Type, type Static } from "@sinclair/typebox";
import { ProviderError, describeError } from "../errors.js";
import type { GeminiConfig } from "../types/service-config.js";
import { decodeImage } from "./image-attachment.js";
import type { ServiceLogger } from "./logger.js";
import { TRIAGE_FIELDS, type TriageField, buildTriagePrompt } from "./triage-prompt.js";

export const TriageReplySchema = Type.Object(
  {
    risk: Type.String({ enum: ["LOW", "MODERATE", "HIGH"] }),
    doctor_summary: Type.String(),
    advice: Type.String(),
  },
  { additionalProperties: false },
);

export type TriageReplyShape = Static<typeof TriageReplySchema>;

export type TriageReply = Partial<TriageReplyShape>;

export type TriageErrorKind = "empty_response" | "parse_failure" | "provider_exception";

export type TriageOutcome =
  | {
      ok: true;
      reply: TriageReply;
      missingFields: TriageField[];
    }
  | {
      ok: false;
      kind: TriageErrorKind;
      error: string;
      rawError: string;
      rawText?: string;
      exceptionType?: string;
    };

export type GenerateTriageContent = (
  request: GenerateContentParameters,
) => Promise<{ text?: string | undefined }>;

export type AiTriageClient = {
  callTriage: (symptomText: string, imageBytes?: Uint8Array | null) => Promise<TriageOutcome>;
};

const RAW_TEXT_PREVIEW_CHARS = 500;

const GENERATION_SETTINGS = {
  temperature: 1,
  topP: 0.95,
  topK: 64,
  maxOutputTokens: 8192,
} as const;

function asRecord(value: unknown): Record<string, unknown> | null {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return null;
}

function extractReply(record: Record<string, unknown>): { reply: TriageReply; missingFields: TriageField[] } {
  const reply: TriageReply = {};
  const missingFields: TriageField[] = [];
  for (const field of TRIAGE_FIELDS) {
    const value = record[field];
    if (typeof value === "string") {
      reply[field] = value;
    } else {
      missingFields.push(field);
    }
  }
  return { reply, missingFields };
}

function withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  // Synchronous throws from run land in work, so the timer below is always cleared.
  const work = Promise.resolve().then(() => run(controller.signal));
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      const error = new ProviderError("gemini", `AI request timed out after ${timeoutMs}ms`);
      error.name = "TimeoutError";
      reject(error);
    }, timeoutMs);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

export function createAiTriageClient(params: {
  model: string;
  timeoutMs: number;
  generate: GenerateTriageContent;
  logger: ServiceLogger;
}): AiTriageClient {
  const { logger } = params;

  return {
    async callTriage(symptomText, imageBytes) {
      const callId = randomUUID().slice(0, 8);
      const parts: Part[] = [{ text: buildTriagePrompt(symptomText) }];

      if (imageBytes && imageBytes.length > 0) {
        const decoded = decodeImage(imageBytes);
        if (decoded.ok) {
          parts.push({ inlineData: { mimeType: decoded.image.mimeType, data: decoded.image.base64 } });
          logger.info(
            `[triage] [llm:${callId}] image attached: ${decoded.image.mimeType}, ${decoded.image.byteLength} bytes`,
          );
        } else {
          logger.warn(`[triage] [llm:${callId}] image decode failed (${decoded.reason}); text-only analysis`);
        }
      }

      let text: string | undefined;
      try {
        const startedAt = Date.now();
        const response = await withTimeout(
          (abortSignal) =>
            params.generate({
              model: params.model,
              contents: [{ role: "user", parts }],
              config: {
                ...GENERATION_SETTINGS,
                responseMimeType: "application/json",
                responseJsonSchema: TriageReplySchema,
                abortSignal,
              },
            }),
          params.timeoutMs,
        );
        text = response.text;
        logger.info(`[triage] [llm:${callId}] response received in ${Date.now() - startedAt}ms`);
      } catch (error) {
        const described = describeError(error);
        logger.error(`[triage] [llm:${callId}] call failed: ${described.type}: ${described.message}`);
        return {
          ok: false,
          kind: "provider_exception",
          error: "Failed to fetch the details",
          rawError: described.message,
          exceptionType: described.type,
        };
      }

      if (!text || text.trim().length === 0) {
        logger.error(`[triage] [llm:${callId}] empty response text received`);
        return {
          ok: false,
          kind: "empty_response",
          error: "Empty response from AI",
          rawError: "Response text was empty or None",
        };
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch (error) {
        logger.error(`[triage] [llm:${callId}] JSON parsing failed: ${describeError(error).message}`);
        return {
          ok: false,
          kind: "parse_failure",
          error: "Failed to parse AI response as JSON",
          rawError: describeError(error).message,
          rawText: text.slice(0, RAW_TEXT_PREVIEW_CHARS),
        };
      }

      const record = asRecord(parsed);
      if (!record) {
        logger.error(`[triage] [llm:${callId}] response JSON is not an object`);
        return {
          ok: false,
          kind: "parse_failure",
          error: "Failed to parse AI response as JSON",
          rawError: "Response JSON was not an object",
          rawText: text.slice(0, RAW_TEXT_PREVIEW_CHARS),
        };
      }

      const { reply, missingFields } = extractReply(record);
      if (missingFields.length > 0) {
        logger.warn(`[triage] [llm:${callId}] missing expected fields: ${missingFields.join(", ")}`);
      }
      return { ok: true, reply, missingFields };
    },
  };
}

export function createGeminiTriageClient(params: { config: GeminiConfig; logger: ServiceLogger }): AiTriageClient {
  const ai = new GoogleGenAI({ apiKey: params.config.apiKey });
  params.logger.info(`[triage] Gemini model initialized: ${params.config.model}`);
  return createAiTriageClient({
    model: params.config.model,
    timeoutMs: params.config.timeoutMs,
    generate: (request) => ai.models.generateContent(request),
    logger: params.logger,
  });
}
