import { vi } from "vitest";
import type { AiTriageClient, TriageOutcome } from "../src/services/ai-triage-client.js";
import type { ServiceLogger } from "../src/services/logger.js";
import {
  type TranslationAdapter,
  type TranslationResult,
  createTranslationAdapter,
} from "../src/services/translation-adapter.js";

export function createSilentLogger(): ServiceLogger {
  return {
    info() {},
    warn() {},
    error() {},
  };
}

export function createRecordingLogger(): ServiceLogger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info(message) {
      lines.push(`info ${message}`);
    },
    warn(message) {
      lines.push(`warn ${message}`);
    },
    error(message) {
      lines.push(`error ${message}`);
    },
  };
}

export function createFakeAi(outcome: TriageOutcome | (() => Promise<TriageOutcome>)) {
  const callTriage = vi.fn<AiTriageClient["callTriage"]>(async () =>
    typeof outcome === "function" ? outcome() : outcome,
  );
  return { callTriage } satisfies AiTriageClient;
}

export function okReply(reply: { risk?: string; doctor_summary?: string; advice?: string }): TriageOutcome {
  const missingFields = (["risk", "doctor_summary", "advice"] as const).filter((field) => reply[field] === undefined);
  return { ok: true, reply, missingFields };
}

/** Translator whose code-level call returns the input unchanged. */
export function createEchoTranslator() {
  const translate = vi.fn<TranslationAdapter["translate"]>(
    async (text, sourceCode, targetCode): Promise<TranslationResult> => ({
      success: true,
      original_text: text,
      translated_text: text,
      source_language: sourceCode,
      target_language: targetCode,
      detected_language: null,
      confidence: 1,
    }),
  );
  return { adapter: createTranslationAdapter({ enabled: true, translate, logger: createSilentLogger() }), translate };
}

/** Translator that maps known phrases and fails for everything else. */
export function createDictionaryTranslator(dictionary: Record<string, string>) {
  const translate = vi.fn<TranslationAdapter["translate"]>(
    async (text, sourceCode, targetCode): Promise<TranslationResult> => {
      const translated = dictionary[text];
      if (translated === undefined) {
        return {
          success: false,
          original_text: text,
          source_language: sourceCode,
          target_language: targetCode,
          failure: "http_status",
          error: "API returned status 500",
        };
      }
      return {
        success: true,
        original_text: text,
        translated_text: translated,
        source_language: sourceCode,
        target_language: targetCode,
        detected_language: null,
        confidence: 1,
      };
    },
  );
  return { adapter: createTranslationAdapter({ enabled: true, translate, logger: createSilentLogger() }), translate };
}

export function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function textResponse(body: string, status: number): Response {
  return new Response(body, { status, headers: { "Content-Type": "text/plain" } });
}
