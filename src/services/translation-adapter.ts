import { randomUUID } from "node:crypto";
import { ProviderError, describeError } from "../errors.js";
import type { SarvamConfig } from "../types/service-config.js";
import { ENGLISH_CODE, getLanguageCode, isEnglish } from "./language-map.js";
import type { ServiceLogger } from "./logger.js";

export type TranslationFailureKind = "not_configured" | "timeout" | "http_status" | "exception";

export type TranslationSuccess = {
  success: true;
  original_text: string;
  translated_text: string;
  source_language: string;
  target_language: string;
  detected_language: string | null;
  confidence: number;
  skipped?: true;
};

export type TranslationFailure = {
  success: false;
  original_text: string;
  source_language: string;
  target_language: string;
  failure: TranslationFailureKind;
  error: string;
  details?: string;
};

export type TranslationResult = TranslationSuccess | TranslationFailure;

export type TranslationAdapter = {
  readonly enabled: boolean;
  translate: (text: string, sourceCode: string, targetCode: string) => Promise<TranslationResult>;
  translateToEnglish: (text: string, sourceLanguageName: string) => Promise<TranslationResult>;
  translateFromEnglish: (text: string, targetLanguageName: string) => Promise<TranslationResult>;
  detectLanguage: (text: string) => Promise<string | null>;
};

type TranslateFn = TranslationAdapter["translate"];

const AUTO_DETECT = "auto";

function toTrimmedString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return null;
}

function isTimeoutError(error: unknown): boolean {
  const record = asRecord(error);
  const name = toTrimmedString(record?.name);
  return name === "TimeoutError" || name === "AbortError";
}

function englishPassthrough(text: string): TranslationSuccess {
  return {
    success: true,
    original_text: text,
    translated_text: text,
    source_language: ENGLISH_CODE,
    target_language: ENGLISH_CODE,
    detected_language: null,
    confidence: 1,
    skipped: true,
  };
}

function notConfigured(text: string, sourceCode: string, targetCode: string, error: string): TranslationFailure {
  return {
    success: false,
    original_text: text,
    source_language: sourceCode,
    target_language: targetCode,
    failure: "not_configured",
    error,
  };
}

/** Layers the language-name operations over a code-level translate function. */
export function createTranslationAdapter(params: {
  enabled: boolean;
  translate: TranslateFn;
  logger: ServiceLogger;
}): TranslationAdapter {
  const { translate, logger } = params;

  return {
    enabled: params.enabled,
    translate,

    async translateToEnglish(text, sourceLanguageName) {
      if (isEnglish(sourceLanguageName)) {
        return englishPassthrough(text);
      }
      logger.info(`[triage] translating to English from ${sourceLanguageName}`);
      return translate(text, getLanguageCode(sourceLanguageName), ENGLISH_CODE);
    },

    async translateFromEnglish(text, targetLanguageName) {
      if (isEnglish(targetLanguageName)) {
        return englishPassthrough(text);
      }
      logger.info(`[triage] translating from English to ${targetLanguageName}`);
      return translate(text, ENGLISH_CODE, getLanguageCode(targetLanguageName));
    },

    async detectLanguage(text) {
      const result = await translate(text, AUTO_DETECT, ENGLISH_CODE);
      if (!result.success) {
        logger.warn(`[triage] language detection failed: ${result.error}`);
        return null;
      }
      return result.detected_language ?? ENGLISH_CODE;
    },
  };
}

function readSuccessPayload(params: {
  payload: unknown;
  text: string;
  sourceCode: string;
  targetCode: string;
}): TranslationSuccess {
  const data = asRecord(params.payload);
  if (!data) {
    throw new ProviderError("sarvam", "Translation response was not a JSON object.");
  }
  const detected =
    toTrimmedString(data.detected_language) || toTrimmedString(data.source_language_code) || null;
  const confidence =
    typeof data.confidence === "number" && Number.isFinite(data.confidence) ? data.confidence : 1;

  return {
    success: true,
    original_text: params.text,
    translated_text: typeof data.translated_text === "string" ? data.translated_text : "",
    source_language: params.sourceCode,
    target_language: params.targetCode,
    detected_language: detected,
    confidence,
  };
}

export function createSarvamTranslationAdapter(params: {
  config: SarvamConfig;
  logger: ServiceLogger;
}): TranslationAdapter {
  const { config, logger } = params;
  const apiKey = config.apiKey;

  if (!apiKey) {
    logger.warn("[triage] SARVAM_API_KEY not set; translation disabled");
  }

  const translate: TranslateFn = async (text, sourceCode, targetCode) => {
    if (!apiKey) {
      logger.error("[triage] translation requested but Sarvam is not configured");
      return notConfigured(text, sourceCode, targetCode, "Translation service not configured");
    }

    const callId = `sarvam_${randomUUID().slice(0, 8)}`;
    logger.info(`[triage] [${callId}] translation request: ${sourceCode} -> ${targetCode} (${text.length} chars)`);

    try {
      const upstream = await fetch(config.apiUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${apiKey}`,
          "api-subscription-key": apiKey,
        },
        body: JSON.stringify({
          input: text,
          source_language_code: sourceCode,
          target_language_code: targetCode,
          speaker_gender: "Female",
          mode: "formal",
          model: "mayura:v1",
          enable_preprocessing: true,
        }),
        signal: AbortSignal.timeout(config.timeoutMs),
      });

      if (!upstream.ok) {
        const details = await upstream.text().catch(() => "");
        logger.error(`[triage] [${callId}] translation API error ${upstream.status}: ${details}`);
        return {
          success: false,
          original_text: text,
          source_language: sourceCode,
          target_language: targetCode,
          failure: "http_status",
          error: `API returned status ${upstream.status}`,
          details,
        };
      }

      const result = readSuccessPayload({
        payload: await upstream.json(),
        text,
        sourceCode,
        targetCode,
      });
      logger.info(`[triage] [${callId}] translation successful`);
      return result;
    } catch (error) {
      if (isTimeoutError(error)) {
        logger.error(`[triage] [${callId}] translation timed out after ${config.timeoutMs}ms`);
        return {
          success: false,
          original_text: text,
          source_language: sourceCode,
          target_language: targetCode,
          failure: "timeout",
          error: "Translation request timed out",
        };
      }
      const described = describeError(error);
      logger.error(`[triage] [${callId}] translation failed: ${described.type}: ${described.message}`);
      return {
        success: false,
        original_text: text,
        source_language: sourceCode,
        target_language: targetCode,
        failure: "exception",
        error: described.message,
      };
    }
  };

  return createTranslationAdapter({ enabled: Boolean(apiKey), translate, logger });
}

/** Stand-in used when multi-language support is switched off. */
export function createDisabledTranslationAdapter(logger: ServiceLogger): TranslationAdapter {
  const translate: TranslateFn = async (text, sourceCode, targetCode) =>
    notConfigured(text, sourceCode, targetCode, "Translation service disabled");
  return createTranslationAdapter({ enabled: false, translate, logger });
}
