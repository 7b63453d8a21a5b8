import { randomUUID } from "node:crypto";
import type { Hono } from "hono";
import { z } from "zod";
import { ENGLISH, getLanguageCode, getLanguageName, isEnglish } from "../services/language-map.js";
import type { ServiceLogger } from "../services/logger.js";
import type { TranslationAdapter, TranslationResult } from "../services/translation-adapter.js";
import { optionalFormText, parseFields, readForm } from "./form.js";

export const DEFAULT_TARGET_LANGUAGE = "हिंदी";
const AUTO_DETECT = "auto";

const TranslateFieldsSchema = z.object({
  text: z.string({ required_error: "text is required" }).trim().min(1, "text is required"),
  target_language: optionalFormText,
  source_language: optionalFormText,
});

async function resolveSourceLanguage(translator: TranslationAdapter, text: string, requested: string): Promise<string> {
  if (requested.toLowerCase() !== AUTO_DETECT) {
    return requested;
  }
  const detected = await translator.detectLanguage(text);
  return detected ? getLanguageName(detected) : ENGLISH;
}

async function translateBetween(
  translator: TranslationAdapter,
  text: string,
  sourceLanguage: string,
  targetLanguage: string,
): Promise<TranslationResult> {
  if (isEnglish(sourceLanguage)) {
    return translator.translateFromEnglish(text, targetLanguage);
  }
  if (isEnglish(targetLanguage)) {
    return translator.translateToEnglish(text, sourceLanguage);
  }
  return translator.translate(text, getLanguageCode(sourceLanguage), getLanguageCode(targetLanguage));
}

export function registerTranslateRoute(
  app: Hono,
  deps: { translator: TranslationAdapter; logger: ServiceLogger },
): void {
  app.post("/translate", async (c) => {
    const fields = parseFields(TranslateFieldsSchema, await readForm(c));
    const requestId = randomUUID();
    const targetLanguage = fields.target_language ?? DEFAULT_TARGET_LANGUAGE;
    const sourceLanguage = await resolveSourceLanguage(
      deps.translator,
      fields.text,
      fields.source_language ?? ENGLISH,
    );
    deps.logger.info(`[triage] [${requestId}] translation request: ${sourceLanguage} -> ${targetLanguage}`);

    const result = await translateBetween(deps.translator, fields.text, sourceLanguage, targetLanguage);
    if (result.success) {
      return c.json({
        success: true,
        original: fields.text,
        translated: result.translated_text,
        language: targetLanguage,
        source_language: sourceLanguage,
        request_id: requestId,
      });
    }

    return c.json({
      success: false,
      error: result.error,
      original: fields.text,
      note: "Fallback to original text",
      request_id: requestId,
    });
  });
}
