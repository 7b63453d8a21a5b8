import { randomUUID } from "node:crypto";
import { describeError } from "../errors.js";
import type { AiTriageClient, TriageOutcome } from "../services/ai-triage-client.js";
import { anonymizeText } from "../services/anonymizer.js";
import type { ComplianceLedger } from "../services/compliance-ledger.js";
import {
  EMERGENCY_ADVICE,
  EMERGENCY_CONTACTS,
  EMERGENCY_SUMMARY,
  type UrgentPhrase,
  detectEmergency,
} from "../services/emergency-detector.js";
import { ENGLISH, isEnglish } from "../services/language-map.js";
import type { ServiceLogger } from "../services/logger.js";
import type { TranslationAdapter } from "../services/translation-adapter.js";

export const MIN_SYMPTOM_LENGTH = 5;

export type RiskLevel = "LOW" | "MODERATE" | "HIGH" | "ERROR";

export type TriageStatus =
  | "success"
  | "incomplete_input"
  | "consent_required"
  | "emergency_detected"
  | "ai_error"
  | "ai_partial_failure";

export const SAFE_DEFAULTS = {
  risk: "MODERATE",
  doctorSummary: "No detailed summary available",
  advice: "Please consult a medical professional.",
} as const;

export type ImageSource = {
  read: () => Promise<Uint8Array>;
};

export type TriageRequest = {
  symptomText: string;
  userLanguage?: string;
  consentGiven?: boolean;
  image?: ImageSource | null;
};

export type TriageResponse = {
  risk: RiskLevel;
  doctor_summary: string;
  advice: string;
  status: TriageStatus;
  request_id: string;
  user_language?: string;
  whatsapp_enabled?: boolean;
  translation_used?: boolean;
  translation_degraded?: boolean;
  debug_keywords?: UrgentPhrase[];
  emergency_contacts?: typeof EMERGENCY_CONTACTS;
  compliance?: {
    data_retention_days: number;
    anonymized: boolean;
    audit_logged: boolean;
  };
  debug_info?: Record<string, string | number | boolean | null>;
};

export type TriageOrchestratorOptions = {
  /** Language-aware variant: inbound/outbound translation around the AI call. */
  languageSupport: boolean;
  /** Only enforced by the language-aware variant. */
  consentRequired: boolean;
  dataRetentionDays: number;
  whatsappEnabled: boolean;
};

export type TriageOrchestrator = {
  analyze: (request: TriageRequest) => Promise<TriageResponse>;
};

/** Upper-cases only; surrounding whitespace or any other value falls back to MODERATE. */
export function normalizeRisk(value: string | undefined): Exclude<RiskLevel, "ERROR"> {
  const normalized = (value ?? SAFE_DEFAULTS.risk).toUpperCase();
  if (normalized === "LOW" || normalized === "MODERATE" || normalized === "HIGH") {
    return normalized;
  }
  return SAFE_DEFAULTS.risk;
}

export function formatTriageReport(params: {
  summary: string;
  risk: RiskLevel;
  advice: string;
  dataRetentionDays: number;
}): string {
  return [
    "AI TRIAGE SUMMARY",
    "━━━━━━━━━━━━━━━━━━━━━━━━━━━━━",
    params.summary,
    "",
    `Risk Level: ${params.risk}`,
    "",
    "Recommended Action:",
    params.advice,
    "",
    "━━━━━━━━━━━━━━━━━━━━━━━━━━━━━",
    "⚕️ Medical Disclaimer: This is AI-assisted triage, NOT a medical diagnosis.",
    "Always consult a qualified healthcare provider for proper evaluation.",
    "",
    `📋 Data Privacy: Your data is processed securely and will be auto-deleted after ${params.dataRetentionDays} days.`,
  ].join("\n");
}

function resolveLanguage(value: string | undefined): string {
  const trimmed = typeof value === "string" ? value.trim() : "";
  return trimmed || ENGLISH;
}

function preview(text: string, maxChars = 100): string {
  return text.length <= maxChars ? text : `${text.slice(0, maxChars)}...`;
}

export function createTriageOrchestrator(deps: {
  ai: AiTriageClient;
  translator: TranslationAdapter;
  ledger: ComplianceLedger;
  logger: ServiceLogger;
  options: TriageOrchestratorOptions;
  createRequestId?: () => string;
}): TriageOrchestrator {
  const { ai, translator, ledger, logger, options } = deps;
  const createRequestId = deps.createRequestId ?? randomUUID;

  async function translateBestEffort(requestId: string, text: string, language: string): Promise<string> {
    try {
      const result = await translator.translateFromEnglish(text, language);
      if (result.success) {
        return result.translated_text || text;
      }
      logger.warn(`[triage] [${requestId}] outbound translation failed (${result.error}); keeping English`);
    } catch (error) {
      logger.error(`[triage] [${requestId}] outbound translation threw: ${describeError(error).message}`);
    }
    return text;
  }

  async function readImage(requestId: string, image: ImageSource | null | undefined): Promise<Uint8Array | null> {
    if (!image) {
      return null;
    }
    try {
      const bytes = await image.read();
      logger.info(`[triage] [${requestId}] image received: ${bytes.length} bytes`);
      return bytes.length > 0 ? bytes : null;
    } catch (error) {
      logger.error(`[triage] [${requestId}] image read error: ${describeError(error).message}`);
      return null;
    }
  }

  async function invokeAi(text: string, image: Uint8Array | null): Promise<TriageOutcome> {
    try {
      return await ai.callTriage(text, image);
    } catch (error) {
      const described = describeError(error);
      return {
        ok: false,
        kind: "provider_exception",
        error: "Failed to fetch the details",
        rawError: described.message,
        exceptionType: described.type,
      };
    }
  }

  return {
    async analyze(request): Promise<TriageResponse> {
      const requestId = createRequestId();
      const userLanguage = resolveLanguage(request.userLanguage);
      const translating = options.languageSupport && !isEnglish(userLanguage);
      const symptomText = request.symptomText;

      logger.info(`[triage] [${requestId}] new analysis request (language=${userLanguage})`);
      ledger.recordAudit({
        action: "analyze_request",
        requestId,
        userData: { lang: userLanguage },
        status: "started",
      });

      if (options.languageSupport && options.consentRequired && request.consentGiven !== true) {
        logger.warn(`[triage] [${requestId}] consent not provided`);
        return {
          risk: "ERROR",
          doctor_summary: "Consent required to proceed",
          advice: "Please accept the terms and conditions to use this service.",
          status: "consent_required",
          request_id: requestId,
        };
      }

      if (symptomText.trim().length < MIN_SYMPTOM_LENGTH) {
        logger.warn(`[triage] [${requestId}] insufficient symptom detail`);
        return {
          risk: "LOW",
          doctor_summary: "Insufficient symptom detail provided.",
          advice: "Please add more details for better guidance.",
          status: "incomplete_input",
          request_id: requestId,
        };
      }

      const anonymized = anonymizeText(symptomText);
      logger.info(`[triage] [${requestId}] symptoms (anonymized): ${preview(anonymized)}`);

      let workingText = symptomText;
      let translationDegraded = false;
      if (translating) {
        try {
          const inbound = await translator.translateToEnglish(symptomText, userLanguage);
          if (inbound.success) {
            workingText = inbound.translated_text || symptomText;
          } else {
            translationDegraded = true;
            logger.warn(`[triage] [${requestId}] inbound translation failed (${inbound.error}); using original text`);
          }
        } catch (error) {
          translationDegraded = true;
          logger.error(`[triage] [${requestId}] inbound translation threw: ${describeError(error).message}`);
        }
      }

      const scan = detectEmergency(workingText);
      if (scan.urgent) {
        logger.warn(`[triage] [${requestId}] emergency keywords detected: ${scan.matched.join(", ")}`);
        ledger.recordAudit({
          action: "emergency_detected",
          requestId,
          userData: { keywords: scan.matched },
          status: "alert",
        });

        const [summary, advice] = translating
          ? await Promise.all([
              translateBestEffort(requestId, EMERGENCY_SUMMARY, userLanguage),
              translateBestEffort(requestId, EMERGENCY_ADVICE, userLanguage),
            ])
          : [EMERGENCY_SUMMARY, EMERGENCY_ADVICE];

        return {
          risk: "HIGH",
          doctor_summary: summary,
          advice,
          status: "emergency_detected",
          request_id: requestId,
          user_language: userLanguage,
          debug_keywords: scan.matched,
          emergency_contacts: EMERGENCY_CONTACTS,
        };
      }

      const imageBytes = await readImage(requestId, request.image);

      logger.info(`[triage] [${requestId}] sending to AI`);
      const outcome = await invokeAi(workingText, imageBytes);

      if (!outcome.ok) {
        if (outcome.kind === "provider_exception") {
          logger.error(`[triage] [${requestId}] AI call failed: ${outcome.exceptionType ?? "Error"}: ${outcome.rawError}`);
          ledger.recordAudit({ action: "llm_error", requestId, status: "failed" });
          return {
            risk: "ERROR",
            doctor_summary: "System temporarily unavailable",
            advice: "Please try again or consult a doctor directly.",
            status: "ai_error",
            request_id: requestId,
            debug_info: { error: outcome.error, raw_error: outcome.rawError },
          };
        }

        logger.error(`[triage] [${requestId}] AI returned error: ${outcome.error}`);
        ledger.recordAudit({ action: "llm_partial", requestId, status: "failed" });
        return {
          risk: "MODERATE",
          doctor_summary: "Analysis incomplete",
          advice: "Please consult a medical professional.",
          status: "ai_partial_failure",
          request_id: requestId,
          debug_info: { error: outcome.error, raw_error: outcome.rawError },
        };
      }

      let risk: RiskLevel = normalizeRisk(outcome.reply.risk);
      if (translationDegraded && risk === "LOW") {
        logger.warn(`[triage] [${requestId}] raising LOW to MODERATE after failed inbound translation`);
        risk = "MODERATE";
      }
      let summary = outcome.reply.doctor_summary ?? SAFE_DEFAULTS.doctorSummary;
      let advice = outcome.reply.advice ?? SAFE_DEFAULTS.advice;

      if (translating) {
        [summary, advice] = await Promise.all([
          translateBestEffort(requestId, summary, userLanguage),
          translateBestEffort(requestId, advice, userLanguage),
        ]);
      }

      logger.info(`[triage] [${requestId}] analysis complete: risk=${risk}`);
      ledger.recordAudit({
        action: "analyze_complete",
        requestId,
        userData: { risk, symptoms: anonymized },
        status: "success",
      });

      return {
        risk,
        doctor_summary: formatTriageReport({
          summary,
          risk,
          advice,
          dataRetentionDays: options.dataRetentionDays,
        }),
        advice,
        status: "success",
        request_id: requestId,
        user_language: userLanguage,
        whatsapp_enabled: options.whatsappEnabled,
        translation_used: translating,
        translation_degraded: translationDegraded,
        compliance: {
          data_retention_days: options.dataRetentionDays,
          anonymized: true,
          audit_logged: true,
        },
        debug_info: {
          symptom_length: symptomText.length,
          image_provided: imageBytes !== null,
          image_size_kb: imageBytes ? Math.round((imageBytes.length / 1024) * 100) / 100 : 0,
        },
      };
    },
  };
}
