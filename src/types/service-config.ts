import { z } from "zod";

export const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash";
export const DEFAULT_SARVAM_API_URL = "https://api.sarvam.ai/translate";
export const DEFAULT_TWILIO_API_BASE_URL = "https://api.twilio.com";

export const DEFAULT_TIMEOUTS_MS = {
  ai: 45_000,
  translation: 30_000,
  messaging: 30_000,
} as const;

export const DEFAULT_DATA_RETENTION_DAYS = 90;

const optionalValue = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : null));

const envFlag = (fallback: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value, ctx) => {
      if (!value) {
        return fallback;
      }
      if (["1", "true", "yes", "on"].includes(value)) {
        return true;
      }
      if (["0", "false", "no", "off"].includes(value)) {
        return false;
      }
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean flag, got "${value}"` });
      return z.NEVER;
    });

const envInt = (fallback: number, min: number, max: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? Number(value) : fallback))
    .pipe(z.number().int().min(min).max(max));

export const ServiceEnvSchema = z.object({
  GOOGLE_API_KEY: z.string().trim().min(1, "GOOGLE_API_KEY is required"),
  GEMINI_MODEL: z.string().trim().min(1).default(DEFAULT_GEMINI_MODEL),
  AI_TIMEOUT_MS: envInt(DEFAULT_TIMEOUTS_MS.ai, 1_000, 300_000),

  SARVAM_API_KEY: optionalValue,
  SARVAM_API_URL: z.string().trim().url().default(DEFAULT_SARVAM_API_URL),
  TRANSLATION_TIMEOUT_MS: envInt(DEFAULT_TIMEOUTS_MS.translation, 1_000, 120_000),

  TWILIO_ACCOUNT_SID: optionalValue,
  TWILIO_AUTH_TOKEN: optionalValue,
  TWILIO_WHATSAPP_NUMBER: optionalValue,
  TWILIO_API_BASE_URL: z.string().trim().url().default(DEFAULT_TWILIO_API_BASE_URL),
  MESSAGING_TIMEOUT_MS: envInt(DEFAULT_TIMEOUTS_MS.messaging, 1_000, 120_000),

  MULTILANGUAGE_ENABLED: envFlag(true),
  CONSENT_REQUIRED: envFlag(true),
  DATA_RETENTION_DAYS: envInt(DEFAULT_DATA_RETENTION_DAYS, 1, 3650),
  AUDIT_LOG_PATH: optionalValue,

  HOST: z.string().trim().min(1).default("0.0.0.0"),
  PORT: envInt(8000, 1, 65_535),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  CORS_ORIGINS: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? "")
        .split(",")
        .map((origin) => origin.trim())
        .filter(Boolean),
    ),
});

export type ServiceEnv = z.infer<typeof ServiceEnvSchema>;

export type GeminiConfig = {
  apiKey: string;
  model: string;
  timeoutMs: number;
};

export type SarvamConfig = {
  apiKey: string | null;
  apiUrl: string;
  timeoutMs: number;
};

export type TwilioConfig = {
  accountSid: string;
  authToken: string;
  whatsappFrom: string;
  apiBaseUrl: string;
  timeoutMs: number;
};

export type ServiceConfig = {
  gemini: GeminiConfig;
  sarvam: SarvamConfig;
  /** null when any of the three Twilio credentials is missing. */
  twilio: TwilioConfig | null;
  features: {
    multilanguage: boolean;
    consentRequired: boolean;
  };
  dataRetentionDays: number;
  auditLogPath: string | null;
  server: {
    host: string;
    port: number;
    corsOrigins: string[];
  };
  logLevel: ServiceEnv["LOG_LEVEL"];
};
