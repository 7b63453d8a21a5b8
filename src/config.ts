import { ConfigurationError, formatZodIssues } from "./errors.js";
import { type ServiceConfig, type ServiceEnv, ServiceEnvSchema } from "./types/service-config.js";

function toServiceConfig(env: ServiceEnv): ServiceConfig {
  const twilio =
    env.TWILIO_ACCOUNT_SID && env.TWILIO_AUTH_TOKEN && env.TWILIO_WHATSAPP_NUMBER
      ? {
          accountSid: env.TWILIO_ACCOUNT_SID,
          authToken: env.TWILIO_AUTH_TOKEN,
          whatsappFrom: env.TWILIO_WHATSAPP_NUMBER,
          apiBaseUrl: env.TWILIO_API_BASE_URL,
          timeoutMs: env.MESSAGING_TIMEOUT_MS,
        }
      : null;

  return {
    gemini: {
      apiKey: env.GOOGLE_API_KEY,
      model: env.GEMINI_MODEL,
      timeoutMs: env.AI_TIMEOUT_MS,
    },
    sarvam: {
      apiKey: env.SARVAM_API_KEY,
      apiUrl: env.SARVAM_API_URL,
      timeoutMs: env.TRANSLATION_TIMEOUT_MS,
    },
    twilio,
    features: {
      multilanguage: env.MULTILANGUAGE_ENABLED,
      consentRequired: env.CONSENT_REQUIRED,
    },
    dataRetentionDays: env.DATA_RETENTION_DAYS,
    auditLogPath: env.AUDIT_LOG_PATH,
    server: {
      host: env.HOST,
      port: env.PORT,
      corsOrigins: env.CORS_ORIGINS,
    },
    logLevel: env.LOG_LEVEL,
  };
}

/**
 * Builds the process-wide configuration from environment variables.
 * A missing Gemini key is fatal; missing Sarvam or Twilio credentials only
 * disable the corresponding feature.
 */
export function parseServiceConfig(env: Record<string, string | undefined>): ServiceConfig {
  const result = ServiceEnvSchema.safeParse(env);
  if (result.success) {
    return toServiceConfig(result.data);
  }
  throw new ConfigurationError(`Invalid service config: ${formatZodIssues(result.error.issues).join("; ")}`);
}
