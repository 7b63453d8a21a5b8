import { type MessagingFlow, createMessagingFlow } from "./pipeline/messaging-flow.js";
import { type TriageOrchestrator, createTriageOrchestrator } from "./pipeline/triage-orchestrator.js";
import type { AppDeps } from "./server.js";
import { type AiTriageClient, createGeminiTriageClient } from "./services/ai-triage-client.js";
import {
  type ComplianceLedger,
  createFileComplianceLedger,
  createMemoryComplianceLedger,
} from "./services/compliance-ledger.js";
import type { ServiceLogger } from "./services/logger.js";
import { type MessagingAdapter, createTwilioMessagingAdapter } from "./services/messaging-adapter.js";
import {
  type TranslationAdapter,
  createDisabledTranslationAdapter,
  createSarvamTranslationAdapter,
} from "./services/translation-adapter.js";
import type { ServiceConfig } from "./types/service-config.js";

export const SERVICE_VERSION = "2.0.0";

export type AppOverrides = {
  ai?: AiTriageClient;
  translator?: TranslationAdapter;
  messaging?: MessagingAdapter;
  ledger?: ComplianceLedger;
};

export type AppContext = AppDeps & {
  ai: AiTriageClient;
  messaging: MessagingAdapter;
  orchestrator: TriageOrchestrator;
  messagingFlow: MessagingFlow;
};

/** Wires every adapter once from the startup configuration. */
export function createAppContext(
  config: ServiceConfig,
  logger: ServiceLogger,
  overrides: AppOverrides = {},
): AppContext {
  const ai = overrides.ai ?? createGeminiTriageClient({ config: config.gemini, logger });
  const translator =
    overrides.translator ??
    (config.features.multilanguage
      ? createSarvamTranslationAdapter({ config: config.sarvam, logger })
      : createDisabledTranslationAdapter(logger));
  const messaging = overrides.messaging ?? createTwilioMessagingAdapter({ config: config.twilio, logger });
  const ledger =
    overrides.ledger ??
    (config.auditLogPath
      ? createFileComplianceLedger({ filePath: config.auditLogPath, logger })
      : createMemoryComplianceLedger(logger));

  const orchestrator = createTriageOrchestrator({
    ai,
    translator,
    ledger,
    logger,
    options: {
      languageSupport: config.features.multilanguage,
      consentRequired: config.features.consentRequired,
      dataRetentionDays: config.dataRetentionDays,
      whatsappEnabled: messaging.enabled,
    },
  });
  const messagingFlow = createMessagingFlow({ messaging, ledger, logger });

  return {
    descriptor: {
      version: SERVICE_VERSION,
      dataRetentionDays: config.dataRetentionDays,
      multilanguage: config.features.multilanguage,
      consentRequired: config.features.multilanguage && config.features.consentRequired,
      whatsappEnabled: messaging.enabled,
      translationConfigured: translator.enabled,
    },
    corsOrigins: config.server.corsOrigins,
    ai,
    translator,
    messaging,
    ledger,
    logger,
    orchestrator,
    messagingFlow,
  };
}
