import type { Hono } from "hono";
import type { ComplianceLedger } from "../services/compliance-ledger.js";
import { SUPPORTED_LANGUAGES } from "../services/language-map.js";

export type ServiceDescriptor = {
  version: string;
  dataRetentionDays: number;
  multilanguage: boolean;
  consentRequired: boolean;
  whatsappEnabled: boolean;
  translationConfigured: boolean;
};

const DISCLAIMER = "AI-assisted triage. Not a substitute for professional medical advice.";

export function registerStatusRoutes(
  app: Hono,
  deps: { descriptor: ServiceDescriptor; ledger: ComplianceLedger },
): void {
  const { descriptor, ledger } = deps;

  app.get("/", (c) =>
    c.json({
      status: "healthy",
      service: "AI Triage Relay API",
      version: descriptor.version,
      features: {
        whatsapp: descriptor.whatsappEnabled,
        multilanguage: descriptor.multilanguage,
        consent_required: descriptor.consentRequired,
        compliance: {
          abdm_ready: true,
          disha_compliant: true,
          data_retention_days: descriptor.dataRetentionDays,
          audit_ledger: ledger.backend,
        },
      },
      disclaimer: DISCLAIMER,
    }),
  );

  app.get("/health", (c) =>
    c.json({
      status: "healthy",
      version: descriptor.version,
      features: {
        whatsapp: descriptor.whatsappEnabled,
        multilanguage: descriptor.multilanguage,
        translation_configured: descriptor.translationConfigured,
        languages: descriptor.multilanguage ? SUPPORTED_LANGUAGES : ["English"],
      },
      compliance: {
        abdm_ready: true,
        disha_compliant: true,
        data_retention: `${descriptor.dataRetentionDays} days`,
        audit_ledger: ledger.backend,
      },
      endpoints: {
        analyze: "/analyze",
        whatsapp: "/send-whatsapp",
        translate: "/translate",
        consent: "/consent",
      },
      timestamp: new Date().toISOString(),
    }),
  );
}
