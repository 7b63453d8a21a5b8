import { randomUUID } from "node:crypto";
import type { Hono } from "hono";
import { z } from "zod";
import type { ComplianceLedger } from "../services/compliance-ledger.js";
import type { ServiceLogger } from "../services/logger.js";
import { formBoolean, parseFields, readForm } from "./form.js";

const ConsentFieldsSchema = z.object({
  user_id: z.string({ required_error: "user_id is required" }).trim().min(1, "user_id is required"),
  consent_type: z
    .string({ required_error: "consent_type is required" })
    .trim()
    .min(1, "consent_type is required")
    .max(64),
  consent_given: formBoolean,
});

export function registerConsentRoute(
  app: Hono,
  deps: { ledger: ComplianceLedger; logger: ServiceLogger },
): void {
  app.post("/consent", async (c) => {
    const fields = parseFields(ConsentFieldsSchema, await readForm(c));
    const consentId = randomUUID();
    deps.logger.info(`[triage] [${consentId}] consent recording: ${fields.consent_type}=${fields.consent_given}`);

    deps.ledger.recordConsent({
      consentId,
      userId: fields.user_id,
      consentType: fields.consent_type,
      consentGiven: fields.consent_given,
    });

    return c.json({
      success: true,
      message: "Consent recorded",
      consent_id: consentId,
    });
  });
}
