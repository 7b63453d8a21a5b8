import { randomUUID } from "node:crypto";
import type { ComplianceLedger } from "../services/compliance-ledger.js";
import type { ServiceLogger } from "../services/logger.js";
import { type MessagingAdapter, normalizePhoneNumber } from "../services/messaging-adapter.js";

export const DEFAULT_MESSAGE = "Thank you for using our triage service.";

export type WhatsAppRequest = {
  phoneNumber: string;
  message?: string | null;
  report?: string | null;
  userLanguage?: string;
};

export type WhatsAppResponse =
  | {
      success: true;
      message: string;
      status: "sent";
      sid: string;
      request_id: string;
    }
  | {
      success: false;
      error: string;
      status: "twilio_not_configured" | "invalid_phone" | "failed";
      request_id: string;
      details?: string;
    };

export type MessagingFlow = {
  sendReport: (request: WhatsAppRequest) => Promise<WhatsAppResponse>;
};

export function formatWhatsAppReport(report: string): string {
  return [
    "🏥 *AI Triage Medical Report*",
    "",
    report.trim(),
    "",
    "━━━━━━━━━━━━━━━━━━━━━━━",
    "⚕️ AI-generated report. Consult a healthcare professional.",
    "📱 Emergency: Call 108",
  ].join("\n");
}

export function buildMessageBody(request: Pick<WhatsAppRequest, "message" | "report">): string {
  const report = request.report?.trim();
  if (report) {
    return formatWhatsAppReport(report);
  }
  const message = request.message?.trim();
  return message || DEFAULT_MESSAGE;
}

export function createMessagingFlow(deps: {
  messaging: MessagingAdapter;
  ledger: ComplianceLedger;
  logger: ServiceLogger;
  createRequestId?: () => string;
}): MessagingFlow {
  const { messaging, ledger, logger } = deps;
  const createRequestId = deps.createRequestId ?? randomUUID;

  return {
    async sendReport(request) {
      const requestId = createRequestId();
      logger.info(`[triage] [${requestId}] WhatsApp send request (language=${request.userLanguage ?? "English"})`);

      if (!messaging.enabled) {
        return {
          success: false,
          error: "WhatsApp feature not configured",
          status: "twilio_not_configured",
          request_id: requestId,
        };
      }

      const digits = normalizePhoneNumber(request.phoneNumber);
      if (digits.length < 10 || digits.length > 15) {
        logger.warn(`[triage] [${requestId}] rejected phone number with ${digits.length} digits`);
        return {
          success: false,
          error: "Phone number must contain 10 to 15 digits",
          status: "invalid_phone",
          request_id: requestId,
        };
      }

      const outcome = await messaging.sendReport(request.phoneNumber, buildMessageBody(request));
      if (outcome.success) {
        ledger.recordAudit({
          action: "whatsapp_sent",
          requestId,
          userData: { phone: digits.slice(0, 4) },
          status: "success",
        });
        return {
          success: true,
          message: "Report sent successfully!",
          status: "sent",
          sid: outcome.sid,
          request_id: requestId,
        };
      }

      if (outcome.status === "not_configured") {
        return {
          success: false,
          error: outcome.error,
          status: "twilio_not_configured",
          request_id: requestId,
        };
      }

      ledger.recordAudit({
        action: "whatsapp_failed",
        requestId,
        userData: { phone: digits.slice(0, 4) },
        status: "failed",
      });
      return {
        success: false,
        error: "Failed to send WhatsApp message",
        status: "failed",
        request_id: requestId,
        details: outcome.error,
      };
    },
  };
}
