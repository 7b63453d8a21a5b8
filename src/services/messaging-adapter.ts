import { ProviderError, describeError } from "../errors.js";
import type { TwilioConfig } from "../types/service-config.js";
import type { ServiceLogger } from "./logger.js";

export const DEFAULT_COUNTRY_CODE = "91";
const WHATSAPP_CHANNEL = "whatsapp:";

export type SendOutcome =
  | { success: true; status: "sent"; sid: string; to: string }
  | { success: false; status: "not_configured"; error: string }
  | { success: false; status: "failed"; error: string; providerCode: number | null };

export type MessagingAdapter = {
  readonly enabled: boolean;
  sendReport: (phoneNumber: string, bodyText: string) => Promise<SendOutcome>;
};

function asRecord(value: unknown): Record<string, unknown> | null {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return null;
}

export function normalizePhoneNumber(phoneNumber: string, countryCode: string = DEFAULT_COUNTRY_CODE): string {
  const digits = phoneNumber.replace(/\D/g, "");
  if (digits.length === 10) {
    return `${countryCode}${digits}`;
  }
  return digits;
}

export function toWhatsAppAddress(phoneNumber: string): string {
  const trimmed = phoneNumber.trim();
  if (trimmed.startsWith(WHATSAPP_CHANNEL)) {
    return trimmed;
  }
  return `${WHATSAPP_CHANNEL}+${trimmed.replace(/^\+/, "")}`;
}

function readProviderError(payload: unknown, status: number): ProviderError {
  const data = asRecord(payload);
  const message =
    data && typeof data.message === "string" && data.message.trim().length > 0
      ? data.message.trim()
      : `Twilio returned status ${status}`;
  return new ProviderError("twilio", message, status);
}

function readProviderCode(payload: unknown): number | null {
  const data = asRecord(payload);
  return data && typeof data.code === "number" ? data.code : null;
}

export function createTwilioMessagingAdapter(params: {
  config: TwilioConfig | null;
  logger: ServiceLogger;
}): MessagingAdapter {
  const { config, logger } = params;
  if (!config) {
    logger.warn("[triage] Twilio credentials not found; WhatsApp delivery disabled");
  } else {
    logger.info(`[triage] WhatsApp sender configured: ${config.whatsappFrom}`);
  }

  return {
    enabled: config !== null,

    async sendReport(phoneNumber, bodyText) {
      if (!config) {
        return { success: false, status: "not_configured", error: "WhatsApp feature not configured" };
      }

      const to = toWhatsAppAddress(normalizePhoneNumber(phoneNumber));
      const url = `${config.apiBaseUrl.replace(/\/+$/, "")}/2010-04-01/Accounts/${encodeURIComponent(
        config.accountSid,
      )}/Messages.json`;
      const credentials = Buffer.from(`${config.accountSid}:${config.authToken}`, "utf8").toString("base64");

      let payload: unknown = null;
      try {
        const upstream = await fetch(url, {
          method: "POST",
          headers: {
            Accept: "application/json",
            Authorization: `Basic ${credentials}`,
            "Content-Type": "application/x-www-form-urlencoded",
          },
          body: new URLSearchParams({
            From: toWhatsAppAddress(config.whatsappFrom),
            To: to,
            Body: bodyText,
          }).toString(),
          signal: AbortSignal.timeout(config.timeoutMs),
        });

        payload = await upstream.json().catch(() => null);
        if (!upstream.ok) {
          throw readProviderError(payload, upstream.status);
        }

        const data = asRecord(payload);
        const sid = data && typeof data.sid === "string" ? data.sid : "";
        logger.info(`[triage] WhatsApp message accepted: sid=${sid || "<none>"}`);
        return { success: true, status: "sent", sid, to };
      } catch (error) {
        const described = describeError(error);
        logger.error(`[triage] WhatsApp send failed: ${described.type}: ${described.message}`);
        return {
          success: false,
          status: "failed",
          error: described.message,
          providerCode: readProviderCode(payload),
        };
      }
    },
  };
}
