import { describe, expect, it, vi } from "vitest";
import {
  DEFAULT_MESSAGE,
  buildMessageBody,
  createMessagingFlow,
  formatWhatsAppReport,
} from "../src/pipeline/messaging-flow.js";
import { createMemoryComplianceLedger } from "../src/services/compliance-ledger.js";
import type { MessagingAdapter, SendOutcome } from "../src/services/messaging-adapter.js";
import { createSilentLogger } from "./helpers.js";

function setup(outcome: SendOutcome, enabled = true) {
  const logger = createSilentLogger();
  const sendReport = vi.fn<MessagingAdapter["sendReport"]>(async () => outcome);
  const ledger = createMemoryComplianceLedger(logger);
  const flow = createMessagingFlow({
    messaging: { enabled, sendReport },
    ledger,
    logger,
    createRequestId: () => "req-msg",
  });
  return { flow, sendReport, ledger };
}

const SENT: SendOutcome = { success: true, status: "sent", sid: "SM-test", to: "whatsapp:+919876543210" };

describe("message body", () => {
  it("wraps a report in the WhatsApp template", () => {
    expect(formatWhatsAppReport("  Risk Level: LOW \n")).toBe(
      [
        "🏥 *AI Triage Medical Report*",
        "",
        "Risk Level: LOW",
        "",
        "━━━━━━━━━━━━━━━━━━━━━━━",
        "⚕️ AI-generated report. Consult a healthcare professional.",
        "📱 Emergency: Call 108",
      ].join("\n"),
    );
  });

  it("prefers the report, then the message, then the default line", () => {
    expect(buildMessageBody({ report: "R", message: "M" })).toBe(formatWhatsAppReport("R"));
    expect(buildMessageBody({ report: "   ", message: " M " })).toBe("M");
    expect(buildMessageBody({ report: null, message: null })).toBe(DEFAULT_MESSAGE);
  });
});

describe("messaging flow", () => {
  it("sends the report and audits the delivery", async () => {
    const { flow, sendReport, ledger } = setup(SENT);

    const response = await flow.sendReport({ phoneNumber: "98765 43210", report: "Risk Level: LOW" });

    expect(response).toEqual({
      success: true,
      message: "Report sent successfully!",
      status: "sent",
      sid: "SM-test",
      request_id: "req-msg",
    });
    expect(sendReport).toHaveBeenCalledWith("98765 43210", formatWhatsAppReport("Risk Level: LOW"));
    expect(ledger.entries()).toMatchObject([{ kind: "audit", action: "whatsapp_sent", status: "success" }]);
  });

  it("refuses when messaging is not configured", async () => {
    const { flow, sendReport } = setup(SENT, false);

    const response = await flow.sendReport({ phoneNumber: "9876543210" });

    expect(response).toEqual({
      success: false,
      error: "WhatsApp feature not configured",
      status: "twilio_not_configured",
      request_id: "req-msg",
    });
    expect(sendReport).not.toHaveBeenCalled();
  });

  it.each(["12345", "1234567890123456", "call me"])("rejects the phone number %j", async (phoneNumber) => {
    const { flow, sendReport } = setup(SENT);

    const response = await flow.sendReport({ phoneNumber });

    expect(response).toMatchObject({ success: false, status: "invalid_phone" });
    expect(sendReport).not.toHaveBeenCalled();
  });

  it("reports a provider rejection with its details", async () => {
    const { flow, ledger } = setup({ success: false, status: "failed", error: "Unverified number", providerCode: 21608 });

    const response = await flow.sendReport({ phoneNumber: "9876543210", message: "hello" });

    expect(response).toEqual({
      success: false,
      error: "Failed to send WhatsApp message",
      status: "failed",
      request_id: "req-msg",
      details: "Unverified number",
    });
    expect(ledger.entries()).toMatchObject([{ action: "whatsapp_failed", status: "failed" }]);
  });
});
