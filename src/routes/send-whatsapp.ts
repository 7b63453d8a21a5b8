import type { Hono } from "hono";
import { z } from "zod";
import type { MessagingFlow } from "../pipeline/messaging-flow.js";
import { optionalFormText, parseFields, readForm } from "./form.js";

const SendWhatsAppFieldsSchema = z.object({
  phone_number: z.string({ required_error: "phone_number is required" }).trim().min(1, "phone_number is required"),
  message: optionalFormText,
  report: optionalFormText,
  user_language: optionalFormText,
});

export function registerSendWhatsAppRoute(app: Hono, deps: { messagingFlow: MessagingFlow }): void {
  app.post("/send-whatsapp", async (c) => {
    const fields = parseFields(SendWhatsAppFieldsSchema, await readForm(c));
    const result = await deps.messagingFlow.sendReport({
      phoneNumber: fields.phone_number,
      message: fields.message,
      report: fields.report,
      userLanguage: fields.user_language,
    });
    return c.json(result);
  });
}
