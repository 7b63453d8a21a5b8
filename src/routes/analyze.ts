import type { Hono } from "hono";
import { z } from "zod";
import type { TriageOrchestrator } from "../pipeline/triage-orchestrator.js";
import { formBoolean, optionalFormText, parseFields, readForm, toImageSource } from "./form.js";

const AnalyzeFieldsSchema = z.object({
  symptom_text: z.string({ required_error: "symptom_text is required" }),
  user_language: optionalFormText,
  consent_given: formBoolean.optional(),
});

export function registerAnalyzeRoute(app: Hono, deps: { orchestrator: TriageOrchestrator }): void {
  app.post("/analyze", async (c) => {
    const body = await readForm(c);
    const fields = parseFields(AnalyzeFieldsSchema, body);

    const result = await deps.orchestrator.analyze({
      symptomText: fields.symptom_text,
      userLanguage: fields.user_language,
      consentGiven: fields.consent_given ?? false,
      image: toImageSource(body.image),
    });
    return c.json(result);
  });
}
