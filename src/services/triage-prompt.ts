export const TRIAGE_FIELDS = ["risk", "doctor_summary", "advice"] as const;

export type TriageField = (typeof TRIAGE_FIELDS)[number];

export const TRIAGE_INSTRUCTIONS = [
  "You are an AI-assisted medical triage system for rural India.",
  "",
  "Your tasks:",
  "1. Summarize symptoms clearly",
  "2. Assign risk: LOW, MODERATE, or HIGH",
  "3. Give conservative advice",
  "",
  "Rules:",
  "- Do NOT diagnose diseases",
  "- If unsure, choose MODERATE",
  "- Safety first",
  "",
  "Return STRICT JSON only:",
  "{",
  '  "risk": "",',
  '  "doctor_summary": "",',
  '  "advice": ""',
  "}",
].join("\n");

export function buildTriagePrompt(symptomText: string): string {
  const sections: string[] = [];

  sections.push(TRIAGE_INSTRUCTIONS);

  sections.push(`Patient Symptoms:\n${symptomText}`);

  return sections.join("\n\n");
}
