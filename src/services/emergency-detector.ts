export const URGENT_PHRASES = [
  "chest pain",
  "breathless",
  "unconscious",
  "bleeding heavily",
  "severe headache",
  "can't breathe",
  "heart attack",
  "stroke",
  "poisoning",
  "severe burn",
  "seizure",
  "suicide",
  "overdose",
] as const;

export type UrgentPhrase = (typeof URGENT_PHRASES)[number];

export type EmergencyScan = {
  urgent: boolean;
  matched: UrgentPhrase[];
};

export const EMERGENCY_CONTACTS = {
  ambulance: "108",
  police: "100",
  fire: "101",
} as const;

export const EMERGENCY_SUMMARY =
  "⚠️ EMERGENCY: Severe symptoms detected requiring IMMEDIATE medical attention.";
export const EMERGENCY_ADVICE =
  "🚨 CALL 108 NOW or visit nearest emergency room immediately. Do not delay.";

function normalizeApostrophes(text: string): string {
  return text.replace(/[‘’ʼ]/g, "'");
}

export function detectEmergency(text: string): EmergencyScan {
  const normalized = normalizeApostrophes(text.toLowerCase());
  const matched = URGENT_PHRASES.filter((phrase) => normalized.includes(phrase));
  return { urgent: matched.length > 0, matched };
}
