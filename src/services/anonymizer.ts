const PHONE_PATTERNS = [/\b\d{10}\b/g, /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g];
const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

/** Replaces phone- and email-shaped substrings before text reaches the audit ledger. */
export function anonymizeText(text: string): string {
  let result = text;
  for (const pattern of PHONE_PATTERNS) {
    result = result.replace(pattern, "[PHONE]");
  }
  return result.replace(EMAIL_PATTERN, "[EMAIL]");
}
