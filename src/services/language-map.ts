export const ENGLISH = "English";
export const ENGLISH_CODE = "en-IN";

export const LANGUAGES = [
  { name: ENGLISH, code: ENGLISH_CODE },
  { name: "हिंदी", code: "hi-IN" },
  { name: "தமிழ்", code: "ta-IN" },
  { name: "తెలుగు", code: "te-IN" },
  { name: "मराठी", code: "mr-IN" },
  { name: "ಕನ್ನಡ", code: "kn-IN" },
  { name: "বাংলা", code: "bn-IN" },
  { name: "ગુજરાતી", code: "gu-IN" },
  { name: "മലയാളം", code: "ml-IN" },
  { name: "ਪੰਜਾਬੀ", code: "pa-IN" },
] as const;

export type LanguageName = (typeof LANGUAGES)[number]["name"];
export type LanguageCode = (typeof LANGUAGES)[number]["code"];

const CODE_BY_NAME = new Map<string, LanguageCode>(LANGUAGES.map((entry) => [entry.name, entry.code]));
const NAME_BY_CODE = new Map<string, LanguageName>(LANGUAGES.map((entry) => [entry.code, entry.name]));

export const SUPPORTED_LANGUAGES: LanguageName[] = LANGUAGES.map((entry) => entry.name);

export function isEnglish(languageName: string): boolean {
  return languageName.trim() === ENGLISH;
}

/** Unknown names resolve to the English code. */
export function getLanguageCode(languageName: string): LanguageCode {
  return CODE_BY_NAME.get(languageName.trim()) ?? ENGLISH_CODE;
}

/** Unknown codes resolve to English. */
export function getLanguageName(languageCode: string): LanguageName {
  return NAME_BY_CODE.get(languageCode.trim()) ?? ENGLISH;
}
