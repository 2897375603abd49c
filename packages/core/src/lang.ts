// Map short and spelled-out language codes to tesseract traineddata names.
// Combined codes ("en+id", "en,id") map part by part.
const LANG_MAP: Record<string, string> = {
  en: "eng", english: "eng",
  id: "ind", indonesian: "ind",
  fr: "fra", french: "fra",
  de: "deu", german: "deu",
  es: "spa", spanish: "spa",
  it: "ita", italian: "ita",
  pt: "por", portuguese: "por",
  nl: "nld", dutch: "nld",
  ar: "ara", arabic: "ara",
  ru: "rus", russian: "rus",
  ch: "chi_sim", zh: "chi_sim", chinese: "chi_sim",
  ja: "jpn", japan: "jpn", japanese: "jpn",
  ko: "kor", korean: "kor",
};

export function toTesseractLang(lang: string): string {
  const parts = lang.trim().toLowerCase().split(/[\s,+]+/).filter(Boolean);
  if (!parts.length) return "eng";
  return parts.map((p) => LANG_MAP[p] ?? p).join("+");
}

export function sameLanguage(a: string, b: string): boolean {
  return toTesseractLang(a) === toTesseractLang(b);
}
