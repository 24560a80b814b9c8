/**
 * @module collaborators/languages
 * Output languages the content generator knows by name.
 */

export const SUPPORTED_LANGUAGES: Readonly<Record<string, string>> = {
  en: 'English',
  ja: 'Japanese',
  zh: 'Chinese',
  ko: 'Korean',
  th: 'Thai',
  vi: 'Vietnamese',
  id: 'Indonesian',
  ms: 'Malay',
  tl: 'Filipino',
  hi: 'Hindi',
  ta: 'Tamil',
};

/** `ja-JP` → `ja`. */
export function baseLanguage(code: string): string {
  return code.split(/[-_]/)[0].toLowerCase();
}

/** English name for a language code; unknown codes map to English. */
export function languageName(code: string): string {
  return SUPPORTED_LANGUAGES[baseLanguage(code)] ?? 'English';
}

/**
 * Normalise what a speech-to-text provider reports (`japanese`, `ja`) to a
 * language code. The requested code wins when it names the same language, so
 * its region survives (`en-US` stays `en-US` when `english` is detected).
 * Unrecognised values fall back to the requested code.
 */
export function resolveDetectedLanguage(detected: string | undefined, requested: string): string {
  if (!detected) return requested;
  const lower = detected.trim().toLowerCase();
  const code = Object.keys(SUPPORTED_LANGUAGES).find(
    (k) => k === lower || SUPPORTED_LANGUAGES[k].toLowerCase() === lower,
  ) ?? (/^[a-z]{2,3}([-_][a-z0-9]+)?$/.test(lower) ? detected.trim() : undefined);

  if (!code) return requested;
  return baseLanguage(code) === baseLanguage(requested) ? requested : code;
}
