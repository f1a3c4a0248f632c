import type { SynthesisParams } from '../engine/types';

interface LanguageProfile {
  name: string;
  params: SynthesisParams;
}

// Per-language XTTS tuning
export const LANGUAGES = {
  en: {
    name: 'English',
    params: { temperature: 0.52, topP: 0.68, topK: 35, speed: 0.85, splitSentences: false },
  },
  de: {
    name: 'German',
    params: { temperature: 0.5, topP: 0.65, topK: 30, speed: 0.85, splitSentences: false },
  },
} as const satisfies Record<string, LanguageProfile>;

export type LanguageCode = keyof typeof LANGUAGES;

export function isSupportedLanguage(code: string): code is LanguageCode {
  return Object.prototype.hasOwnProperty.call(LANGUAGES, code);
}

export function languageNames(): Record<LanguageCode, string> {
  return { en: LANGUAGES.en.name, de: LANGUAGES.de.name };
}

export function synthesisParams(language: LanguageCode): SynthesisParams {
  return { ...LANGUAGES[language].params };
}
