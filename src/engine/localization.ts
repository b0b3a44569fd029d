export const LANGUAGES = ['en', 'ar'] as const

export type Language = typeof LANGUAGES[number]

export interface LocalizedText {
  en: string
  ar: string
}

export function localize(text: LocalizedText, language: Language): string {
  return text[language]
}
