// Каталог языков — коды используются только как ключ выбора таблицы

export enum Language {
  SPANISH = 'es',
  ENGLISH = 'en',
  ARABIC = 'ar', // классический арабский
  HINDI = 'hi',
  BENGALI = 'bn',
  PORTUGUESE = 'pt',
  RUSSIAN = 'ru',
  JAPANESE = 'ja',
  PUNJABI = 'pa',
  JAVANESE = 'jw',
  TURKISH = 'tr',
  KOREAN = 'ko',
  FRENCH = 'fr',
  GERMAN = 'de',
  TELUGU = 'te',
  MARATHI = 'mr',
  URDU = 'ur',
  VIETNAMESE = 'vi',
  TAMIL = 'ta',
  ITALIAN = 'it',
  PERSIAN = 'fa',
  IPA = 'ipa',
}

const LANGUAGE_CODES = new Set<string>(Object.values(Language));

export function isLanguage(code: string): code is Language {
  return LANGUAGE_CODES.has(code);
}

// Насколько таблица готова — на работу движка не влияет
export enum CompletionStatus {
  NOT_STARTED = 'not-started',
  IN_PROGRESS = 'in-progress',
  COMPLETE = 'complete',
}
