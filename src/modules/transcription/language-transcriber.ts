import { CompletionStatus, Language } from './constants/languages';
import { RuleTableDefectError } from './utils/errors';
import { FallbackPolicy, TranscriptionResult, copyThrough, rewrite } from './utils/rewrite';
import { RuleTable } from './utils/rules';

export interface LanguageTranscriberConfig {
  language: Language;
  status: CompletionStatus;
  labels: readonly string[];
  table: RuleTable;
  fallback?: FallbackPolicy;
}

export function normalizeInput(text: string): string {
  return text.toLowerCase();
}

/**
 * Неизменяемая связка «таблица + варианты + статус».
 * Сам ничего не сопоставляет — всё делает rewrite().
 */
export class LanguageTranscriber {
  readonly language: Language;
  readonly status: CompletionStatus;
  readonly labels: readonly string[];
  readonly table: RuleTable;
  private readonly fallback: FallbackPolicy;

  constructor(config: LanguageTranscriberConfig) {
    if (config.labels.length === 0) {
      throw new RuleTableDefectError(
        'variant-labels',
        `Transcriber for '${config.language}' declares no variants`,
      );
    }

    this.language = config.language;
    this.status = config.status;
    this.labels = Object.freeze([...config.labels]);
    this.table = config.table;
    this.fallback = config.fallback ?? copyThrough;
    Object.freeze(this);
  }

  transcribe(text: string): TranscriptionResult {
    return rewrite(normalizeInput(text), this.table, {
      labels: this.labels,
      fallback: this.fallback,
    });
  }

  /** Для языков с одним вариантом — сразу строка */
  transcribeSingle(text: string): string {
    if (this.labels.length !== 1) {
      throw new Error(
        `Transcriber for '${this.language}' has ${this.labels.length} variants; use transcribe()`,
      );
    }
    return this.transcribe(text).variants[0].text;
  }
}
