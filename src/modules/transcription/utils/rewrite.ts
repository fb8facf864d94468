import { RuleTableDefectError } from './errors';
import { RuleTable, findFirstMatch, resolveConsumedLength } from './rules';
import {
  VariantOutput,
  appendOutput,
  closeAccumulators,
  openAccumulators,
} from './variants';

/** Что писать в вывод, если ни одно правило не подошло */
export type FallbackPolicy = (grapheme: string) => string;

/** Стандартное поведение: копируем символ как есть. Пробел в таблице фиксирует сам движок */
export const copyThrough: FallbackPolicy = (grapheme) => grapheme;

export interface UncoveredGrapheme {
  grapheme: string;
  offset: number;
}

export interface RewriteStep {
  offset: number;
  consumed: number;
  ruleIndex: number | null; // null — сработал fallback
}

export interface TranscriptionResult {
  variants: VariantOutput[];
  gaps: UncoveredGrapheme[];
  steps: RewriteStep[];
}

export interface RewriteOptions {
  labels: readonly string[];
  fallback?: FallbackPolicy;
}

/**
 * Прогоняет нормализованный текст через таблицу правил.
 *
 * На каждом шаге берётся первое правило (в порядке таблицы), чьи контекст и паттерн
 * совпали в позиции курсора; после применения поиск снова начинается с первого правила.
 * Если ничего не подошло — fallback на один символ.
 */
export function rewrite(
  input: string,
  table: RuleTable,
  options: RewriteOptions,
): TranscriptionResult {
  const { labels, fallback = copyThrough } = options;

  if (labels.length === 0) {
    throw new RuleTableDefectError('variant-labels', 'A transcriber must declare at least one variant');
  }

  const accumulators = openAccumulators(labels);
  const gaps: UncoveredGrapheme[] = [];
  const steps: RewriteStep[] = [];

  let offset = 0;

  while (offset < input.length) {
    const consumed = input.slice(0, offset);
    const remaining = input.slice(offset);
    const match = findFirstMatch(table, consumed, remaining);

    if (match) {
      const { rule, matched } = match;
      const length = resolveConsumedLength(rule, matched);

      if (!Number.isInteger(length) || length < 1 || length > remaining.length) {
        throw new RuleTableDefectError(
          'consume-length',
          `Rule #${rule.index} consumes ${length} characters at offset ${offset}, ` +
            `but ${remaining.length} remain`,
          { ruleIndex: rule.index, offset },
        );
      }

      appendOutput(accumulators, rule.output, { ruleIndex: rule.index, offset });
      steps.push({ offset, consumed: length, ruleIndex: rule.index });
      offset += length;
      continue;
    }

    // Один code point, чтобы не разрезать суррогатную пару
    const [grapheme] = remaining;
    appendOutput(accumulators, fallback(grapheme), { ruleIndex: -1, offset });
    gaps.push({ grapheme, offset });
    steps.push({ offset, consumed: grapheme.length, ruleIndex: null });
    offset += grapheme.length;
  }

  return {
    variants: closeAccumulators(accumulators),
    gaps,
    steps,
  };
}
