import { RuleTableDefectError } from './errors';
import { RuleOutput } from './rules';

export const OPEN_DELIMITER = '/';
export const CLOSE_DELIMITER = '/';

export interface VariantAccumulator {
  readonly label: string;
  readonly segments: string[];
}

export interface VariantOutput {
  label: string;
  text: string;
}

export interface AppendContext {
  ruleIndex: number;
  offset: number;
}

export function openAccumulators(labels: readonly string[]): VariantAccumulator[] {
  return labels.map((label) => ({ label, segments: [] }));
}

/**
 * Добавляет вывод правила во все аккумуляторы.
 * Строка — общая для всех вариантов, массив — по альтернативе на вариант.
 */
export function appendOutput(
  accumulators: VariantAccumulator[],
  output: RuleOutput,
  context: AppendContext,
): void {
  if (typeof output === 'string') {
    for (const accumulator of accumulators) {
      accumulator.segments.push(output);
    }
    return;
  }

  if (output.length !== accumulators.length) {
    throw new RuleTableDefectError(
      'variant-count',
      `Rule #${context.ruleIndex} gives ${output.length} alternatives at offset ${context.offset}, ` +
        `but the transcriber declares ${accumulators.length} variants`,
      context,
    );
  }

  accumulators.forEach((accumulator, i) => {
    accumulator.segments.push(output[i]);
  });
}

export function closeAccumulators(accumulators: readonly VariantAccumulator[]): VariantOutput[] {
  return accumulators.map(({ label, segments }) => ({
    label,
    text: OPEN_DELIMITER + segments.join('') + CLOSE_DELIMITER,
  }));
}
