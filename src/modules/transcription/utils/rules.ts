import { RuleTableDefectError } from './errors';

/** Один вывод на все варианты или по альтернативе на каждый вариант */
export type RuleOutput = string | readonly string[];

export interface RuleDefinition {
  context?: string | RegExp; // левый контекст — уже поглощённый текст
  pattern: string | RegExp;  // проверяется с позиции курсора
  output: RuleOutput;
  consume?: number;          // по умолчанию — длина совпадения
}

export interface Rule {
  readonly index: number;
  readonly context?: RegExp;
  readonly pattern: RegExp;
  readonly output: RuleOutput;
  readonly consume?: number;
}

export type RuleTable = readonly Rule[];

export interface RuleMatch {
  rule: Rule;
  matched: string;
}

// g/y хранят lastIndex, m ломает якоря ^ и $
const DROPPED_FLAGS = /[gym]/g;

function compile(
  source: string | RegExp,
  wrap: (body: string) => string,
  index: number,
): RegExp {
  const body = typeof source === 'string' ? source : source.source;
  const flags = typeof source === 'string' ? '' : source.flags.replace(DROPPED_FLAGS, '');

  try {
    return new RegExp(wrap(body), flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RuleTableDefectError('pattern', `Rule #${index} has an invalid pattern: ${reason}`, {
      ruleIndex: index,
    });
  }
}

/**
 * Компилирует описание правила.
 * Паттерн якорится на начало оставшегося ввода, контекст — на конец поглощённого.
 */
export function compileRule(definition: RuleDefinition, index: number): Rule {
  const pattern = compile(definition.pattern, (body) => `^(?:${body})`, index);
  const context =
    definition.context === undefined
      ? undefined
      : compile(definition.context, (body) => `(?:${body})$`, index);

  const output =
    typeof definition.output === 'string'
      ? definition.output
      : Object.freeze([...definition.output]);

  return Object.freeze({
    index,
    context,
    pattern,
    output,
    consume: definition.consume,
  });
}

export function compileRuleTable(definitions: readonly RuleDefinition[]): RuleTable {
  return Object.freeze(definitions.map((definition, index) => compileRule(definition, index)));
}

/**
 * Проверяет правило в текущей позиции.
 * Возвращает совпавший текст или null.
 */
export function matchRule(rule: Rule, consumed: string, remaining: string): string | null {
  if (rule.context && !rule.context.test(consumed)) {
    return null;
  }

  const match = rule.pattern.exec(remaining);
  return match ? match[0] : null;
}

/** Первое подходящее правило в порядке таблицы — без поиска самого длинного */
export function findFirstMatch(
  table: RuleTable,
  consumed: string,
  remaining: string,
): RuleMatch | null {
  for (const rule of table) {
    const matched = matchRule(rule, consumed, remaining);
    if (matched !== null) {
      return { rule, matched };
    }
  }
  return null;
}

export function resolveConsumedLength(rule: Rule, matched: string): number {
  return rule.consume ?? matched.length;
}
