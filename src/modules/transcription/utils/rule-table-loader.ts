import * as fs from 'fs';
import * as path from 'path';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { RuleTableFileDto } from '../dto/rule-table.dto';
import { RuleTableDefectError } from './errors';
import { RuleDefinition, RuleTable, compileRuleTable } from './rules';

// rules.3.output: each value in output must be a string
function describeErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const property = prefix + error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${property}: ${message}`);
    return [...own, ...describeErrors(error.children ?? [], `${property}.`)];
  });
}

/**
 * Проверяет разобранный JSON таблицы и компилирует правила.
 * Проверяется только форма; длины и число альтернатив — забота движка.
 */
export function parseRuleTable(raw: unknown, source: string): RuleTable {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new RuleTableDefectError('table-file', `${source}: expected an object with a "rules" array`);
  }

  const file = plainToInstance(RuleTableFileDto, raw);
  // Опечатка в ключе (consumed вместо consume) не должна молча менять поведение правила
  const errors = validateSync(file, { whitelist: true, forbidNonWhitelisted: true });

  if (errors.length > 0) {
    throw new RuleTableDefectError(
      'table-file',
      `${source}: invalid rule table\n  ${describeErrors(errors).join('\n  ')}`,
    );
  }

  const definitions: RuleDefinition[] = file.rules.map((rule) => ({
    context: rule.context,
    pattern: rule.pattern,
    output: rule.output,
    consume: rule.consume,
  }));

  return compileRuleTable(definitions);
}

export function loadRuleTable(directory: string, fileName: string): RuleTable {
  const filePath = path.join(directory, fileName);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RuleTableDefectError('table-file', `${filePath}: ${reason}`);
  }

  return parseRuleTable(raw, filePath);
}
