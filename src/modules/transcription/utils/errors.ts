export type RuleTableDefectKind =
  | 'consume-length'
  | 'variant-count'
  | 'variant-labels'
  | 'pattern'
  | 'table-file';

export interface RuleTableDefectDetails {
  ruleIndex?: number;
  offset?: number;
}

/**
 * Ошибка в таблице правил (или в объявлении вариантов транскрайбера).
 * Не зависит от пользовательского ввода — чинится правкой таблицы.
 */
export class RuleTableDefectError extends Error {
  readonly kind: RuleTableDefectKind;
  readonly ruleIndex?: number;
  readonly offset?: number;

  constructor(kind: RuleTableDefectKind, message: string, details: RuleTableDefectDetails = {}) {
    super(message);
    this.name = 'RuleTableDefectError';
    this.kind = kind;
    this.ruleIndex = details.ruleIndex;
    this.offset = details.offset;
  }
}
