import { CompletionStatus, Language } from './languages';

export interface TranscriberRegistration {
  language: Language;
  status: CompletionStatus;
  labels: readonly string[];
  tableFile: string; // относительно RULE_TABLES_DIR
}

export const TRANSCRIBERS: readonly TranscriberRegistration[] = [
  {
    language: Language.SPANISH,
    status: CompletionStatus.IN_PROGRESS,
    // Порядок важен: альтернативы в таблице идут в том же порядке
    labels: ['Peninsular', 'American'],
    tableFile: 'es.json',
  },
  {
    language: Language.ENGLISH,
    status: CompletionStatus.IN_PROGRESS,
    labels: ['American'],
    tableFile: 'en.json',
  },
  {
    language: Language.MARATHI,
    status: CompletionStatus.IN_PROGRESS,
    labels: ['Standard'],
    tableFile: 'mr.json',
  },
];
