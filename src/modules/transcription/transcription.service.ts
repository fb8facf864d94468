import * as path from 'path';
import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CompletionStatus, Language, isLanguage } from './constants/languages';
import { TRANSCRIBERS } from './constants/transcribers';
import { LanguageTranscriber } from './language-transcriber';
import { TranscriptionResult } from './utils/rewrite';
import { loadRuleTable } from './utils/rule-table-loader';

// <корень пакета>/rules — одинаково из src/ и из dist/
export const DEFAULT_RULE_TABLES_DIR = path.resolve(__dirname, '..', '..', '..', 'rules');

export interface TranscriberInfo {
  language: Language;
  status: CompletionStatus;
  labels: readonly string[];
}

@Injectable()
export class TranscriptionService {
  private readonly logger = new Logger(TranscriptionService.name);
  private readonly transcribers = new Map<Language, LanguageTranscriber>();
  private readonly reportGaps: boolean;

  constructor(private readonly configService: ConfigService) {
    const directory =
      this.configService.get<string>('RULE_TABLES_DIR') || DEFAULT_RULE_TABLES_DIR;
    this.reportGaps = this.configService.get<string>('TRANSCRIPTION_REPORT_GAPS') !== 'false';

    // Таблицы грузятся один раз и дальше только читаются
    for (const registration of TRANSCRIBERS) {
      const table = loadRuleTable(directory, registration.tableFile);
      this.transcribers.set(
        registration.language,
        new LanguageTranscriber({
          language: registration.language,
          status: registration.status,
          labels: registration.labels,
          table,
        }),
      );
      this.logger.log(
        `Loaded ${registration.language}: ${table.length} rules, ${registration.status}`,
      );
    }
  }

  isSupported(code: string): boolean {
    return isLanguage(code) && this.transcribers.has(code);
  }

  getTranscriber(code: string): LanguageTranscriber {
    const transcriber = isLanguage(code) ? this.transcribers.get(code) : undefined;

    if (!transcriber) {
      throw new NotFoundException(`No rule table registered for language '${code}'`);
    }

    return transcriber;
  }

  listTranscribers(): TranscriberInfo[] {
    return [...this.transcribers.values()].map(({ language, status, labels }) => ({
      language,
      status,
      labels,
    }));
  }

  /**
   * Транскрибирует текст во все варианты языка.
   * Непокрытые таблицей символы копируются как есть и попадают в gaps.
   */
  transcribe(code: string, text: string): TranscriptionResult {
    const transcriber = this.getTranscriber(code);
    const result = transcriber.transcribe(text);

    if (this.reportGaps && result.gaps.length > 0) {
      const graphemes = [...new Set(result.gaps.map((gap) => gap.grapheme))];
      this.logger.warn(
        `[${transcriber.language}, ${transcriber.status}] no rule for ${graphemes
          .map((g) => `'${g}'`)
          .join(', ')} in "${text}"`,
      );
    }

    return result;
  }

  transcribeSingle(code: string, text: string): string {
    const transcriber = this.getTranscriber(code);

    if (transcriber.labels.length !== 1) {
      throw new BadRequestException(
        `Language '${code}' has ${transcriber.labels.length} variants (${transcriber.labels.join(', ')})`,
      );
    }

    return this.transcribe(code, text).variants[0].text;
  }
}
