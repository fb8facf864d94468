// Barrel export для удобного импорта
export * from './transcription.module';
export * from './transcription.service';
export * from './language-transcriber';
export * from './constants/languages';
export * from './constants/transcribers';
export * from './dto/rule-table.dto';
export * from './utils/errors';
export * from './utils/rules';
export * from './utils/variants';
export * from './utils/rewrite';
export * from './utils/rule-table-loader';
