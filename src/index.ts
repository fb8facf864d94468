import 'reflect-metadata';

export * from './app.module';
export * from './modules/transcription';
