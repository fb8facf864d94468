import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

// Модули приложения
import { TranscriptionModule } from './modules/transcription/transcription.module';

@Module({
  imports: [
    // Загружает переменные окружения из .env файла
    ConfigModule.forRoot({
      isGlobal: true, // доступен во всех модулях без импорта
    }),

    TranscriptionModule,
  ],
})
export class AppModule {}
