import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import appConfig from './config/app.config';
import { AllConfigType } from './config/config.type';
import throttlerConfig from './config/throttler.config';
import { DocumentExtractionModule } from './document-extraction/document-extraction.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, throttlerConfig],
      envFilePath: ['.env'],
    }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) => [
        {
          ttl: configService.getOrThrow('throttler.ttl', { infer: true }),
          limit: configService.getOrThrow('throttler.limit', { infer: true }),
        },
      ],
    }),
    DocumentExtractionModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
