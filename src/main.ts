import 'reflect-metadata';
import 'dotenv/config';
import { Logger, ValidationPipe, VersioningType } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import validationOptions from './utils/validation-options';
import { AllConfigType } from './config/config.type';
import { TempResourceTracker } from './document-extraction/infrastructure/temp-resources/temp-resource-tracker';
import helmet from 'helmet';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { cors: true });
  const logger = new Logger('Bootstrap');
  const configService = app.get(ConfigService<AllConfigType>);

  // Security headers; Swagger UI needs inline scripts and styles
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: [
            "'self'",
            "'unsafe-inline'",
            'https://fonts.googleapis.com',
          ],
          scriptSrc: ["'self'", "'unsafe-inline'", "'unsafe-eval'"], // Swagger UI needs unsafe-eval
          imgSrc: ["'self'", 'data:', 'https:'],
          fontSrc: ["'self'", 'https://fonts.gstatic.com', 'data:'],
          connectSrc: ["'self'"],
        },
      },
      hsts: {
        maxAge: 31536000, // 1 year in seconds
        includeSubDomains: true,
        preload: true,
      },
      frameguard: false, // Allow Swagger UI to be embedded (if needed)
      noSniff: true, // Prevent MIME type sniffing
      xssFilter: true, // Enable XSS filter
    }),
  );

  app.enableShutdownHooks();
  app.setGlobalPrefix(
    configService.getOrThrow('app.apiPrefix', { infer: true }),
    {
      exclude: ['/'],
    },
  );
  app.enableVersioning({
    type: VersioningType.URI,
  });
  app.useGlobalPipes(new ValidationPipe(validationOptions));

  // Leftovers from earlier runs (crashes, CLEANUP_TEMP_FILES=false)
  await app.get(TempResourceTracker).cleanupStale();

  // Swagger/OpenAPI documentation
  // Enabled in development and production (can be disabled via environment variable)
  const enableSwagger = process.env.SWAGGER_ENABLED !== 'false';

  if (enableSwagger) {
    const options = new DocumentBuilder()
      .setTitle('Document Extraction API')
      .setDescription(
        'Extract fields and table rows from scanned documents with vision-language models',
      )
      .setVersion('1.0')
      .build();

    const document = SwaggerModule.createDocument(app, options);
    SwaggerModule.setup('docs', app, document);

    logger.log(
      `Swagger documentation available at http://localhost:${configService.getOrThrow('app.port', { infer: true })}/docs`,
    );
  }

  await app.listen(configService.getOrThrow('app.port', { infer: true }));
}
void bootstrap();
