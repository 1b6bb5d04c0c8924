import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import documentExtractionConfig from './config/document-extraction.config';
import { DocumentExtractionController } from './document-extraction.controller';
import { DocumentExtractionService } from './document-extraction.service';
import { PromptBuilderDomainService } from './domain/services/prompt-builder.domain.service';
import { ResponseParserDomainService } from './domain/services/response-parser.domain.service';
import { SchemaValidatorDomainService } from './domain/services/schema-validator.domain.service';
import { ImageConverterAdapter } from './infrastructure/document-preparation/image-converter.adapter';
import { LocalDocumentPreparerAdapter } from './infrastructure/document-preparation/local-document-preparer.adapter';
import { PopplerPdfRasterizerAdapter } from './infrastructure/document-preparation/poppler-pdf-rasterizer.adapter';
import { SharpImageResizerAdapter } from './infrastructure/document-preparation/sharp-image-resizer.adapter';
import { HttpModelGatewayAdapter } from './infrastructure/model-gateway/http-model-gateway.adapter';
import { TempResourceTracker } from './infrastructure/temp-resources/temp-resource-tracker';
import { ModelHealthService } from './services/model-health.service';
import { ExtractionTemplatesService } from './templates/extraction-templates.service';

@Module({
  imports: [
    // Configuration
    ConfigModule.forFeature(documentExtractionConfig),
  ],
  controllers: [DocumentExtractionController],
  providers: [
    // Application layer
    DocumentExtractionService,
    ExtractionTemplatesService,
    ModelHealthService,

    // Domain layer
    PromptBuilderDomainService,
    ResponseParserDomainService,
    SchemaValidatorDomainService,

    // Infrastructure adapters (Hexagonal Architecture)
    {
      provide: 'ModelGatewayPort',
      useClass: HttpModelGatewayAdapter,
    },
    {
      provide: 'DocumentPreparerPort',
      useClass: LocalDocumentPreparerAdapter,
    },
    {
      provide: 'PdfRasterizerPort',
      useClass: PopplerPdfRasterizerAdapter,
    },
    {
      provide: 'ImageResizerPort',
      useClass: SharpImageResizerAdapter,
    },
    {
      provide: 'ImageConverterPort',
      useClass: ImageConverterAdapter,
    },

    // Temp files for rasterized pages and uploads
    TempResourceTracker,
  ],
  exports: [DocumentExtractionService, TempResourceTracker],
})
export class DocumentExtractionModule {}
