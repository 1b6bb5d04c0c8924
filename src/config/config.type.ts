import { AppConfig } from './app-config.type';
import { ThrottlerConfig } from './throttler-config.type';
import { DocumentExtractionConfig } from '../document-extraction/config/document-extraction-config.type';

export type AllConfigType = {
  app: AppConfig;
  throttler: ThrottlerConfig;
  documentExtraction: DocumentExtractionConfig;
};
