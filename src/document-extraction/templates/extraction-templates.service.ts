import { Injectable } from '@nestjs/common';
import { ExtractionRequest } from '../domain/entities/extraction-request.entity';
import { ValidationError } from '../domain/errors/extraction.errors';
import { SchemaValidatorDomainService } from '../domain/services/schema-validator.domain.service';
import templates from './extraction-templates.json';

export interface ExtractionTemplateSummary {
  name: string;
  fieldCount: number;
  tableColumnCount: number;
}

/**
 * Ready-made extraction schemas for common document types
 */
@Injectable()
export class ExtractionTemplatesService {
  private readonly templates: ReadonlyMap<string, unknown> = new Map(
    Object.entries(templates),
  );

  constructor(private readonly schemaValidator: SchemaValidatorDomainService) {}

  listTemplates(): ExtractionTemplateSummary[] {
    return [...this.templates.keys()].sort().map((name) => {
      const template = this.getTemplate(name);
      return {
        name,
        fieldCount: template.fields.length,
        tableColumnCount: template.tables.length,
      };
    });
  }

  /**
   * @throws ValidationError for unknown names
   */
  getTemplate(name: string): ExtractionRequest {
    const template = this.templates.get(name.trim());
    if (template === undefined) {
      throw new ValidationError(`Unknown template "${name}"`, {
        template: `available: ${[...this.templates.keys()].sort().join(', ')}`,
      });
    }
    return this.schemaValidator.validate(template);
  }
}
