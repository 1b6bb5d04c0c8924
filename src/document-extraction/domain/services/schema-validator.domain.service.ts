import { Injectable, Logger } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import { validateSync } from 'class-validator';
import {
  ExtractionSchemaDto,
  ExtractionSchemaRowDto,
} from '../../dto/extraction-schema.dto';
import { ExtractionRequest } from '../entities/extraction-request.entity';
import { ColumnKind } from '../enums/column-kind.enum';
import { ValidationError } from '../errors/extraction.errors';
import {
  flattenValidationErrors,
  summarizeValidationErrors,
} from '../../../utils/validation-errors';

/**
 * Validates the caller's schema (mapping or tabular form) into an
 * ExtractionRequest. Fails fast with every offending entry listed.
 */
@Injectable()
export class SchemaValidatorDomainService {
  private readonly logger = new Logger(SchemaValidatorDomainService.name);

  validate(schema: unknown): ExtractionRequest {
    let request: ExtractionRequest;

    if (Array.isArray(schema)) {
      request = this.validateRows(schema);
    } else if (schema !== null && typeof schema === 'object') {
      request = this.validateMapping(schema);
    } else {
      throw new ValidationError(
        'Schema must be a mapping with "fields" and "tables" or a list of schema rows',
      );
    }

    this.logger.debug(
      `[SCHEMA] Validated configuration: ${request.fields.length} fields, ${request.tables.length} table columns`,
    );

    return request;
  }

  private validateMapping(schema: object): ExtractionRequest {
    const dto = plainToClass(ExtractionSchemaDto, schema);
    this.assertValid(flattenValidationErrors(validateSync(dto)));

    const request: ExtractionRequest = {
      fields: dto.fields.map((field) => ({
        name: field.name,
        description: field.description ?? '',
      })),
      tables: dto.tables.map((column) => ({
        name: column.name,
        kind: column.kind ?? ColumnKind.TABLE,
        description: column.description ?? '',
      })),
    };

    this.assertUniqueNames(
      request.fields.map((field) => field.name),
      (index) => `fields[${index}].name`,
    );

    return request;
  }

  private validateRows(rows: unknown[]): ExtractionRequest {
    const details: Record<string, string> = {};
    const specs: ExtractionSchemaRowDto[] = [];

    rows.forEach((row, index) => {
      if (row === null || typeof row !== 'object' || Array.isArray(row)) {
        details[`[${index}]`] = 'schema row must be an object';
        return;
      }
      const dto = plainToClass(ExtractionSchemaRowDto, row);
      Object.assign(
        details,
        flattenValidationErrors(validateSync(dto), `[${index}]`),
      );
      specs.push(dto);
    });

    this.assertValid(details);

    const fieldRows = specs
      .map((spec, index) => ({ spec, index }))
      .filter(({ spec }) => spec.kind === ColumnKind.FIELD);

    this.assertUniqueNames(
      fieldRows.map(({ spec }) => spec.name),
      (position) => `[${fieldRows[position].index}].name`,
    );

    return {
      fields: fieldRows.map(({ spec }) => ({
        name: spec.name,
        description: spec.description ?? '',
      })),
      tables: specs
        .filter((spec) => spec.kind === ColumnKind.TABLE)
        .map((spec) => ({
          name: spec.name,
          kind: ColumnKind.TABLE,
          description: spec.description ?? '',
        })),
    };
  }

  private assertUniqueNames(
    names: string[],
    pathOf: (index: number) => string,
  ): void {
    const details: Record<string, string> = {};
    const seen = new Set<string>();

    names.forEach((name, index) => {
      if (seen.has(name)) {
        details[pathOf(index)] = `duplicate field name "${name}"`;
      }
      seen.add(name);
    });

    this.assertValid(details);
  }

  private assertValid(details: Record<string, string>): void {
    if (Object.keys(details).length === 0) {
      return;
    }

    throw new ValidationError(
      `Invalid extraction schema: ${summarizeValidationErrors(details)}`,
      details,
    );
  }
}
