import { ColumnKind } from '../enums/column-kind.enum';

/**
 * One scalar value to extract per document
 */
export interface FieldSpec {
  name: string; // Unique within a request
  description: string;
}

/**
 * Unified schema entry. Only TABLE entries take part in table extraction.
 */
export interface ColumnSpec {
  name: string;
  kind: ColumnKind;
  description: string;
}

/**
 * Validated extraction schema. Both lists are always present and every
 * entry has a non-empty name.
 */
export interface ExtractionRequest {
  fields: FieldSpec[];
  tables: ColumnSpec[];
}
