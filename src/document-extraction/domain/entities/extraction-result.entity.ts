import { ConfidenceLevel } from '../enums/confidence-level.enum';

export interface FieldResultRow {
  field: string;
  answer: string;
  confidence: ConfidenceLevel;
  documentIndex: number;
}

/**
 * Free-form row keyed by table column name
 */
export type TableResultRow = Record<string, string>;

export interface ResultTable<TRow> {
  columns: string[];
  rows: TRow[];
}

export interface ExtractionOutcome {
  fields: ResultTable<FieldResultRow>;
  tables: ResultTable<TableResultRow>;
}

export const FIELD_RESULT_COLUMNS: readonly string[] = [
  'field',
  'answer',
  'confidence',
  'documentIndex',
];

export function emptyFieldTable(): ResultTable<FieldResultRow> {
  return { columns: [...FIELD_RESULT_COLUMNS], rows: [] };
}

export function emptyTable(columns: string[]): ResultTable<TableResultRow> {
  return { columns: [...columns], rows: [] };
}
