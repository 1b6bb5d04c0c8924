import { Injectable, Logger } from '@nestjs/common';
import { jsonrepair } from 'jsonrepair';
import { ParseError } from '../errors/extraction.errors';
import {
  ResultTable,
  TableResultRow,
} from '../entities/extraction-result.entity';
import {
  isSeparatorRow,
  splitTableRow,
  uniqueColumnNames,
} from '../utils/markdown-table.util';

export type JsonRecord = Record<string, unknown>;

const CODE_FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Response Parser (Domain Layer)
 *
 * Turns raw model text into structured records:
 * - parseObject: JSON object (or list of objects, one per document) with a
 *   repair pass for near-valid JSON
 * - parseTable: first markdown pipe table in the response
 *
 * Both raise ParseError instead of crashing on uninterpretable text.
 */
@Injectable()
export class ResponseParserDomainService {
  private readonly logger = new Logger(ResponseParserDomainService.name);

  parseObject(text: string): JsonRecord | JsonRecord[] {
    const candidate = this.extractJsonCandidate(text);
    if (!candidate) {
      throw new ParseError('Model response is empty', text);
    }

    let value: unknown;
    try {
      value = JSON.parse(candidate);
    } catch {
      value = this.repairAndParse(candidate, text);
    }

    if (isRecord(value)) {
      return value;
    }
    if (Array.isArray(value) && value.every(isRecord)) {
      return value;
    }

    throw new ParseError(
      'Expected a JSON object or a list of JSON objects',
      text,
    );
  }

  parseTable(text: string): ResultTable<TableResultRow> {
    if (!text.includes('|')) {
      throw new ParseError(
        'Response does not contain a markdown table',
        text,
      );
    }

    // Whole lines from the first pipe to the last one, so a header without
    // an outer pipe keeps its first cell
    const spanStart = text.lastIndexOf('\n', text.indexOf('|')) + 1;
    const lineEnd = text.indexOf('\n', text.lastIndexOf('|'));
    const span = text.slice(spanStart, lineEnd === -1 ? text.length : lineEnd);

    // First contiguous run of pipe-delimited lines
    const lines: string[] = [];
    for (const line of span.split(/\r?\n/)) {
      const trimmed = line.trim();
      if (trimmed.includes('|')) {
        lines.push(trimmed);
      } else if (lines.length > 0) {
        break;
      }
    }

    const columns = uniqueColumnNames(splitTableRow(lines[0]));
    const rows: TableResultRow[] = [];

    for (const line of lines.slice(1)) {
      const cells = splitTableRow(line);
      if (isSeparatorRow(cells) || cells.every((cell) => cell === '')) {
        continue;
      }

      const row: TableResultRow = {};
      columns.forEach((column, index) => {
        row[column] = index < cells.length ? cells[index] : '';
      });
      rows.push(row);
    }

    this.logger.debug(
      `[PARSER] Parsed markdown table: ${columns.length} columns, ${rows.length} rows`,
    );

    return { columns, rows };
  }

  /**
   * Unwrap ```json fences and leading prose before the first brace/bracket
   */
  private extractJsonCandidate(text: string): string {
    const fenced = CODE_FENCE.exec(text);
    let candidate = (fenced ? fenced[1] : text).trim();

    if (candidate && !/^[[{]/.test(candidate)) {
      const start = candidate.search(/[[{]/);
      if (start > 0) {
        candidate = candidate.slice(start);
      }
    }

    return candidate;
  }

  private repairAndParse(candidate: string, original: string): unknown {
    try {
      const repaired = jsonrepair(candidate);
      this.logger.warn('[PARSER] Model returned malformed JSON, repaired it');
      return JSON.parse(repaired);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ParseError(
        `Model response is not valid JSON: ${message}`,
        original,
        { cause: error },
      );
    }
  }
}
