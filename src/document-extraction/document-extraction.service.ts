import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { writeFile } from 'fs/promises';
import { basename, join } from 'path';
import { AllConfigType } from '../config/config.type';
import {
  ColumnSpec,
  ExtractionRequest,
  FieldSpec,
} from './domain/entities/extraction-request.entity';
import {
  ExtractionOutcome,
  FieldResultRow,
  ResultTable,
  TableResultRow,
  emptyFieldTable,
  emptyTable,
} from './domain/entities/extraction-result.entity';
import { ModelMessage } from './domain/entities/model-message.entity';
import { ColumnKind } from './domain/enums/column-kind.enum';
import { ConfidenceLevel } from './domain/enums/confidence-level.enum';
import { ConfidencePaddingPolicy } from './domain/enums/confidence-padding-policy.enum';
import {
  DocumentPreparationError,
  ExtractionError,
  ParseError,
  ValidationError,
} from './domain/errors/extraction.errors';
import { DocumentPreparerPort } from './domain/ports/document-preparer.port';
import {
  ModelGatewayPort,
  firstChoiceContent,
} from './domain/ports/model-gateway.port';
import { TempScope } from './domain/ports/temp-scope.port';
import { PromptBuilderDomainService } from './domain/services/prompt-builder.domain.service';
import {
  JsonRecord,
  ResponseParserDomainService,
} from './domain/services/response-parser.domain.service';
import { SchemaValidatorDomainService } from './domain/services/schema-validator.domain.service';
import { Result, err, ok } from './domain/utils/result';
import { TempResourceTracker } from './infrastructure/temp-resources/temp-resource-tracker';

const MIN_IMAGE_SIZE = 64;
const MAX_IMAGE_SIZE = 8192;

/**
 * A file path, or a `[path, label]` pair as produced by upload widgets
 */
export type DocumentInput = string | readonly [string, ...unknown[]];

export interface ExtractOptions {
  /** Model identifier, defaults to DEFAULT_MODEL */
  model?: string;
  /** Longest-edge cap in pixels, defaults to MAX_IMAGE_SIZE */
  maxImageSize?: number;
}

export interface UploadedDocument {
  originalname: string;
  buffer: Buffer;
}

type PathResult<TRow> = Result<ResultTable<TRow>, ExtractionError>;

/**
 * Document Extraction Service
 *
 * Orchestrates extraction of fields and table rows from documents:
 * 1. Validate the schema (ValidationError propagates)
 * 2. Prepare documents into page images inside a temp scope
 * 3. Run the field path (answer + confidence pass) and the table path concurrently
 * 4. Degrade a failed path to an empty table of the right shape
 *
 * Only ValidationError leaves `extract`.
 */
@Injectable()
export class DocumentExtractionService {
  private readonly logger = new Logger(DocumentExtractionService.name);

  constructor(
    @Inject('ModelGatewayPort')
    private readonly modelGateway: ModelGatewayPort,
    @Inject('DocumentPreparerPort')
    private readonly documentPreparer: DocumentPreparerPort,
    private readonly tempResourceTracker: TempResourceTracker,
    private readonly promptBuilder: PromptBuilderDomainService,
    private readonly responseParser: ResponseParserDomainService,
    private readonly schemaValidator: SchemaValidatorDomainService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  async extract(
    files: DocumentInput[],
    schema: unknown,
    options: ExtractOptions = {},
  ): Promise<ExtractionOutcome> {
    const request = this.schemaValidator.validate(schema);
    const tableColumns = request.tables.filter(
      (column) => column.kind === ColumnKind.TABLE,
    );
    const columnNames = tableColumns.map((column) => column.name);

    if (request.fields.length === 0 && tableColumns.length === 0) {
      this.logger.log('[EXTRACT] Nothing requested, skipping model calls');
      return this.emptyOutcome(request);
    }

    const filePaths = files.map((file) =>
      typeof file === 'string' ? file : file[0],
    );
    if (filePaths.length === 0) {
      this.logger.log('[EXTRACT] No files given, skipping model calls');
      return this.emptyOutcome(request);
    }

    await this.documentPreparer.validateFiles(filePaths);

    const config = this.configService.getOrThrow('documentExtraction', {
      infer: true,
    });
    const maxImageSize = this.resolveMaxImageSize(
      options.maxImageSize ?? config.maxImageSize,
    );
    const model = options.model?.trim() || config.defaultModel;

    this.logger.log(
      `[EXTRACT] Starting extraction | Files: ${filePaths.length} | Fields: ${request.fields.length} | Table columns: ${tableColumns.length} | Model: ${model}`,
    );

    return this.tempResourceTracker.withScope(async (scope) => {
      const images = await this.prepareDocuments(filePaths, maxImageSize, scope);
      if (!images) {
        return this.emptyOutcome(request);
      }

      // Each path gets its own copy of the image list
      const [fieldResult, tableResult] = await Promise.all([
        request.fields.length > 0
          ? this.runFieldPath(request.fields, [...images], model)
          : Promise.resolve(ok(emptyFieldTable())),
        tableColumns.length > 0
          ? this.runTablePath(tableColumns, [...images], model)
          : Promise.resolve(ok(emptyTable(columnNames))),
      ]);

      const outcome: ExtractionOutcome = {
        fields: fieldResult.ok
          ? fieldResult.value
          : this.degrade('FIELDS', fieldResult.error, emptyFieldTable()),
        tables: tableResult.ok
          ? tableResult.value
          : this.degrade('TABLES', tableResult.error, emptyTable(columnNames)),
      };

      this.logger.log(
        `[EXTRACT] Extraction finished | Field rows: ${outcome.fields.rows.length} | Table rows: ${outcome.tables.rows.length}`,
      );
      return outcome;
    });
  }

  /**
   * Extract from in-memory uploads. Uploads are written to a temp scope that
   * is released once extraction returns.
   */
  async extractUploadedFiles(
    uploads: UploadedDocument[],
    schema: unknown,
    options: ExtractOptions = {},
  ): Promise<ExtractionOutcome> {
    return this.tempResourceTracker.withScope(async (scope) => {
      const directory = await scope.createTempDirectory('upload_');
      const paths: string[] = [];

      for (const [index, upload] of uploads.entries()) {
        const filePath = join(
          directory,
          `${index}_${sanitizeFileName(upload.originalname)}`,
        );
        await writeFile(filePath, upload.buffer);
        paths.push(filePath);
      }

      return this.extract(paths, schema, options);
    });
  }

  private async prepareDocuments(
    filePaths: string[],
    maxImageSize: number,
    scope: TempScope,
  ): Promise<string[] | null> {
    try {
      const images = await this.documentPreparer.prepare(
        filePaths,
        maxImageSize,
        scope,
      );
      this.logger.log(
        `[PREPARE] ${filePaths.length} file(s) -> ${images.length} image(s)`,
      );
      return images;
    } catch (error) {
      const failure =
        error instanceof ExtractionError
          ? error
          : new DocumentPreparationError(
              error instanceof Error ? error.message : 'Unknown error',
              filePaths.join(', '),
              { cause: error },
            );
      this.degrade('PREPARE', failure, null);
      return null;
    }
  }

  private async runFieldPath(
    fields: FieldSpec[],
    images: string[],
    model: string,
  ): Promise<PathResult<FieldResultRow>> {
    const fieldNames = fields.map((field) => field.name);

    try {
      const messages = await this.promptBuilder.buildFieldPrompt(
        fieldNames,
        fields.map((field) => field.description),
        images,
      );

      // Object schemas would forbid the per-document list several images may need
      const constrained = images.length === 1;

      this.logger.log(`[FIELDS] Requesting ${fieldNames.length} field(s) from ${model}`);
      const answerText = firstChoiceContent(
        await this.modelGateway.send(messages, model, {
          responseSchema: constrained
            ? this.promptBuilder.buildFieldAnswerSchema(fieldNames)
            : undefined,
        }),
      );
      this.logger.debug(`[FIELDS] Raw answer: ${answerText}`);

      const answers = toDocumentList(this.responseParser.parseObject(answerText));
      const confidences = await this.scoreConfidence(
        messages,
        answerText,
        fieldNames,
        model,
        constrained,
      );

      return ok({
        columns: emptyFieldTable().columns,
        rows: this.assembleFieldRows(fieldNames, answers, confidences),
      });
    } catch (error) {
      if (error instanceof ExtractionError) {
        return err(error);
      }
      throw error;
    }
  }

  /**
   * Second pass: the model grades its own answer.
   * A confidence response that cannot be parsed grades everything Low.
   */
  private async scoreConfidence(
    messages: ModelMessage[],
    answerText: string,
    fieldNames: string[],
    model: string,
    constrained: boolean,
  ): Promise<JsonRecord[]> {
    const confidenceMessages = this.promptBuilder.buildConfidencePrompt(
      messages,
      answerText,
      fieldNames,
    );

    this.logger.log(`[FIELDS] Requesting confidence scores from ${model}`);
    const confidenceText = firstChoiceContent(
      await this.modelGateway.send(confidenceMessages, model, {
        responseSchema: constrained
          ? this.promptBuilder.buildConfidenceSchema(fieldNames)
          : undefined,
      }),
    );
    this.logger.debug(`[FIELDS] Raw confidence: ${confidenceText}`);

    try {
      return toDocumentList(this.responseParser.parseObject(confidenceText));
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      this.logger.warn(
        `[FIELDS] Failed to parse confidence scores, defaulting to ${ConfidenceLevel.LOW}: ${error.message}`,
      );
      return [];
    }
  }

  private assembleFieldRows(
    fieldNames: string[],
    answers: JsonRecord[],
    confidences: JsonRecord[],
  ): FieldResultRow[] {
    const padded = this.padConfidences(confidences, answers.length);

    const rows = answers.flatMap((document, documentIndex) =>
      fieldNames.map((field) => ({
        field,
        answer: toAnswer(document[field]),
        confidence: toConfidenceLevel(padded[documentIndex][field]),
        documentIndex,
      })),
    );

    return rows.sort(
      (a, b) =>
        a.documentIndex - b.documentIndex || compareStrings(a.field, b.field),
    );
  }

  /**
   * One confidence mapping per answered document. A single mapping applies
   * to every document; a short list is padded per CONFIDENCE_PADDING_POLICY.
   */
  private padConfidences(
    confidences: JsonRecord[],
    documentCount: number,
  ): JsonRecord[] {
    if (confidences.length === 1) {
      return Array.from({ length: documentCount }, () => confidences[0]);
    }

    const policy = this.configService.getOrThrow(
      'documentExtraction.confidencePaddingPolicy',
      { infer: true },
    );
    const filler: JsonRecord =
      policy === ConfidencePaddingPolicy.REPEAT_FIRST && confidences.length > 0
        ? confidences[0]
        : {};

    return Array.from(
      { length: documentCount },
      (_, index) => confidences[index] ?? filler,
    );
  }

  private async runTablePath(
    columns: ColumnSpec[],
    images: string[],
    model: string,
  ): Promise<PathResult<TableResultRow>> {
    const columnNames = columns.map((column) => column.name);

    try {
      const messages = await this.promptBuilder.buildTablePrompt(
        columnNames,
        columns.map((column) => column.description),
        images,
      );

      this.logger.log(`[TABLES] Requesting ${columnNames.length} column(s) from ${model}`);
      const tableText = firstChoiceContent(
        await this.modelGateway.send(messages, model),
      );
      this.logger.debug(`[TABLES] Raw answer: ${tableText}`);

      const parsed = this.responseParser.parseTable(tableText);
      return ok(alignTableColumns(columnNames, parsed));
    } catch (error) {
      if (error instanceof ExtractionError) {
        return err(error);
      }
      throw error;
    }
  }

  private resolveMaxImageSize(maxImageSize: number): number {
    if (
      !Number.isInteger(maxImageSize) ||
      maxImageSize < MIN_IMAGE_SIZE ||
      maxImageSize > MAX_IMAGE_SIZE
    ) {
      throw new ValidationError(
        `maxImageSize must be an integer between ${MIN_IMAGE_SIZE} and ${MAX_IMAGE_SIZE}`,
        { maxImageSize: String(maxImageSize) },
      );
    }
    return maxImageSize;
  }

  private emptyOutcome(request: ExtractionRequest): ExtractionOutcome {
    return {
      fields: emptyFieldTable(),
      tables: emptyTable(
        request.tables
          .filter((column) => column.kind === ColumnKind.TABLE)
          .map((column) => column.name),
      ),
    };
  }

  private degrade<T>(path: string, error: ExtractionError, fallback: T): T {
    this.logger.error(
      `[${path}] ${error.kind}: ${error.message}. Returning empty result`,
    );
    return fallback;
  }
}

function toDocumentList(parsed: JsonRecord | JsonRecord[]): JsonRecord[] {
  return Array.isArray(parsed) ? parsed : [parsed];
}

function toAnswer(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function toConfidenceLevel(value: unknown): ConfidenceLevel {
  return typeof value === 'string' &&
    value.trim().toLowerCase() === ConfidenceLevel.HIGH.toLowerCase()
    ? ConfidenceLevel.HIGH
    : ConfidenceLevel.LOW;
}

function compareStrings(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

/**
 * Requested columns first (matched case-insensitively against the model's
 * headers), then any extra columns the model added.
 */
function alignTableColumns(
  requested: string[],
  parsed: ResultTable<TableResultRow>,
): ResultTable<TableResultRow> {
  const normalize = (name: string) => name.trim().toLowerCase();
  const unmatched = [...parsed.columns];
  const sources = new Map<string, string>();

  for (const name of requested) {
    const position = unmatched.findIndex(
      (column) => normalize(column) === normalize(name),
    );
    if (position >= 0) {
      sources.set(name, unmatched[position]);
      unmatched.splice(position, 1);
    }
  }

  const extras = unmatched.filter((column) => !requested.includes(column));
  const rows = parsed.rows.map((row) => {
    const aligned: TableResultRow = {};
    for (const name of requested) {
      const source = sources.get(name);
      aligned[name] = source === undefined ? '' : row[source] ?? '';
    }
    for (const column of extras) {
      aligned[column] = row[column] ?? '';
    }
    return aligned;
  });

  return { columns: [...requested, ...extras], rows };
}

function sanitizeFileName(name: string): string {
  const sanitized = basename(name).replace(/[^\w.-]/g, '_');
  return sanitized || 'upload';
}
