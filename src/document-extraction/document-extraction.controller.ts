import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  Query,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FilesInterceptor } from '@nestjs/platform-express';
import { Throttle } from '@nestjs/throttler';
import {
  ApiBadRequestResponse,
  ApiBody,
  ApiConsumes,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiQuery,
  ApiTags,
} from '@nestjs/swagger';
import { extname } from 'path';
import { DocumentExtractionService } from './document-extraction.service';
import { ValidationError } from './domain/errors/extraction.errors';
import { SUPPORTED_DOCUMENT_EXTENSIONS } from './domain/ports/document-preparer.port';
import { CreateExtractionDto } from './dto/create-extraction.dto';
import {
  ExtractionResponseDto,
  ExtractionTemplateSummaryDto,
  ModelHealthResponseDto,
} from './dto/extraction-response.dto';
import { ExtractionSchemaDto } from './dto/extraction-schema.dto';
import { ModelHealthService } from './services/model-health.service';
import { ExtractionTemplatesService } from './templates/extraction-templates.service';

const MAX_FILES = 10;
const MAX_FILE_SIZE = 20 * 1024 * 1024; // 20 MB

/**
 * Document Extraction Controller
 *
 * Thin HTTP surface over DocumentExtractionService. Invalid schemas and
 * unsupported files map to 400; model and parse failures never reach here,
 * they come back as empty tables.
 */
@ApiTags('Extractions')
@Controller({ path: 'extractions', version: '1' })
export class DocumentExtractionController {
  private readonly logger = new Logger(DocumentExtractionController.name);

  constructor(
    private readonly documentExtractionService: DocumentExtractionService,
    private readonly extractionTemplatesService: ExtractionTemplatesService,
    private readonly modelHealthService: ModelHealthService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 10, ttl: 60000 } }) // 10 extractions per minute
  @ApiOperation({
    summary: 'Extract fields and table rows from documents',
    description:
      'Runs field extraction (with a confidence pass) and table extraction over all uploaded pages in one combined prompt per path.',
  })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        files: {
          type: 'array',
          items: { type: 'string', format: 'binary' },
          description: `Documents (${SUPPORTED_DOCUMENT_EXTENSIONS.join(', ')})`,
        },
        schema: { type: 'string' },
        template: { type: 'string' },
        model: { type: 'string' },
        maxImageSize: { type: 'integer', minimum: 64, maximum: 8192 },
      },
      required: ['files'],
    },
  })
  @ApiOkResponse({ type: ExtractionResponseDto })
  @ApiBadRequestResponse({ description: 'Invalid schema, template or files' })
  @UseInterceptors(
    FilesInterceptor('files', MAX_FILES, {
      limits: {
        fileSize: MAX_FILE_SIZE,
        files: MAX_FILES,
      },
      fileFilter: (req, file, callback) => {
        const extension = extname(file.originalname).toLowerCase();
        if (!SUPPORTED_DOCUMENT_EXTENSIONS.includes(extension)) {
          return callback(
            new BadRequestException(
              `Invalid file type. Allowed types: ${SUPPORTED_DOCUMENT_EXTENSIONS.join(', ')}`,
            ),
            false,
          );
        }
        callback(null, true);
      },
    }),
  )
  async extract(
    @UploadedFiles() files: Express.Multer.File[] | undefined,
    @Body() dto: CreateExtractionDto,
  ): Promise<ExtractionResponseDto> {
    this.logger.log(
      `[EXTRACTION] Request received: files=${files?.length ?? 0}, template=${dto.template ?? 'none'}, model=${dto.model ?? 'default'}`,
    );

    if (!files || files.length === 0) {
      throw new BadRequestException('At least one file is required');
    }

    return this.withValidation(async () => {
      const schema = this.resolveSchema(dto);
      return this.documentExtractionService.extractUploadedFiles(
        files.map((file) => ({
          originalname: file.originalname,
          buffer: file.buffer,
        })),
        schema,
        { model: dto.model, maxImageSize: dto.maxImageSize },
      );
    });
  }

  @Get('templates')
  @ApiOperation({ summary: 'List built-in extraction templates' })
  @ApiOkResponse({ type: [ExtractionTemplateSummaryDto] })
  listTemplates(): ExtractionTemplateSummaryDto[] {
    return this.extractionTemplatesService.listTemplates();
  }

  @Get('templates/:name')
  @ApiOperation({ summary: 'Get the schema of a built-in template' })
  @ApiParam({ name: 'name', example: 'invoice' })
  @ApiOkResponse({ type: ExtractionSchemaDto })
  @ApiBadRequestResponse({ description: 'Unknown template' })
  async getTemplate(@Param('name') name: string): Promise<ExtractionSchemaDto> {
    return this.withValidation(async () =>
      this.extractionTemplatesService.getTemplate(name),
    );
  }

  @Get('models/health')
  @ApiOperation({ summary: 'Check that a model answers' })
  @ApiQuery({ name: 'model', required: false })
  @ApiOkResponse({ type: ModelHealthResponseDto })
  async checkModel(
    @Query('model') model?: string,
  ): Promise<ModelHealthResponseDto> {
    return this.modelHealthService.checkModel(model);
  }

  private resolveSchema(dto: CreateExtractionDto): unknown {
    if (dto.schema !== undefined) {
      const schema: unknown = JSON.parse(dto.schema);
      return schema;
    }
    if (dto.template !== undefined) {
      return this.extractionTemplatesService.getTemplate(dto.template);
    }
    throw new ValidationError('Either schema or template is required', {
      schema: 'missing',
    });
  }

  private async withValidation<T>(work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.warn(`[EXTRACTION] Rejected: ${error.message}`);
        throw new BadRequestException({
          status: HttpStatus.BAD_REQUEST,
          message: error.message,
          errors: error.details,
        });
      }
      throw error;
    }
  }
}
