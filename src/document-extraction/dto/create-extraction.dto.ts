import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsInt,
  IsJSON,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

/**
 * Multipart form fields sent beside the uploaded files
 */
export class CreateExtractionDto {
  @ApiPropertyOptional({
    description:
      'Extraction schema as JSON text: {"fields": [...], "tables": [...]} or a list of {name, kind, description} rows. Required unless `template` is given.',
    example:
      '{"fields":[{"name":"invoice_number","description":"Invoice number"}],"tables":[]}',
  })
  @IsOptional()
  @IsJSON()
  schema?: string;

  @ApiPropertyOptional({
    description: 'Name of a built-in template, used when `schema` is absent',
    example: 'invoice',
  })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  template?: string;

  @ApiPropertyOptional({
    description: 'Model identifier',
    example: 'hosted_vllm/nanonets/Nanonets-OCR-s',
  })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  model?: string;

  @ApiPropertyOptional({
    description: 'Longest-edge cap for page images, in pixels',
    minimum: 64,
    maximum: 8192,
    example: 1024,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(64)
  @Max(8192)
  maxImageSize?: number;
}
