import { ApiProperty } from '@nestjs/swagger';
import { ConfidenceLevel } from '../domain/enums/confidence-level.enum';

export class FieldResultRowDto {
  @ApiProperty({ example: 'invoice_number' })
  field!: string;

  @ApiProperty({ example: 'INV-1' })
  answer!: string;

  @ApiProperty({ enum: ConfidenceLevel })
  confidence!: ConfidenceLevel;

  @ApiProperty({ example: 0 })
  documentIndex!: number;
}

export class FieldResultTableDto {
  @ApiProperty({
    type: [String],
    example: ['field', 'answer', 'confidence', 'documentIndex'],
  })
  columns!: string[];

  @ApiProperty({ type: [FieldResultRowDto] })
  rows!: FieldResultRowDto[];
}

export class TableResultTableDto {
  @ApiProperty({ type: [String], example: ['items_description', 'Unit Price'] })
  columns!: string[];

  @ApiProperty({
    type: 'array',
    items: { type: 'object', additionalProperties: { type: 'string' } },
    example: [{ items_description: 'Widget', 'Unit Price': '4.00' }],
  })
  rows!: Record<string, string>[];
}

export class ExtractionResponseDto {
  @ApiProperty({ type: FieldResultTableDto })
  fields!: FieldResultTableDto;

  @ApiProperty({ type: TableResultTableDto })
  tables!: TableResultTableDto;
}

export class ExtractionTemplateSummaryDto {
  @ApiProperty({ example: 'invoice' })
  name!: string;

  @ApiProperty({ example: 11 })
  fieldCount!: number;

  @ApiProperty({ example: 5 })
  tableColumnCount!: number;
}

export class ModelHealthResponseDto {
  @ApiProperty({ example: 'hosted_vllm/nanonets/Nanonets-OCR-s' })
  model!: string;

  @ApiProperty()
  available!: boolean;

  @ApiProperty({ example: 420 })
  responseTimeMs!: number;

  @ApiProperty({ required: false })
  error?: string;

  @ApiProperty({ example: '2024-01-01T00:00:00.000Z' })
  timestamp!: string;
}
