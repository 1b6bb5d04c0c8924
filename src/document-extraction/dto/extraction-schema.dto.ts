import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsArray,
  IsEnum,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { ColumnKind } from '../domain/enums/column-kind.enum';

export class FieldSpecDto {
  @ApiProperty({ example: 'invoice_number' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiPropertyOptional({ example: 'Invoice number' })
  @IsOptional()
  @IsString()
  description?: string;
}

export class TableColumnSpecDto {
  @ApiProperty({ example: 'Unit Price' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiPropertyOptional({ enum: ColumnKind, default: ColumnKind.TABLE })
  @IsOptional()
  @IsEnum(ColumnKind)
  kind?: ColumnKind;

  @ApiPropertyOptional({ example: 'Unit price of the product' })
  @IsOptional()
  @IsString()
  description?: string;
}

/**
 * Mapping form: `{ fields: [...], tables: [...] }`
 */
export class ExtractionSchemaDto {
  @ApiProperty({ type: [FieldSpecDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => FieldSpecDto)
  fields!: FieldSpecDto[];

  @ApiProperty({ type: [TableColumnSpecDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TableColumnSpecDto)
  tables!: TableColumnSpecDto[];
}

/**
 * Tabular form: one row per field or table column
 */
export class ExtractionSchemaRowDto {
  @ApiProperty({ example: 'invoice_date' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty({ enum: ColumnKind })
  @IsEnum(ColumnKind)
  kind!: ColumnKind;

  @ApiPropertyOptional({ example: 'Invoice date' })
  @IsOptional()
  @IsString()
  description?: string;
}
