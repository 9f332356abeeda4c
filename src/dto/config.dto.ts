import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import type { SchemaObject } from 'ajv';
import {
  IsArray,
  IsBoolean,
  IsDefined,
  IsEnum,
  IsInt,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Length,
  Matches,
  Min,
  ValidateNested,
} from 'class-validator';
import { ConfigValueType, ValidationSchema } from '../entities/config-entry.entity';

export const CONFIG_KEY_PATTERN = /^[a-zA-Z0-9_.-]+$/;

export class ValidationSchemaDto implements ValidationSchema {
  @ApiPropertyOptional({ description: 'string: minimum length' })
  @IsOptional()
  @IsInt()
  @Min(0)
  min_length?: number;

  @ApiPropertyOptional({ description: 'string: maximum length' })
  @IsOptional()
  @IsInt()
  @Min(0)
  max_length?: number;

  @ApiPropertyOptional({ description: 'string: regular expression the value must match' })
  @IsOptional()
  @IsString()
  pattern?: string;

  @ApiPropertyOptional({ description: 'number: inclusive lower bound' })
  @IsOptional()
  @IsNumber()
  min_value?: number;

  @ApiPropertyOptional({ description: 'number: inclusive upper bound' })
  @IsOptional()
  @IsNumber()
  max_value?: number;

  @ApiPropertyOptional({ description: 'select: allowed values', type: [String] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  options?: string[];

  @ApiPropertyOptional({ description: 'json: JSON Schema the document must satisfy', type: 'object', additionalProperties: true })
  @IsOptional()
  @IsObject()
  json_schema?: SchemaObject;
}

export class CreateConfigDto {
  @ApiProperty({ example: 'app_name', pattern: CONFIG_KEY_PATTERN.source })
  @IsString()
  @Length(1, 255)
  @Matches(CONFIG_KEY_PATTERN)
  key!: string;

  @ApiProperty({ description: 'Value matching value_type' })
  @IsDefined()
  value!: unknown;

  @ApiProperty({ enum: ConfigValueType })
  @IsEnum(ConfigValueType)
  value_type!: ConfigValueType;

  @ApiPropertyOptional({ type: ValidationSchemaDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => ValidationSchemaDto)
  validation_schema?: ValidationSchemaDto;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  is_secret?: boolean;
}

export class UpdateConfigDto {
  @ApiPropertyOptional({ description: 'New value; omit to keep the current one' })
  @IsOptional()
  value?: unknown;

  @ApiPropertyOptional({ enum: ConfigValueType })
  @IsOptional()
  @IsEnum(ConfigValueType)
  value_type?: ConfigValueType;

  @ApiPropertyOptional({ type: ValidationSchemaDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => ValidationSchemaDto)
  validation_schema?: ValidationSchemaDto;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsBoolean()
  is_secret?: boolean;
}
