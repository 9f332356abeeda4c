import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsDate,
  IsEnum,
  IsOptional,
  IsString,
  Length,
} from 'class-validator';
import { ApiKeyScope } from '../auth/roles';

/** Accepts `["read","write"]` as well as the comma-separated form `"read,write"`. */
function splitScopes({ value }: { value: unknown }): unknown {
  if (typeof value !== 'string') return value;
  return value
    .split(',')
    .map((scope) => scope.trim())
    .filter((scope) => scope.length > 0);
}

export class CreateApiKeyDto {
  @ApiProperty({ description: 'Friendly name for the API key', example: 'ci-deploy' })
  @IsString()
  @Length(1, 255)
  name!: string;

  @ApiPropertyOptional({ enum: ApiKeyScope, isArray: true, default: [ApiKeyScope.READ] })
  @IsOptional()
  @Transform(splitScopes)
  @IsArray()
  @ArrayNotEmpty()
  @IsEnum(ApiKeyScope, { each: true })
  scopes?: ApiKeyScope[];

  @ApiPropertyOptional({ type: String, format: 'date-time' })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  expires_at?: Date;
}
