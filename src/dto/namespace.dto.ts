import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, Length, Matches } from 'class-validator';

export const NAMESPACE_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

export class CreateNamespaceDto {
  @ApiProperty({ example: 'prod', pattern: NAMESPACE_NAME_PATTERN.source })
  @IsString()
  @Length(1, 255)
  @Matches(NAMESPACE_NAME_PATTERN)
  name!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;
}

export class UpdateNamespaceDto {
  @ApiPropertyOptional({ pattern: NAMESPACE_NAME_PATTERN.source })
  @IsOptional()
  @IsString()
  @Length(1, 255)
  @Matches(NAMESPACE_NAME_PATTERN)
  name?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;
}
