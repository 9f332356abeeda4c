import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  PORT?: number;

  @IsString()
  @IsNotEmpty()
  JWT_SECRET!: string;

  @IsString()
  @IsNotEmpty()
  ENCRYPTION_KEY!: string;

  @IsOptional()
  @IsIn(['random-salt', 'legacy'])
  ENCRYPTION_KDF_MODE?: string;

  @IsOptional()
  @IsString()
  ENCRYPTION_SALT?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  ACCESS_TOKEN_EXPIRE_MINUTES?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  REFRESH_TOKEN_EXPIRE_DAYS?: number;

  @IsOptional()
  @IsInt()
  @Min(4)
  @Max(15)
  BCRYPT_ROUNDS?: number;
}

/** `validate` hook for ConfigModule.forRoot: fail fast on a bad environment. */
export function validateEnv(config: Record<string, unknown>): Record<string, unknown> {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return { ...config, ...validated };
}
