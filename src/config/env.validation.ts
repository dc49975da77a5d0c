import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsEnum,
  IsNumberString,
  IsOptional,
  IsString,
  IsTimeZone,
  validateSync,
} from 'class-validator';
import { ReopenPolicy } from '../common/enums/complaint.enum';

class EnvironmentVariables {
  @IsOptional()
  @IsNumberString()
  PORT?: string;

  @IsOptional()
  @IsString()
  JWT_SECRET?: string;

  @IsOptional()
  @IsNumberString()
  BCRYPT_ROUNDS?: string;

  @IsOptional()
  @IsNumberString()
  DB_PORT?: string;

  @IsOptional()
  @IsBooleanString()
  DB_SYNCHRONIZE?: string;

  @IsOptional()
  @IsTimeZone()
  COMPLAINT_ID_TIME_ZONE?: string;

  @IsOptional()
  @IsNumberString()
  COMPLAINT_ID_MAX_RETRIES?: string;

  @IsOptional()
  @IsEnum(ReopenPolicy)
  COMPLAINT_REOPEN_POLICY?: ReopenPolicy;

  @IsOptional()
  @IsNumberString()
  COMPLAINT_PAGE_SIZE?: string;

  @IsOptional()
  @IsNumberString()
  COMPLAINT_MAX_PAGE_SIZE?: string;

  @IsOptional()
  @IsNumberString()
  ATTACHMENT_MAX_BYTES?: string;

  @IsOptional()
  @IsBooleanString()
  MAIL_ENABLED?: string;

  @IsOptional()
  @IsBooleanString()
  SEED_ON_BOOT?: string;
}

export function validateEnv(config: Record<string, unknown>) {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: true });

  if (errors.length > 0) {
    const messages = errors
      .map((err) => (err.constraints ? Object.values(err.constraints) : []))
      .flat();
    throw new Error(`Invalid environment: ${messages.join('; ')}`);
  }
  return config;
}
