import { Transform } from 'class-transformer';
import { IsBoolean, IsNumber, IsOptional, IsString } from 'class-validator';
import type { CheckOptions } from '@/shared/ban-check/interfaces/check-options.interface';

const FINITE = { allowNaN: false, allowInfinity: false };

// Form fields arrive as strings; JSON booleans pass through untouched.
const toBoolean = ({ value }: { value: unknown }): unknown => {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
};

// Only numeric strings are converted; any other type reaches @IsNumber as is.
const toNumber = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' && value.trim() !== '' ? Number(value) : value;

/**
 * Tuning knobs shared by both submission routes. Wrong types are rejected;
 * out-of-range numbers are clamped later by the balancer.
 */
export class CheckOptionsDto implements CheckOptions {
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  useAutoBalancing?: boolean;

  @IsOptional()
  @IsString()
  proxyList?: string;

  @IsOptional()
  @Transform(toNumber)
  @IsNumber(FINITE)
  logicalBatchSize?: number;

  @IsOptional()
  @Transform(toNumber)
  @IsNumber(FINITE)
  maxConcurrentBatches?: number;

  @IsOptional()
  @Transform(toNumber)
  @IsNumber(FINITE)
  maxWorkersPerBatch?: number;

  @IsOptional()
  @Transform(toNumber)
  @IsNumber(FINITE)
  interRequestSubmitDelay?: number;

  @IsOptional()
  @Transform(toNumber)
  @IsNumber(FINITE)
  maxRetriesPerUrl?: number;

  @IsOptional()
  @Transform(toNumber)
  @IsNumber(FINITE)
  retryDelaySeconds?: number;
}
