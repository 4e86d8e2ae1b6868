import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export const SAMPLE_DEFAULT_LIMIT = 10;
export const SAMPLE_MAX_LIMIT = 500;

export class SampleQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(SAMPLE_MAX_LIMIT)
  limit?: number;
}
