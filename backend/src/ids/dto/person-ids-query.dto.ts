import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';

export const IDS_DEFAULT_LIMIT = 500;
export const IDS_MAX_LIMIT = 2000;

export class PersonIdsQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  skip?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(IDS_MAX_LIMIT)
  limit?: number;
}

export class PersonInternalIdsQueryDto extends PersonIdsQueryDto {
  /** "true" restricts to persons with at least one Clicked_on edge. */
  @IsOptional()
  @IsIn(['true', 'false'])
  only_connected?: string;
}
