// ============================================================
// Clickgraph — Record Click DTO
//
// Validates POST /clicked_on. Both endpoint ids are optional:
// blank ones are resolved to generated ids and the endpoint
// node is created as an "Unknown" placeholder. A body with no
// fields at all is rejected by ClicksService.
// ============================================================

import {
  IsISO8601,
  IsOptional,
  IsString,
  MaxLength,
  ValidateIf,
} from 'class-validator';

const isSupplied = (_: object, value: unknown): boolean =>
  value !== undefined &&
  value !== null &&
  !(typeof value === 'string' && value.trim() === '');

export class RecordClickDto {
  @IsOptional()
  @IsString()
  @MaxLength(256)
  person_id?: string;

  @IsOptional()
  @IsString()
  @MaxLength(256)
  campaign_id?: string;

  /** Client-side click id. A fresh one is generated when absent. */
  @IsOptional()
  @IsString()
  @MaxLength(256)
  id?: string;

  @IsOptional()
  @IsString()
  @MaxLength(256)
  source?: string;

  @IsOptional()
  @IsString()
  @MaxLength(256)
  medium?: string;

  @IsOptional()
  @IsString()
  @MaxLength(256)
  term?: string;

  /** Ad content; also drives the derived `tag`. */
  @IsOptional()
  @IsString()
  @MaxLength(2048)
  content?: string;

  @IsOptional()
  @IsString()
  @MaxLength(256)
  device?: string;

  /** Campaign-side date, YYYY-MM-DD or a full ISO-8601 timestamp. */
  @ValidateIf(isSupplied)
  @IsISO8601()
  date?: string;
}
