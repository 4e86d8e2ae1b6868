// ============================================================
// Clickgraph — Upsert Person DTO
//
// Validates POST /person. Every field is optional; blank and
// missing values are resolved by IdentityResolver. Only the
// types are checked here.
// ============================================================

import { IsOptional, IsString, MaxLength } from 'class-validator';

export class UpsertPersonDto {
  /** Stable external identifier. Generated from the other fields when blank. */
  @IsOptional()
  @IsString()
  @MaxLength(256)
  id?: string;

  @IsOptional()
  @IsString()
  @MaxLength(512)
  name?: string;

  @IsOptional()
  @IsString()
  @MaxLength(512)
  email?: string;

  @IsOptional()
  @IsString()
  @MaxLength(64)
  contact_number?: string;
}
