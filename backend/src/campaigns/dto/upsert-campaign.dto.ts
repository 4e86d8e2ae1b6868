import { IsOptional, IsString, MaxLength } from 'class-validator';

export class UpsertCampaignDto {
  /** Generated from `campaign` when blank. */
  @IsOptional()
  @IsString()
  @MaxLength(256)
  id?: string;

  /** Display name. */
  @IsOptional()
  @IsString()
  @MaxLength(512)
  campaign?: string;
}
