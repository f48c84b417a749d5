import { IsISO8601, IsOptional } from 'class-validator';

export class UpdateValidityDto {
  @IsOptional()
  @IsISO8601()
  validFrom?: string | null;

  @IsOptional()
  @IsISO8601()
  validUntil?: string | null;
}
