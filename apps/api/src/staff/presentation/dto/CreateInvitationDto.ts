import {
  ArrayMaxSize,
  IsArray,
  IsISO8601,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

export class CreateInvitationDto {
  @IsArray()
  @ArrayMaxSize(25)
  @IsString({ each: true })
  @MaxLength(254, { each: true })
  recipientsEmail!: string[];

  @IsOptional()
  @IsISO8601()
  validFrom?: string | null;

  @IsOptional()
  @IsISO8601()
  validUntil?: string | null;
}
