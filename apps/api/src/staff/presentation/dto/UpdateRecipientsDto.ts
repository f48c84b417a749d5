import { ArrayMaxSize, IsArray, IsString, MaxLength } from 'class-validator';

export class UpdateRecipientsDto {
  @IsArray()
  @ArrayMaxSize(25)
  @IsString({ each: true })
  @MaxLength(254, { each: true })
  recipientsEmail!: string[];
}
