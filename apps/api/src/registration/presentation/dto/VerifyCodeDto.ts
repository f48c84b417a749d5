import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class VerifyCodeDto {
  @IsString()
  @MaxLength(254)
  email!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(16)
  code!: string;
}
