import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class CompleteRegistrationDto {
  @IsString()
  @MaxLength(254)
  email!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(16)
  code!: string;

  @IsString()
  barcode!: string;

  @IsString()
  firstName!: string;

  @IsString()
  lastName!: string;

  @IsString()
  groupId!: string;

  @IsString()
  password!: string;
}
