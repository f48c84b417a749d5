import { IsString, MaxLength } from 'class-validator';

export class AcceptInvitationDto {
  @IsString()
  @MaxLength(254)
  email!: string;

  @IsString()
  barcode!: string;

  @IsString()
  username!: string;

  @IsString()
  firstName!: string;

  @IsString()
  lastName!: string;

  @IsString()
  password!: string;
}
