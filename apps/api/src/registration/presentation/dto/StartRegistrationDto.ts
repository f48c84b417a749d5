import { IsString, MaxLength } from 'class-validator';

export class StartRegistrationDto {
  @IsString()
  @MaxLength(254)
  email!: string;
}
