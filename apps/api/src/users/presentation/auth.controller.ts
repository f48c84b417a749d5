import { Controller, HttpCode, HttpStatus, Inject, Post } from '@nestjs/common';
import { RequestSignal } from '@platform/presentation/request-signal.decorator';
import { ValidBody } from '@platform/presentation/validation.pipe';
import {
  CredentialService,
  type AuthenticatedUser,
} from '../application/credential.service';
import { LoginDto } from './dto/LoginDto';

@Controller('auth')
export class AuthController {
  constructor(
    @Inject(CredentialService) private readonly credentials: CredentialService
  ) {}

  @Post('login')
  @HttpCode(HttpStatus.OK)
  login(
    @ValidBody(LoginDto) dto: LoginDto,
    @RequestSignal() signal: AbortSignal
  ): Promise<AuthenticatedUser> {
    return this.credentials.verify(
      { login: dto.login, password: dto.password },
      signal
    );
  }
}
