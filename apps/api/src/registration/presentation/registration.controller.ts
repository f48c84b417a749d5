import {
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Post,
} from '@nestjs/common';
import { RequestSignal } from '@platform/presentation/request-signal.decorator';
import { ValidBody } from '@platform/presentation/validation.pipe';
import {
  RegistrationService,
  type RegistrationView,
} from '../application/registration.service';
import { CompleteRegistrationDto } from './dto/CompleteRegistrationDto';
import { StartRegistrationDto } from './dto/StartRegistrationDto';
import { VerifyCodeDto } from './dto/VerifyCodeDto';

@Controller('registrations/students')
export class RegistrationController {
  constructor(
    @Inject(RegistrationService)
    private readonly registrations: RegistrationService
  ) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  start(
    @ValidBody(StartRegistrationDto) dto: StartRegistrationDto,
    @RequestSignal() signal: AbortSignal
  ): Promise<RegistrationView> {
    return this.registrations.startStudentRegistration(
      { email: dto.email },
      signal
    );
  }

  @Post('verify')
  @HttpCode(HttpStatus.OK)
  verify(
    @ValidBody(VerifyCodeDto) dto: VerifyCodeDto,
    @RequestSignal() signal: AbortSignal
  ): Promise<RegistrationView> {
    return this.registrations.verifyCode(
      { email: dto.email, code: dto.code },
      signal
    );
  }

  @Post('resend')
  @HttpCode(HttpStatus.ACCEPTED)
  resend(
    @ValidBody(StartRegistrationDto) dto: StartRegistrationDto,
    @RequestSignal() signal: AbortSignal
  ): Promise<RegistrationView> {
    return this.registrations.resendCode({ email: dto.email }, signal);
  }

  @Post('complete')
  complete(
    @ValidBody(CompleteRegistrationDto) dto: CompleteRegistrationDto,
    @RequestSignal() signal: AbortSignal
  ): Promise<RegistrationView> {
    return this.registrations.completeStudentRegistration(dto, signal);
  }
}
