import {
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Param,
  Patch,
  Post,
  UseGuards,
} from '@nestjs/common';
import { StaffInvitationId, Timestamp, type UserId } from '@campus-id/domain';
import { Actor, ActorGuard } from '@platform/presentation/guards/actor.guard';
import { RequestSignal } from '@platform/presentation/request-signal.decorator';
import { ValidBody } from '@platform/presentation/validation.pipe';
import {
  StaffInvitationService,
  type StaffInvitationView,
} from '../application/staff-invitation.service';
import { StaffRegistrationService } from '../application/staff-registration.service';
import { AcceptInvitationDto } from './dto/AcceptInvitationDto';
import { CreateInvitationDto } from './dto/CreateInvitationDto';
import { UpdateRecipientsDto } from './dto/UpdateRecipientsDto';
import { UpdateValidityDto } from './dto/UpdateValidityDto';

const toTimestamp = (value: string | null | undefined): Timestamp | null =>
  value ? Timestamp.fromISOString(value) : null;

@Controller('staff/invitations')
export class StaffInvitationController {
  constructor(
    @Inject(StaffInvitationService)
    private readonly invitations: StaffInvitationService,
    @Inject(StaffRegistrationService)
    private readonly registrations: StaffRegistrationService
  ) {}

  @Post()
  @UseGuards(ActorGuard)
  create(
    @Actor() actorId: UserId,
    @ValidBody(CreateInvitationDto) dto: CreateInvitationDto,
    @RequestSignal() signal: AbortSignal
  ): Promise<StaffInvitationView> {
    return this.invitations.create(
      {
        creatorId: actorId,
        recipientsEmail: dto.recipientsEmail,
        validFrom: toTimestamp(dto.validFrom),
        validUntil: toTimestamp(dto.validUntil),
      },
      signal
    );
  }

  @Get(':id')
  @UseGuards(ActorGuard)
  get(
    @Actor() actorId: UserId,
    @Param('id') id: string,
    @RequestSignal() signal: AbortSignal
  ): Promise<StaffInvitationView> {
    return this.invitations.get(
      { callerId: actorId, invitationId: StaffInvitationId.from(id) },
      signal
    );
  }

  @Patch(':id/recipients')
  @UseGuards(ActorGuard)
  updateRecipients(
    @Actor() actorId: UserId,
    @Param('id') id: string,
    @ValidBody(UpdateRecipientsDto) dto: UpdateRecipientsDto,
    @RequestSignal() signal: AbortSignal
  ): Promise<StaffInvitationView> {
    return this.invitations.updateRecipients(
      {
        callerId: actorId,
        invitationId: StaffInvitationId.from(id),
        recipientsEmail: dto.recipientsEmail,
      },
      signal
    );
  }

  @Patch(':id/validity')
  @UseGuards(ActorGuard)
  updateValidity(
    @Actor() actorId: UserId,
    @Param('id') id: string,
    @ValidBody(UpdateValidityDto) dto: UpdateValidityDto,
    @RequestSignal() signal: AbortSignal
  ): Promise<StaffInvitationView> {
    return this.invitations.updateValidity(
      {
        callerId: actorId,
        invitationId: StaffInvitationId.from(id),
        validFrom: toTimestamp(dto.validFrom),
        validUntil: toTimestamp(dto.validUntil),
      },
      signal
    );
  }

  @Delete(':id')
  @UseGuards(ActorGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  async delete(
    @Actor() actorId: UserId,
    @Param('id') id: string,
    @RequestSignal() signal: AbortSignal
  ): Promise<void> {
    await this.invitations.delete(
      { callerId: actorId, invitationId: StaffInvitationId.from(id) },
      signal
    );
  }

  @Post(':code/accept')
  accept(
    @Param('code') code: string,
    @ValidBody(AcceptInvitationDto) dto: AcceptInvitationDto,
    @RequestSignal() signal: AbortSignal
  ): Promise<{ userId: string }> {
    return this.registrations.acceptInvitation({ ...dto, code }, signal);
  }
}
