import { Controller, Get, Inject, Param, UseGuards } from '@nestjs/common';
import { UserId } from '@campus-id/domain';
import { Actor, ActorGuard } from '@platform/presentation/guards/actor.guard';
import { RequestSignal } from '@platform/presentation/request-signal.decorator';
import {
  StudentQueryService,
  type StudentView,
} from '../application/student-query.service';

@Controller('students')
@UseGuards(ActorGuard)
export class StudentController {
  constructor(
    @Inject(StudentQueryService) private readonly students: StudentQueryService
  ) {}

  // declared before ':id' so "me" is not read as an id
  @Get('me')
  me(
    @Actor() actorId: UserId,
    @RequestSignal() signal: AbortSignal
  ): Promise<StudentView> {
    return this.students.get({ callerId: actorId, studentId: actorId }, signal);
  }

  @Get(':id')
  get(
    @Actor() actorId: UserId,
    @Param('id') id: string,
    @RequestSignal() signal: AbortSignal
  ): Promise<StudentView> {
    return this.students.get(
      { callerId: actorId, studentId: UserId.from(id) },
      signal
    );
  }
}
