import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  Student,
  registrationEventTypes,
  type RegistrationCompleted,
} from '@campus-id/domain';
import {
  defineEventHandler,
  type EventHandler,
} from '@platform/application/events/event-handler';
import { Clock } from '@platform/application/ports/clock';
import { OutboxPublisher } from '@platform/application/ports/outbox-publisher';
import { TransactionRunner } from '@platform/application/ports/transaction-runner';
import { saveAggregate } from '@platform/infrastructure/persistence/aggregate-persistence';
import { redactEmail } from '@platform/logging/redact';
import { StudentRepository } from './ports/student-repository';
import { UserDirectory } from './ports/user-directory';

export const CREATE_STUDENT_HANDLER = 'users.create-student';

/**
 * Creates the student account once a registration completes.
 *
 * Redelivery is expected: a registration that already produced a student,
 * or an email that already belongs to a user, is skipped.
 */
@Injectable()
export class StudentRegistrationHandler<Tx = unknown> {
  private readonly logger = new Logger(StudentRegistrationHandler.name);

  constructor(
    @Inject(TransactionRunner) private readonly runner: TransactionRunner<Tx>,
    @Inject(OutboxPublisher) private readonly outbox: OutboxPublisher<Tx>,
    @Inject(StudentRepository)
    private readonly students: StudentRepository<Tx>,
    @Inject(UserDirectory) private readonly users: UserDirectory<Tx>,
    @Inject(Clock) private readonly clock: Clock
  ) {}

  asEventHandler(): EventHandler {
    return defineEventHandler(
      CREATE_STUDENT_HANDLER,
      registrationEventTypes.registrationCompleted,
      (event, signal) => this.handle(event, signal)
    );
  }

  async handle(
    event: RegistrationCompleted,
    signal?: AbortSignal
  ): Promise<void> {
    const { existing, conflict } = await this.runner.run(async (tx) => ({
      existing: await this.students.findByRegistration(
        tx,
        event.registrationId
      ),
      conflict: await this.users.findConflict(tx, { email: event.email }),
    }));

    if (existing) {
      this.logger.debug(
        `Registration ${event.registrationId.value} already has student ${existing.id.value}`
      );
      return;
    }
    if (conflict) {
      this.logger.warn(
        `Skipping student creation for ${redactEmail(event.email)}: email already registered`
      );
      return;
    }

    const student = Student.register({
      barcode: event.barcode,
      email: event.email,
      firstName: event.firstName,
      lastName: event.lastName,
      passwordHash: event.passwordHash,
      groupId: event.groupId,
      registrationId: event.registrationId,
      registeredAt: this.clock.now(),
    });

    await saveAggregate(
      { runner: this.runner, outbox: this.outbox },
      {
        aggregate: student,
        write: (tx, aggregate) => this.students.insert(tx, aggregate),
        signal,
      }
    );
    this.logger.log(
      `Student ${student.id.value} created from registration ${event.registrationId.value}`
    );
  }
}
