import { EventRecorder, type RecordsEvents } from '../shared/EventRecorder';
import { ValidationError } from '../shared/errors';
import { Timestamp } from '../shared/vos/Timestamp';
import { RegistrationId } from '../registration/RegistrationId';
import { GroupId } from './GroupId';
import { UserId } from './UserId';
import { newUserProfile, type UserProfile } from './UserProfile';
import { StudentRegistered } from './events';

export type StudentSnapshot = Readonly<{
  profile: UserProfile;
  groupId: GroupId;
  registrationId: RegistrationId | null;
}>;

/**
 * Student account. Created from a completed self-registration; the
 * barcode doubles as the username.
 */
export class Student implements RecordsEvents<StudentRegistered> {
  private readonly recorder = new EventRecorder<StudentRegistered>();

  private constructor(private readonly state: StudentSnapshot) {}

  static register(params: {
    barcode: string;
    email: string;
    firstName: string;
    lastName: string;
    passwordHash: string;
    groupId: GroupId;
    registrationId: RegistrationId | null;
    registeredAt: Timestamp;
  }): Student {
    if (params.groupId.isZero()) {
      throw ValidationError.single('groupId', 'is required');
    }
    const profile = newUserProfile(
      'student',
      {
        barcode: params.barcode,
        username: params.barcode,
        email: params.email,
        firstName: params.firstName,
        lastName: params.lastName,
        passwordHash: params.passwordHash,
      },
      params.registeredAt
    );

    const student = new Student({
      profile,
      groupId: params.groupId,
      registrationId: params.registrationId,
    });
    student.recorder.record(
      new StudentRegistered({
        userId: profile.id,
        barcode: profile.barcode,
        email: profile.email,
        firstName: profile.firstName,
        lastName: profile.lastName,
        groupId: params.groupId,
        registrationId: params.registrationId,
        registeredAt: params.registeredAt,
      })
    );
    return student;
  }

  static rehydrate(snapshot: StudentSnapshot): Student {
    return new Student(snapshot);
  }

  get id(): UserId {
    return this.state.profile.id;
  }

  get profile(): UserProfile {
    return this.state.profile;
  }

  get groupId(): GroupId {
    return this.state.groupId;
  }

  get registrationId(): RegistrationId | null {
    return this.state.registrationId;
  }

  toSnapshot(): StudentSnapshot {
    return this.state;
  }

  getUncommittedEvents(): ReadonlyArray<StudentRegistered> {
    return this.recorder.getUncommittedEvents();
  }

  markEventsAsCommitted(): void {
    this.recorder.clear();
  }
}
