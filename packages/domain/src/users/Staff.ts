import { EventRecorder, type RecordsEvents } from '../shared/EventRecorder';
import { Timestamp } from '../shared/vos/Timestamp';
import { StaffInvitationId } from '../invitations/StaffInvitationId';
import { UserId } from './UserId';
import { newUserProfile, type UserProfile } from './UserProfile';
import { StaffRegistered } from './events';

export type StaffSnapshot = Readonly<{
  profile: UserProfile;
  invitationId: StaffInvitationId | null;
}>;

/**
 * Staff account, created by accepting a staff invitation.
 */
export class Staff implements RecordsEvents<StaffRegistered> {
  private readonly recorder = new EventRecorder<StaffRegistered>();

  private constructor(private readonly state: StaffSnapshot) {}

  static register(params: {
    barcode: string;
    username: string;
    email: string;
    firstName: string;
    lastName: string;
    passwordHash: string;
    invitationId: StaffInvitationId;
    registeredAt: Timestamp;
  }): Staff {
    const profile = newUserProfile(
      'staff',
      {
        barcode: params.barcode,
        username: params.username,
        email: params.email,
        firstName: params.firstName,
        lastName: params.lastName,
        passwordHash: params.passwordHash,
      },
      params.registeredAt
    );

    const staff = new Staff({ profile, invitationId: params.invitationId });
    staff.recorder.record(
      new StaffRegistered({
        userId: profile.id,
        barcode: profile.barcode,
        username: profile.username,
        email: profile.email,
        firstName: profile.firstName,
        lastName: profile.lastName,
        invitationId: params.invitationId,
        registeredAt: params.registeredAt,
      })
    );
    return staff;
  }

  static rehydrate(snapshot: StaffSnapshot): Staff {
    return new Staff(snapshot);
  }

  get id(): UserId {
    return this.state.profile.id;
  }

  get profile(): UserProfile {
    return this.state.profile;
  }

  get invitationId(): StaffInvitationId | null {
    return this.state.invitationId;
  }

  toSnapshot(): StaffSnapshot {
    return this.state;
  }

  getUncommittedEvents(): ReadonlyArray<StaffRegistered> {
    return this.recorder.getUncommittedEvents();
  }

  markEventsAsCommitted(): void {
    this.recorder.clear();
  }
}
