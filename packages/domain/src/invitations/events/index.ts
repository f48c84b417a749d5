import type { StaffInvitationCreated } from './StaffInvitationCreated';
import type { StaffInvitationRecipientsUpdated } from './StaffInvitationRecipientsUpdated';
import type { StaffInvitationValidityUpdated } from './StaffInvitationValidityUpdated';
import type { StaffInvitationDeleted } from './StaffInvitationDeleted';

export * from './eventTypes';
export * from './StaffInvitationCreated';
export * from './StaffInvitationRecipientsUpdated';
export * from './StaffInvitationValidityUpdated';
export * from './StaffInvitationDeleted';

export type StaffInvitationEvent =
  | StaffInvitationCreated
  | StaffInvitationRecipientsUpdated
  | StaffInvitationValidityUpdated
  | StaffInvitationDeleted;
