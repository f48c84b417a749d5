export const staffInvitationEventTypes = {
  staffInvitationCreated: 'StaffInvitationCreated',
  staffInvitationRecipientsUpdated: 'StaffInvitationRecipientsUpdated',
  staffInvitationValidityUpdated: 'StaffInvitationValidityUpdated',
  staffInvitationDeleted: 'StaffInvitationDeleted',
} as const;

export type StaffInvitationEventType =
  (typeof staffInvitationEventTypes)[keyof typeof staffInvitationEventTypes];
