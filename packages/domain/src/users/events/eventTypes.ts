export const userEventTypes = {
  studentRegistered: 'StudentRegistered',
  staffRegistered: 'StaffRegistered',
} as const;

export type UserEventType =
  (typeof userEventTypes)[keyof typeof userEventTypes];
