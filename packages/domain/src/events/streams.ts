/**
 * Outbox stream names. Each aggregate type publishes to exactly one stream.
 */
export const streams = {
  registration: 'events_registration',
  staffInvitation: 'events_staff_invitation',
  student: 'events_student',
  staff: 'events_staff',
} as const;

export type StreamName = (typeof streams)[keyof typeof streams];
