export const registrationEventTypes = {
  registrationStarted: 'RegistrationStarted',
  registrationVerified: 'RegistrationVerified',
  registrationFailed: 'RegistrationFailed',
  registrationCodeResent: 'RegistrationCodeResent',
  registrationCompleted: 'RegistrationCompleted',
} as const;

export type RegistrationEventType =
  (typeof registrationEventTypes)[keyof typeof registrationEventTypes];
