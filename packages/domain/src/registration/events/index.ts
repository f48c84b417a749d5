import type { RegistrationStarted } from './RegistrationStarted';
import type { RegistrationVerified } from './RegistrationVerified';
import type { RegistrationFailed } from './RegistrationFailed';
import type { RegistrationCodeResent } from './RegistrationCodeResent';
import type { RegistrationCompleted } from './RegistrationCompleted';

export * from './eventTypes';
export * from './RegistrationStarted';
export * from './RegistrationVerified';
export * from './RegistrationFailed';
export * from './RegistrationCodeResent';
export * from './RegistrationCompleted';

export type RegistrationEvent =
  | RegistrationStarted
  | RegistrationVerified
  | RegistrationFailed
  | RegistrationCodeResent
  | RegistrationCompleted;
