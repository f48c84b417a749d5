// Shared kernel
export * from './shared/errors';
export * from './shared/validation';
export * from './shared/DomainEvent';
export * from './shared/EventRecorder';
export * from './shared/TracingCarrier';
export * from './shared/vos/ValueObject';
export * from './shared/vos/Identifier';
export * from './shared/vos/EventId';
export * from './shared/vos/Timestamp';
export * from './utils/uuid';
export * from './utils/randomCode';

// Event catalog
export * from './events';

// Registration
export * from './registration/RegistrationId';
export * from './registration/Registration';
export * from './registration/events';

// Staff invitations
export * from './invitations/StaffInvitationId';
export * from './invitations/StaffInvitation';
export * from './invitations/events';

// Users
export * from './users/UserId';
export * from './users/GroupId';
export * from './users/UserProfile';
export * from './users/Student';
export * from './users/Staff';
export * from './users/events';
