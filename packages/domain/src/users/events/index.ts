export * from './eventTypes';
export * from './StudentRegistered';
export * from './StaffRegistered';
