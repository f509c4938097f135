export * from './ScheduleGate.js';
export * from './ConnectionManager.js';
export * from './Supervisor.js';

// Use cases
export * from './use-cases/VerifySession.js';
