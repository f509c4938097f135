// Entities
export * from './entities/ScheduleWindow.js';
export * from './entities/SessionMessage.js';

// Errors
export * from './errors.js';

// Ports
export * from './ports/ILogger.js';
export * from './ports/IEndpointCache.js';
export * from './ports/ISessionTransport.js';
export * from './ports/IConnectionManager.js';
export * from './ports/ISessionAuthClient.js';
