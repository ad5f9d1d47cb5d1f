/**
 * REST API module for the idlestop daemon
 *
 * Exposes activity reporting and monitor status over HTTP.
 */

// Server and service layer
export { createExpressApp, startServer, stopServer } from './server.js';
export type { MonitorServiceLayer } from './server.js';

// Middleware
export { createAuthMiddleware } from './middleware/auth.js';
export { errorHandler, notFoundHandler, APIError } from './middleware/error.js';
export type { ErrorResponse } from './middleware/error.js';

// Route handlers
export { createActivityRouter } from './routes/activity.js';
export { createStatusRouter } from './routes/status.js';
