/**
 * Middleware Barrel Export
 */

export { servicesMiddleware } from './services.js';
export { requestLoggerMiddleware } from './request-logger.js';
export { bodyParserMiddleware } from './body-parser.js';
