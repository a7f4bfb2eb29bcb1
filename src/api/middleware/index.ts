/**
 * Middleware for the control API
 */

export { default as logging } from './logging';
export { default as errors, BadRequestError } from './errors';
