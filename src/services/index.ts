/**
 * Services - Main Export
 */

export { AuthService } from './auth.service.js';
export { CommerceService } from './commerce.service.js';
