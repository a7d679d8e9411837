/**
 * Authentication service exports
 */

export { ServiceAccountAuth, type ServiceAccountCredentials } from './ServiceAccountAuth';
