/**
 * Audit log exports
 */

export * from './audit-log';
