/**
 * Invoice Tax Verifier
 *
 * Checks the sales tax charged on extracted invoices against the guidance of a
 * per-state knowledge base, and records one determination per invoice.
 */

export * from './models/index.js';
export * from './services/index.js';
export * from './repository/index.js';
export { buildVerificationConfig, type VerificationEnvs } from './config/verification-config.js';
