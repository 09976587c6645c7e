export { openVerifierDatabase, closeVerifierDatabase } from './database.js';
export { VerificationRepository, type IVerificationRepository, type StoredAuditEntry } from './verification-repository.js';
