//public API for the tax verification services
//the orchestrator is the entry point; the stages are exported for callers that run them on their own

export { AMOUNT_DP, RATE_DP, parseDecimal, roundAmount, roundRate, parseRate, formatAmount, formatRate, formatPercent } from './money.js';
export { extractJsonObject } from './json.js';
export { NormalizerService, allocateInvoiceDiscount, type INormalizerService, type NormalizeOptions, type NormalizeResult } from './normalizer.js';
export { PromptBuilder, classifyTaxDisplayPattern, type IPromptBuilder, type AdvisoryQuery } from './prompt-builder.js';
export { AdvisoryInterpreter, findPrecisionMismatch, assertsExemption, type IAdvisoryInterpreter, type InterpretResult } from './interpreter.js';
export { ReconciliationEngine, type IReconciliationEngine, type ReconcileInput, type ReconcileResult } from './reconciliation.js';
export { withRetry, isRetryable, type RetryPolicy, type RetryOutcome, type RetryHook } from './retry.js';
export { mapBounded } from './pool.js';
export { OpenAiAdvisoryClient, toAdvisoryError, type IAdvisoryClient, type AdvisoryRequest, type OpenAiAdvisoryClientOptions } from './advisory-client.js';
export { VerificationOrchestrator, type IVerificationOrchestrator, type OrchestratorOptions, type VerificationResult } from './orchestrator.js';
