import type { VerificationConfig } from '../models/index.js';

//the subset of validated environment the verifier needs
export interface VerificationEnvs {
  openAiModel: string;
  advisoryTimeoutMs: number;
  advisoryMaxRetries: number;
  advisoryRetryBaseDelayMs: number;
  advisoryConcurrency: number;
  knowledgeBases: Record<string, string>;
  amountTolerance: number;
  roundingTolerance: number;
  rateTolerance: number;
  scaledAmountTolerance: number;
}

export function buildVerificationConfig(env: VerificationEnvs): VerificationConfig {
  return {
    tolerances: {
      amount: env.amountTolerance,
      rounding: env.roundingTolerance,
      rate: env.rateTolerance,
      scaledAmount: env.scaledAmountTolerance,
    },
    advisory: {
      model: env.openAiModel,
      timeoutMs: env.advisoryTimeoutMs,
      maxRetries: env.advisoryMaxRetries,
      baseDelayMs: env.advisoryRetryBaseDelayMs,
      concurrency: env.advisoryConcurrency,
    },
    knowledgeBases: { ...env.knowledgeBases },
  };
}
