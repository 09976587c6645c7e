import 'dotenv/config';
import joi from 'joi';

interface EnvVars {
  OPENAI_API_KEY: string;
  OPENAI_BASE_URL?: string;
  OPENAI_MODEL: string;
  ADVISORY_TIMEOUT_MS: number;
  ADVISORY_MAX_RETRIES: number;
  ADVISORY_RETRY_BASE_DELAY_MS: number;
  ADVISORY_CONCURRENCY: number;
  KNOWLEDGE_BASES: Record<string, string>;
  DATABASE_PATH: string;
  AMOUNT_TOLERANCE: number;
  ROUNDING_TOLERANCE: number;
  RATE_TOLERANCE: number;
  SCALED_AMOUNT_TOLERANCE: number;
}

const envSchema = joi
  .object<EnvVars>({
    OPENAI_API_KEY: joi.string().required(),
    OPENAI_BASE_URL: joi.string().uri().optional(),
    OPENAI_MODEL: joi.string().default('gpt-4o-mini'),
    ADVISORY_TIMEOUT_MS: joi.number().integer().min(1).default(30000),
    ADVISORY_MAX_RETRIES: joi.number().integer().min(0).default(3),
    ADVISORY_RETRY_BASE_DELAY_MS: joi.number().integer().min(0).default(500),
    ADVISORY_CONCURRENCY: joi.number().integer().min(1).default(4),
    KNOWLEDGE_BASES: joi
      .object()
      .pattern(joi.string().pattern(/^[A-Z]{2}$/, { name: 'state code' }), joi.string().min(1))
      .default({}),
    DATABASE_PATH: joi.string().default('./data/verifier.db'),
    AMOUNT_TOLERANCE: joi.number().min(0).default(0.01),
    ROUNDING_TOLERANCE: joi.number().min(0).default(0.02),
    RATE_TOLERANCE: joi.number().min(0).default(0.0001),
    SCALED_AMOUNT_TOLERANCE: joi.number().min(0).max(1).default(0),
  })
  .unknown(true);

//"NJ=vs_abc, ca=vs_def" -> { NJ: 'vs_abc', CA: 'vs_def' }
export function parseKnowledgeBases(value: string | undefined): Record<string, string> | undefined {
  if (!value) return undefined;
  return Object.fromEntries(
    value.split(',').map(pair => pair.trim()).filter(Boolean).map(pair => {
      const [state = '', id = ''] = pair.split('=').map(part => part.trim());
      return [state.toUpperCase(), id];
    }),
  );
}

const { error, value } = envSchema.validate({
  ...process.env,
  KNOWLEDGE_BASES: parseKnowledgeBases(process.env['KNOWLEDGE_BASES']),
});

if (error) {
  throw new Error(`Config validation error: ${error.message}`);
}

const envVars = value as EnvVars;

export const envs = {
  openAiApiKey: envVars.OPENAI_API_KEY,
  openAiBaseUrl: envVars.OPENAI_BASE_URL,
  openAiModel: envVars.OPENAI_MODEL,
  advisoryTimeoutMs: envVars.ADVISORY_TIMEOUT_MS,
  advisoryMaxRetries: envVars.ADVISORY_MAX_RETRIES,
  advisoryRetryBaseDelayMs: envVars.ADVISORY_RETRY_BASE_DELAY_MS,
  advisoryConcurrency: envVars.ADVISORY_CONCURRENCY,
  knowledgeBases: envVars.KNOWLEDGE_BASES,
  databasePath: envVars.DATABASE_PATH,
  amountTolerance: envVars.AMOUNT_TOLERANCE,
  roundingTolerance: envVars.ROUNDING_TOLERANCE,
  rateTolerance: envVars.RATE_TOLERANCE,
  scaledAmountTolerance: envVars.SCALED_AMOUNT_TOLERANCE,
};

export type Envs = typeof envs;
