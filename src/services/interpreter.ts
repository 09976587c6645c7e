//AdvisoryInterpreter: turns an advisory reply into a TaxVerdict the rest of the pipeline can trust
//the reply's own verdict is only a starting point; the rate comparison always has the last word
import { Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { z } from 'zod';
import type { AuditEntry, ContradictionDetected, LineItem, TaxVerdict } from '../models/index.js';
import { AdvisoryParseError, DEFAULT_VERIFICATION_CONFIG } from '../models/index.js';
import { extractJsonObject } from './json.js';
import { formatRate, isZero, parseRate, withinTolerance } from './money.js';

const AdvisoryReplySchema = z.object({
  is_correct: z.union([z.boolean(), z.string()]),
  confidence: z.union([z.number(), z.string()]).optional(),
  expected_tax_rate: z.union([z.number(), z.string()]),
  reasoning: z.string().optional(),
});

type AdvisoryReply = z.infer<typeof AdvisoryReplySchema>;

export interface InterpretResult {
  verdict: TaxVerdict;
  auditEntry: AuditEntry;
}

export interface IAdvisoryInterpreter {
  interpret(reply: string, item: LineItem): InterpretResult;
}

const PERCENT_MENTION = /(\d+(?:\.\d+)?)\s*%/g;
const CALLS_DIFFERENT = /\b(?:does not match|doesn't match|do not match|don't match|not matching|mismatch(?:ed)?|differs?|different|not equal|not the same|discrepanc(?:y|ies)|inconsistent)\b/i;
const NEGATED_EXEMPTION = /\b(?:not|isn't|is not|no|never)\s+(?:tax[- ]?)?(?:exempt(?:ion)?|non-?taxable)\b/gi;
const ASSERTS_EXEMPTION = /\b(?:exempt(?:ion|ed)?|non-?taxable|not taxable|not subject to (?:sales )?tax)\b/i;

//two percentages that are the same number written with different precision, e.g. "6.75%" and "6.7500%"
export function findPrecisionMismatch(reasoning: string): [string, string] | null {
  const mentions = [...reasoning.matchAll(PERCENT_MENTION)].map(m => m[1] ?? '');
  for (let i = 0; i < mentions.length; i++) {
    for (let j = i + 1; j < mentions.length; j++) {
      const [a, b] = [mentions[i] ?? '', mentions[j] ?? ''];
      if (a !== b && new Decimal(a).eq(b)) return [`${a}%`, `${b}%`];
    }
  }
  return null;
}

export function assertsExemption(reasoning: string): boolean {
  return ASSERTS_EXEMPTION.test(reasoning.replace(NEGATED_EXEMPTION, ''));
}

export class AdvisoryInterpreter implements IAdvisoryInterpreter {
  private readonly logger = new Logger(AdvisoryInterpreter.name);

  constructor(private readonly rateTolerance: number = DEFAULT_VERIFICATION_CONFIG.tolerances.rate) {}

  interpret(reply: string, item: LineItem): InterpretResult {
    const parsed = this.parse(reply);
    const applied = item.appliedTaxRate;
    const reported = this.rate(parsed.expected_tax_rate, reply);
    const reasoning = (parsed.reasoning ?? '').trim();
    const corrections: ContradictionDetected[] = [];

    let isCorrect = this.bool(parsed.is_correct, reply);
    let effective = reported;

    //1. reasoning calls equal rates different only because of trailing zeros
    const mismatch = findPrecisionMismatch(reasoning);
    if (mismatch && !isCorrect && CALLS_DIFFERENT.test(reasoning) && withinTolerance(reported, applied, this.rateTolerance)) {
      isCorrect = true;
      corrections.push({
        kind: 'precision_mismatch', field: 'is_correct', originalValue: 'false', correctedValue: 'true',
        note: `${mismatch[0]} and ${mismatch[1]} are the same rate; expected ${formatRate(reported)} equals applied ${formatRate(applied)}`,
      });
    }

    //2. a zero expected rate on a non-exempt, taxed line without a stated exemption is an advisory slip
    if (isZero(reported, this.rateTolerance) && item.taxStatus !== 'exempt' && applied.gt(this.rateTolerance) && !assertsExemption(reasoning)) {
      effective = applied;
      corrections.push({
        kind: 'zero_rate_override', field: 'expected_tax_rate', originalValue: formatRate(reported), correctedValue: formatRate(applied),
        note: `Expected rate 0 without a stated exemption on a ${item.taxStatus} line; using applied rate ${formatRate(applied)}`,
      });
      if (!isCorrect) {
        isCorrect = true;
        corrections.push({
          kind: 'zero_rate_override', field: 'is_correct', originalValue: 'false', correctedValue: 'true',
          note: 'Verdict relied on the zero expected rate',
        });
      }
    }

    //3. unconditional: rates that differ are never correct
    if (!withinTolerance(effective, applied, this.rateTolerance) && isCorrect) {
      isCorrect = false;
      corrections.push({
        kind: 'rate_mismatch_enforced', field: 'is_correct', originalValue: 'true', correctedValue: 'false',
        note: `Expected rate ${formatRate(effective)} differs from applied rate ${formatRate(applied)}`,
      });
    }

    for (const c of corrections) {
      this.logger.warn(`Line ${item.id}: ${c.kind} ${c.field} ${c.originalValue} -> ${c.correctedValue} (${c.note})`);
    }

    const verdict: TaxVerdict = {
      lineItemId: item.id,
      isCorrect,
      confidence: this.confidence(parsed.confidence),
      expectedTaxRate: reported,
      effectiveExpectedRate: effective,
      appliedTaxRate: applied,
      reasoning: [reasoning, ...corrections.map(c => `[auto-corrected ${c.kind}] ${c.note}`)].filter(Boolean).join('\n'),
      contradictionCorrected: corrections.length > 0,
      corrections,
    };

    return {
      verdict,
      auditEntry: {
        step: 'interpret',
        timestamp: new Date().toISOString(),
        details: `Line ${item.id}: ${isCorrect ? 'CORRECT' : 'INCORRECT'}, expected=${formatRate(effective)} applied=${formatRate(applied)}, corrections=${corrections.length}`,
      },
    };
  }

  private parse(reply: string): AdvisoryReply {
    const json = extractJsonObject(reply);
    if (!json) throw new AdvisoryParseError('Advisory reply contains no JSON object', reply);
    const result = AdvisoryReplySchema.safeParse(json);
    if (!result.success) {
      throw new AdvisoryParseError(`Advisory reply has an unexpected shape: ${result.error.issues.map(i => `${i.path.join('.')} ${i.message}`).join('; ')}`, reply, { cause: result.error });
    }
    return result.data;
  }

  private bool(value: boolean | string, reply: string): boolean {
    if (typeof value === 'boolean') return value;
    const v = value.trim().toLowerCase();
    if (v === 'true' || v === 'yes') return true;
    if (v === 'false' || v === 'no') return false;
    throw new AdvisoryParseError(`is_correct is not a boolean: ${value}`, reply);
  }

  private rate(value: number | string, reply: string): Decimal {
    const parsed = parseRate(value);
    if (parsed === null || parsed.isNegative()) throw new AdvisoryParseError(`expected_tax_rate is not a rate: ${String(value)}`, reply);
    return parsed;
  }

  private confidence(value: number | string | undefined): number {
    const n = typeof value === 'string' ? Number.parseFloat(value) : value ?? 0;
    return Number.isFinite(n) ? Math.max(0, Math.min(1, n)) : 0;
  }
}
