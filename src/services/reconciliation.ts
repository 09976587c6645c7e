//ReconciliationEngine: folds line verdicts and invoice totals into one determination
//pure: same inputs and timestamp always give the same determination
import Decimal from 'decimal.js';
import type {
  AuditEntry, DeterminationStatus, Invoice, InvoiceTaxDetermination, LineItem, LineOutcome,
  LineVerification, ToleranceConfig,
} from '../models/index.js';
import { DEFAULT_VERIFICATION_CONFIG } from '../models/index.js';
import { classifyTaxDisplayPattern } from './prompt-builder.js';
import { ZERO, formatAmount, isZero, roundAmount, sum, withinTolerance } from './money.js';

export interface ReconcileInput {
  invoice: Invoice;
  lineItems: LineItem[];
  outcomes: LineOutcome[];
  verifiedAt: Date;
}

export interface ReconcileResult {
  determination: InvoiceTaxDetermination;
  auditEntry: AuditEntry;
}

export interface IReconciliationEngine {
  reconcile(input: ReconcileInput): ReconcileResult;
}

export class ReconciliationEngine implements IReconciliationEngine {
  constructor(private readonly tolerances: ToleranceConfig = DEFAULT_VERIFICATION_CONFIG.tolerances) {}

  reconcile({ invoice, lineItems, outcomes, verifiedAt }: ReconcileInput): ReconcileResult {
    const byLine = new Map(outcomes.map(o => [o.lineItemId, o]));
    const notes: string[] = [];

    const lines: LineVerification[] = lineItems.map(item => {
      const outcome = byLine.get(item.id);
      const verdict = outcome?.verdict ?? null;
      const failure = outcome?.failure ?? (verdict ? null : { kind: 'advisory_service' as const, message: 'No advisory outcome recorded', attempts: 0 });
      //unknown-status lines count when the advisory service says they should have been taxed
      const contributes = verdict !== null && (item.taxStatus === 'taxable' || !isZero(verdict.effectiveExpectedRate, this.tolerances.rate));
      return {
        lineItemId: item.id,
        position: item.position,
        description: item.description,
        pattern: classifyTaxDisplayPattern(item, invoice),
        discountedAmount: item.discountedAmount,
        contributes,
        expectedTax: contributes && verdict ? roundAmount(item.discountedAmount.times(verdict.effectiveExpectedRate)) : ZERO,
        verdict,
        failure,
      };
    });

    const totalExpectedTax = sum(lines.map(l => l.expectedTax));

    //total-taxed invoices show zero on every line, so a declared total wins
    const declaredTotal = invoice.totalTaxAmount;
    const useInvoiceTotal = declaredTotal !== null && !declaredTotal.isZero();
    const totalActualTax = useInvoiceTotal ? declaredTotal : roundAmount(sum(lineItems.map(i => i.appliedTaxAmount)));

    const tolerance = Decimal.max(this.tolerances.amount, roundAmount(invoice.subtotal.times(this.tolerances.scaledAmount)));
    const verified = lines.filter(l => l.verdict !== null);
    const unverified = lines.filter(l => l.verdict === null);

    let status: DeterminationStatus;
    if (!invoice.stateCode) {
      status = 'error';
      notes.push('Invoice has no state code; tax cannot be verified');
    } else if (verified.length === 0) {
      status = 'error';
      notes.push('No line item could be verified');
    } else if (unverified.length > 0) {
      status = 'partial';
      notes.push(`${unverified.length} of ${lines.length} line item(s) unverified; expected tax covers verified lines only`);
    } else {
      status = withinTolerance(totalExpectedTax, totalActualTax, tolerance) ? 'verified' : 'discrepancy';
    }
    for (const l of unverified) notes.push(`Line ${l.position} (${l.description}): ${l.failure?.kind ?? 'unverified'} - ${l.failure?.message ?? ''}`);
    if (invoice.discountSource === 'inferred') notes.push(`Invoice discount ${formatAmount(invoice.invoiceDiscountAmount)} was inferred from totals`);

    const correct = verified.filter(l => l.verdict?.isCorrect).length;
    const meanConfidence = verified.length ? verified.reduce((acc, l) => acc + (l.verdict?.confidence ?? 0), 0) / verified.length : 0;
    const coverage = lines.length ? verified.length / lines.length : 0;

    const determination: InvoiceTaxDetermination = {
      invoiceId: invoice.id,
      status,
      totalExpectedTax,
      totalActualTax,
      actualTaxSource: useInvoiceTotal ? 'invoice_total' : 'line_items',
      discrepancyAmount: totalActualTax.minus(totalExpectedTax),
      tolerance,
      confidence: Math.round(meanConfidence * coverage * 10_000) / 10_000,
      lines,
      unverifiedLineItemIds: unverified.map(l => l.lineItemId),
      summary: {
        totalItems: lines.length,
        correctItems: correct,
        incorrectItems: verified.length - correct,
        correctedItems: verified.filter(l => l.verdict?.contradictionCorrected).length,
        unverifiedItems: unverified.length,
      },
      notes,
      verifiedAt,
    };

    return {
      determination,
      auditEntry: {
        step: 'reconcile',
        timestamp: verifiedAt.toISOString(),
        details: `Invoice ${invoice.id}: ${status.toUpperCase()}, expected=${formatAmount(totalExpectedTax)} actual=${formatAmount(totalActualTax)} discrepancy=${formatAmount(determination.discrepancyAmount)}`,
      },
    };
  }
}
