import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { ReconciliationEngine } from '../src/services/reconciliation.js';
import { NormalizerService } from '../src/services/normalizer.js';
import { AdvisoryInterpreter } from '../src/services/interpreter.js';
import { DEFAULT_VERIFICATION_CONFIG } from '../src/models/index.js';
import type { LineItem, LineOutcome, NormalizedInvoice } from '../src/models/index.js';
import { FIXED_NOW, loadAdvisoryReplies, loadExtraction, type ExtractionName } from './setup.js';

describe('ReconciliationEngine', () => {
  const normalizer = new NormalizerService();
  const interpreter = new AdvisoryInterpreter();
  const engine = new ReconciliationEngine();
  const replies = loadAdvisoryReplies();

  const normalize = (name: ExtractionName, id: string, edit: (raw: Record<string, unknown>) => void = () => {}): NormalizedInvoice => {
    const raw = loadExtraction(name);
    edit(raw);
    return normalizer.normalize(raw, { id }).normalized;
  };

  const answered = (item: LineItem): LineOutcome => ({
    lineItemId: item.id,
    verdict: interpreter.interpret(replies[item.description] ?? '', item).verdict,
  });

  it('reconciles the discounted single-line invoice to 82.11', () => {
    const { invoice, lineItems } = normalize('single-line-inferred-discount', 'inv-e2e');
    const { determination, auditEntry } = engine.reconcile({ invoice, lineItems, outcomes: lineItems.map(answered), verifiedAt: FIXED_NOW });

    expect(determination.status).toBe('verified');
    expect(determination.totalExpectedTax.toFixed(2)).toBe('82.11');
    expect(determination.totalActualTax.toFixed(2)).toBe('82.11');
    expect(determination.discrepancyAmount.toFixed(2)).toBe('0.00');
    expect(determination.tolerance.toFixed(2)).toBe('0.01');
    expect(determination.confidence).toBe(0.92);
    expect(determination.lines[0]?.expectedTax.toFixed(2)).toBe('82.11');
    expect(determination.notes).toEqual(['Invoice discount 2108.50 was inferred from totals']);
    expect(determination.verifiedAt).toBe(FIXED_NOW);
    expect(auditEntry.details).toBe('Invoice inv-e2e: VERIFIED, expected=82.11 actual=82.11 discrepancy=0.00');
  });

  it('takes actual tax from the invoice total when lines show none', () => {
    const { invoice, lineItems } = normalize('total-taxed', 'inv-tt');
    const { determination } = engine.reconcile({ invoice, lineItems, outcomes: lineItems.map(answered), verifiedAt: FIXED_NOW });

    expect(determination.actualTaxSource).toBe('invoice_total');
    expect(determination.totalActualTax.toFixed(2)).toBe('42.81');
    expect(determination.lines.map(l => l.expectedTax.toFixed(2))).toEqual(['35.00', '7.81']);
    expect(determination.lines.map(l => l.pattern)).toEqual(['total_taxed', 'total_taxed']);
    expect(determination.status).toBe('verified');
  });

  it('falls back to line tax amounts when the invoice declares no total tax', () => {
    const { invoice, lineItems } = normalize('total-taxed', 'inv-tt', raw => { delete raw['total_tax_amount']; });
    const { determination } = engine.reconcile({ invoice, lineItems, outcomes: lineItems.map(answered), verifiedAt: FIXED_NOW });

    expect(determination.actualTaxSource).toBe('line_items');
    expect(determination.totalActualTax.toFixed(2)).toBe('0.00');
    expect(determination.discrepancyAmount.toFixed(2)).toBe('-42.81');
    expect(determination.status).toBe('discrepancy');
  });

  it('widens the tolerance with the scaled amount setting', () => {
    const { invoice, lineItems } = normalize('single-line-inferred-discount', 'inv-e2e', raw => { raw['total_tax_amount'] = '84.00'; });
    const outcomes = lineItems.map(answered);

    const strict = engine.reconcile({ invoice, lineItems, outcomes, verifiedAt: FIXED_NOW }).determination;
    expect(strict.status).toBe('discrepancy');
    expect(strict.discrepancyAmount.toFixed(2)).toBe('1.89');

    const scaled = new ReconciliationEngine({ ...DEFAULT_VERIFICATION_CONFIG.tolerances, scaledAmount: 0.001 });
    const lenient = scaled.reconcile({ invoice, lineItems, outcomes, verifiedAt: FIXED_NOW }).determination;
    expect(lenient.tolerance.toFixed(2)).toBe('3.33');
    expect(lenient.status).toBe('verified');
  });

  it('reports partial when a line has no verdict', () => {
    const { invoice, lineItems } = normalize('three-lines', 'inv-3');
    const outcomes = lineItems.map((item): LineOutcome => item.position === 2
      ? { lineItemId: item.id, failure: { kind: 'advisory_service', message: 'Advisory call timed out after 20ms (gave up after 2 attempt(s))', attempts: 2 } }
      : answered(item));
    const { determination } = engine.reconcile({ invoice, lineItems, outcomes, verifiedAt: FIXED_NOW });

    expect(determination.status).toBe('partial');
    expect(determination.unverifiedLineItemIds).toEqual(['inv-3:2']);
    expect(determination.totalExpectedTax.toFixed(2)).toBe('3.38');
    expect(determination.totalActualTax.toFixed(2)).toBe('8.78');
    expect(determination.lines.map(l => l.contributes)).toEqual([true, false, false]);
    expect(determination.summary).toEqual({ totalItems: 3, correctItems: 2, incorrectItems: 0, correctedItems: 0, unverifiedItems: 1 });
    expect(determination.notes).toEqual([
      '1 of 3 line item(s) unverified; expected tax covers verified lines only',
      'Line 2 (Toner cartridge): advisory_service - Advisory call timed out after 20ms (gave up after 2 attempt(s))',
    ]);
    expect(determination.confidence).toBeCloseTo(0.55, 4);
  });

  it('records a line with no outcome at all as unverified', () => {
    const { invoice, lineItems } = normalize('three-lines', 'inv-3');
    const outcomes = lineItems.filter(i => i.position !== 3).map(answered);
    const { determination } = engine.reconcile({ invoice, lineItems, outcomes, verifiedAt: FIXED_NOW });

    expect(determination.status).toBe('partial');
    expect(determination.lines[2]?.failure).toEqual({ kind: 'advisory_service', message: 'No advisory outcome recorded', attempts: 0 });
  });

  it('reports error when no line could be verified', () => {
    const { invoice, lineItems } = normalize('three-lines', 'inv-3');
    const outcomes = lineItems.map((item): LineOutcome => ({
      lineItemId: item.id,
      failure: { kind: 'configuration', message: 'No knowledge base configured for state NJ', attempts: 0 },
    }));
    const { determination } = engine.reconcile({ invoice, lineItems, outcomes, verifiedAt: FIXED_NOW });

    expect(determination.status).toBe('error');
    expect(determination.notes[0]).toBe('No line item could be verified');
    expect(determination.totalExpectedTax.isZero()).toBe(true);
    expect(determination.confidence).toBe(0);
  });

  it('reports error when the invoice has no state code', () => {
    const { invoice, lineItems } = normalize('single-line-inferred-discount', 'inv-e2e', raw => { delete raw['state_code']; });
    const { determination } = engine.reconcile({ invoice, lineItems, outcomes: lineItems.map(answered), verifiedAt: FIXED_NOW });

    expect(determination.status).toBe('error');
    expect(determination.notes[0]).toBe('Invoice has no state code; tax cannot be verified');
  });

  it('counts an unknown-status line when the advisory rate is non-zero', () => {
    const { invoice, lineItems } = normalize('single-line-inferred-discount', 'inv-e2e', raw => {
      raw['line_items'] = [{
        description: 'HVAC maintenance contract', quantity: 1, line_total: '3325.00', tax_amount: 82.11, tax_rate: '6.75%', tax_status: 'unknown',
      }];
    });
    const { determination } = engine.reconcile({ invoice, lineItems, outcomes: lineItems.map(answered), verifiedAt: FIXED_NOW });

    expect(lineItems[0]?.taxStatus).toBe('unknown');
    expect(determination.lines[0]?.contributes).toBe(true);
    expect(determination.totalExpectedTax.eq(new Decimal('82.11'))).toBe(true);
  });

  it('verifies a fractional-percent rate at full precision', () => {
    const { invoice, lineItems } = normalizer.normalize({
      state_code: 'NJ',
      total_amount: 1066.25,
      total_tax_amount: 66.25,
      line_items: [{ description: 'Office chairs', line_total: 1000, tax_amount: 66.25, tax_rate: '6.625%', tax_status: 'taxable' }],
    }, { id: 'inv-frac' }).normalized;
    const outcomes = lineItems.map((item): LineOutcome => ({
      lineItemId: item.id,
      verdict: interpreter.interpret('{"is_correct": true, "confidence": 0.9, "expected_tax_rate": 0.06625}', item).verdict,
    }));
    const { determination } = engine.reconcile({ invoice, lineItems, outcomes, verifiedAt: FIXED_NOW });

    expect(lineItems[0]?.appliedTaxRate.toString()).toBe('0.06625');
    expect(determination.lines[0]?.expectedTax.toFixed(2)).toBe('66.25');
    expect(determination.discrepancyAmount.toFixed(2)).toBe('0.00');
    expect(determination.status).toBe('verified');
  });
});
