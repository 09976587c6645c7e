import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { AdvisoryInterpreter, assertsExemption, findPrecisionMismatch } from '../src/services/interpreter.js';
import { AdvisoryParseError } from '../src/models/index.js';
import type { TaxStatus } from '../src/models/index.js';
import { makeLineItem } from './setup.js';

const reply = (body: Record<string, unknown>) => JSON.stringify(body);

describe('AdvisoryInterpreter', () => {
  const interpreter = new AdvisoryInterpreter();
  const taxedLine = (rate: string, taxStatus: TaxStatus = 'taxable') =>
    makeLineItem({ appliedTaxRate: new Decimal(rate), appliedTaxAmount: new Decimal(100).times(rate), taxStatus });

  describe('precision-mismatch correction', () => {
    it('treats 6.75% and 6.7500% as the same rate', () => {
      const { verdict } = interpreter.interpret(
        reply({ is_correct: false, confidence: 0.8, expected_tax_rate: 0.0675, reasoning: '6.75% does not match 6.7500%' }),
        taxedLine('0.0675'),
      );

      expect(verdict.isCorrect).toBe(true);
      expect(verdict.contradictionCorrected).toBe(true);
      expect(verdict.corrections.map(c => c.kind)).toEqual(['precision_mismatch']);
      expect(verdict.reasoning).toBe(
        '6.75% does not match 6.7500%\n[auto-corrected precision_mismatch] 6.75% and 6.7500% are the same rate; expected 0.0675 equals applied 0.0675',
      );
    });

    it('leaves a genuine mismatch alone even when the text compares equal percentages', () => {
      const { verdict } = interpreter.interpret(
        reply({ is_correct: false, expected_tax_rate: 0.08, reasoning: '6.75% does not match 6.7500%; the rate should be 8%' }),
        taxedLine('0.0675'),
      );

      expect(verdict.isCorrect).toBe(false);
      expect(verdict.contradictionCorrected).toBe(false);
    });
  });

  describe('zero-rate override', () => {
    it('uses the applied rate when a non-exempt line gets a zero expected rate', () => {
      const { verdict } = interpreter.interpret(
        '{"is_correct": false, "confidence": 0.6, "expected_tax_rate": 0.0000, "reasoning": "The item appears to be tangible personal property."}',
        taxedLine('0.0675', 'unknown'),
      );

      expect(verdict.expectedTaxRate.toFixed(4)).toBe('0.0000');
      expect(verdict.effectiveExpectedRate.toFixed(4)).toBe('0.0675');
      expect(verdict.isCorrect).toBe(true);
      expect(verdict.corrections.map(c => [c.kind, c.field])).toEqual([
        ['zero_rate_override', 'expected_tax_rate'],
        ['zero_rate_override', 'is_correct'],
      ]);
    });

    it('keeps the zero rate when the reasoning states an exemption', () => {
      const { verdict } = interpreter.interpret(
        reply({ is_correct: false, expected_tax_rate: 0, reasoning: 'Groceries are exempt from sales tax.' }),
        taxedLine('0.0675', 'unknown'),
      );

      expect(verdict.effectiveExpectedRate.isZero()).toBe(true);
      expect(verdict.isCorrect).toBe(false);
      expect(verdict.corrections).toEqual([]);
    });

    it('does not read a negated exemption as an exemption', () => {
      expect(assertsExemption('This item is not exempt.')).toBe(false);
      expect(assertsExemption('Prescription drugs are exempt.')).toBe(true);

      const { verdict } = interpreter.interpret(
        reply({ is_correct: true, expected_tax_rate: 0, reasoning: 'This item is not exempt.' }),
        taxedLine('0.0675'),
      );
      expect(verdict.effectiveExpectedRate.toFixed(4)).toBe('0.0675');
      expect(verdict.isCorrect).toBe(true);
    });

    it('never overrides a line marked exempt', () => {
      const { verdict } = interpreter.interpret(
        reply({ is_correct: true, expected_tax_rate: 0, reasoning: 'No tax applies.' }),
        taxedLine('0.0675', 'exempt'),
      );

      expect(verdict.effectiveExpectedRate.isZero()).toBe(true);
      expect(verdict.isCorrect).toBe(false);
      expect(verdict.corrections.map(c => c.kind)).toEqual(['rate_mismatch_enforced']);
    });
  });

  describe('rate invariant', () => {
    it('forces is_correct false when the rates differ, whatever the reasoning says', () => {
      const { verdict, auditEntry } = interpreter.interpret(
        reply({ is_correct: true, confidence: 0.99, expected_tax_rate: 0.07, reasoning: 'Rates match exactly, 6.75% equals 6.75%. This is correct.' }),
        taxedLine('0.0675'),
      );

      expect(verdict.isCorrect).toBe(false);
      expect(verdict.corrections).toEqual([{
        kind: 'rate_mismatch_enforced',
        field: 'is_correct',
        originalValue: 'true',
        correctedValue: 'false',
        note: 'Expected rate 0.0700 differs from applied rate 0.0675',
      }]);
      expect(auditEntry.details).toBe('Line inv-test:1: INCORRECT, expected=0.0700 applied=0.0675, corrections=1');
    });

    it('keeps a false verdict on matching rates when no correction applies', () => {
      const { verdict } = interpreter.interpret(
        reply({ is_correct: false, expected_tax_rate: 0.0675, reasoning: 'The vendor should not have charged tax here.' }),
        taxedLine('0.0675'),
      );

      expect(verdict.isCorrect).toBe(false);
      expect(verdict.contradictionCorrected).toBe(false);
    });
  });

  describe('reply parsing', () => {
    it('reads fenced JSON with string-typed fields', () => {
      const { verdict } = interpreter.interpret(
        'Here is my answer:\n```json\n{"is_correct": "true", "confidence": "1.7", "expected_tax_rate": "6.75%"}\n```',
        taxedLine('0.0675'),
      );

      expect(verdict.isCorrect).toBe(true);
      expect(verdict.confidence).toBe(1);
      expect(verdict.expectedTaxRate.toFixed(4)).toBe('0.0675');
      expect(verdict.reasoning).toBe('');
    });

    it('reads percent-suffixed rates below one percent', () => {
      const one = interpreter.interpret(reply({ is_correct: true, expected_tax_rate: '1%' }), taxedLine('0.01')).verdict;
      const half = interpreter.interpret(reply({ is_correct: true, expected_tax_rate: '0.5%' }), taxedLine('0.005')).verdict;

      expect(one.expectedTaxRate.toString()).toBe('0.01');
      expect(one.isCorrect).toBe(true);
      expect(one.corrections).toEqual([]);
      expect(half.expectedTaxRate.toString()).toBe('0.005');
      expect(half.isCorrect).toBe(true);
      expect(half.corrections).toEqual([]);
    });

    it('rejects replies without a JSON object', () => {
      expect(() => interpreter.interpret('I cannot help with that.', taxedLine('0.0675'))).toThrow(AdvisoryParseError);
    });

    it('rejects replies with an unusable verdict or rate', () => {
      expect(() => interpreter.interpret(reply({ is_correct: 'maybe', expected_tax_rate: 0.07 }), taxedLine('0.07')))
        .toThrow('is_correct is not a boolean: maybe');
      expect(() => interpreter.interpret(reply({ is_correct: true }), taxedLine('0.07'))).toThrow(AdvisoryParseError);
      expect(() => interpreter.interpret(reply({ is_correct: true, expected_tax_rate: 'n/a' }), taxedLine('0.07')))
        .toThrow('expected_tax_rate is not a rate: n/a');
    });
  });

  describe('findPrecisionMismatch', () => {
    it('finds equal percentages written with different precision', () => {
      expect(findPrecisionMismatch('Applied 6.625% vs expected 6.6250%')).toEqual(['6.625%', '6.6250%']);
      expect(findPrecisionMismatch('Applied 6.625% vs expected 7%')).toBeNull();
    });
  });
});
