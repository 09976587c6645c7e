//domain contracts for invoice tax verification
//every service reads and writes these shapes, the repository persists them
import type Decimal from 'decimal.js';

export type TaxStatus = 'taxable' | 'exempt' | 'unknown';

//how an invoice shows the tax of a line: on the line, only as an invoice total, or not at all
export type TaxDisplayPattern = 'per_line_taxed' | 'total_taxed' | 'exempt_or_unknown';

export type DiscountSource = 'declared' | 'inferred' | 'none';

//Invoice Model
export interface Invoice {
  id: string;
  invoiceNumber: string;
  invoiceDate: Date | null;
  vendorName: string;
  stateCode: string;
  jurisdiction: string;
  subtotal: Decimal;
  invoiceDiscountAmount: Decimal;
  discountSource: DiscountSource;
  totalTaxAmount: Decimal | null;
  totalAmount: Decimal;
  currency: string;
  extractionConfidence: number | null;
  warnings: string[];
  rawExtraction: string;
}

//Line Item Model, owned by exactly one invoice
export interface LineItem {
  id: string;
  invoiceId: string;
  position: number;
  description: string;
  quantity: Decimal;
  unitPrice: Decimal;
  //net of lineDiscountAmount when that is present
  lineTotal: Decimal;
  lineDiscountAmount: Decimal | null;
  allocatedDiscount: Decimal;
  //tax base after invoice-level discount allocation
  discountedAmount: Decimal;
  appliedTaxAmount: Decimal;
  appliedTaxRate: Decimal;
  taxStatus: TaxStatus;
}

export interface NormalizedInvoice {
  invoice: Invoice;
  lineItems: LineItem[];
}

//a correction the interpreter made to an advisory reply; recorded, never thrown
export interface ContradictionDetected {
  kind: 'precision_mismatch' | 'zero_rate_override' | 'rate_mismatch_enforced';
  field: 'is_correct' | 'expected_tax_rate';
  originalValue: string;
  correctedValue: string;
  note: string;
}

//Tax Verdict: one per line item per verification run
export interface TaxVerdict {
  lineItemId: string;
  isCorrect: boolean;
  confidence: number;
  //rate exactly as the advisory service reported it
  expectedTaxRate: Decimal;
  effectiveExpectedRate: Decimal;
  appliedTaxRate: Decimal;
  reasoning: string;
  contradictionCorrected: boolean;
  corrections: ContradictionDetected[];
}

export type LineFailureKind = 'advisory_parse' | 'advisory_service' | 'configuration';

export interface LineFailure {
  kind: LineFailureKind;
  message: string;
  attempts: number;
}

//per-line input to reconciliation: a verdict, or the reason there is none
export type LineOutcome =
  | { lineItemId: string; verdict: TaxVerdict; failure?: undefined }
  | { lineItemId: string; verdict?: undefined; failure: LineFailure };

export type DeterminationStatus = 'verified' | 'discrepancy' | 'error' | 'partial';

export interface LineVerification {
  lineItemId: string;
  position: number;
  description: string;
  pattern: TaxDisplayPattern;
  discountedAmount: Decimal;
  contributes: boolean;
  expectedTax: Decimal;
  verdict: TaxVerdict | null;
  failure: LineFailure | null;
}

export interface DeterminationSummary {
  totalItems: number;
  correctItems: number;
  incorrectItems: number;
  correctedItems: number;
  unverifiedItems: number;
}

//Invoice Tax Determination: recomputed in full on every run
export interface InvoiceTaxDetermination {
  invoiceId: string;
  status: DeterminationStatus;
  totalExpectedTax: Decimal;
  totalActualTax: Decimal;
  actualTaxSource: 'invoice_total' | 'line_items';
  //actual minus expected; positive means over-collected
  discrepancyAmount: Decimal;
  tolerance: Decimal;
  confidence: number;
  lines: LineVerification[];
  unverifiedLineItemIds: string[];
  summary: DeterminationSummary;
  notes: string[];
  verifiedAt: Date;
}

//Audit trail
export interface AuditEntry {
  step: 'normalize' | 'advise' | 'interpret' | 'reconcile' | 'persist';
  timestamp: string;
  details: string;
}

//Verification configuration
export interface ToleranceConfig {
  //$ allowed between expected and actual tax
  amount: number;
  //$ allowed when checking line totals against the invoice total
  rounding: number;
  //rate delta below which two rates are equal (0.0001 = 0.01 percentage points)
  rate: number;
  //fraction of the subtotal used when it exceeds `amount`
  scaledAmount: number;
}

export interface AdvisoryConfig {
  model: string;
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
  concurrency: number;
}

export interface VerificationConfig {
  tolerances: ToleranceConfig;
  advisory: AdvisoryConfig;
  //state code -> knowledge base (vector store) id
  knowledgeBases: Record<string, string>;
}

export const DEFAULT_VERIFICATION_CONFIG: VerificationConfig = {
  tolerances: {
    amount: 0.01,
    rounding: 0.02,
    rate: 0.0001,
    scaledAmount: 0,
  },
  advisory: {
    model: 'gpt-4o-mini',
    timeoutMs: 30_000,
    maxRetries: 3,
    baseDelayMs: 500,
    concurrency: 4,
  },
  knowledgeBases: {},
} as const;

export * from './errors.js';
