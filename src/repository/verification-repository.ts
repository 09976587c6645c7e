//persistence layer for invoices, their line items and tax determinations using SQLite
//a determination is always written in one transaction that replaces the previous one in full
import type Database from 'better-sqlite3';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import type {
  AuditEntry, ContradictionDetected, DeterminationStatus, DeterminationSummary, Invoice, InvoiceTaxDetermination,
  LineFailure, LineItem, LineVerification, NormalizedInvoice, TaxDisplayPattern, TaxStatus, TaxVerdict,
} from '../models/index.js';

//it keeps the audit entries linked to invoices
export interface StoredAuditEntry extends AuditEntry { invoiceId: string; }

export interface IVerificationRepository {
  saveInvoice(normalized: NormalizedInvoice): void;
  findInvoice(invoiceId: string): NormalizedInvoice | undefined;
  listInvoiceIds(): string[];
  saveDetermination(determination: InvoiceTaxDetermination): void;
  findDetermination(invoiceId: string): InvoiceTaxDetermination | undefined;
  saveAuditEntry(entry: StoredAuditEntry): void;
  getAuditTrail(invoiceId: string): AuditEntry[];
}

const dec = (v: string) => new Decimal(v);
const decOrNull = (v: string | null) => (v === null ? null : new Decimal(v));

export class VerificationRepository implements IVerificationRepository {
  constructor(private db: Database.Database) {}

  //invoices
  //re-ingesting an id replaces the invoice, its lines and drops its stale determination
  saveInvoice({ invoice: inv, lineItems }: NormalizedInvoice): void {
    this.db.transaction(() => {
      this.db.prepare(`DELETE FROM invoices WHERE id = ?`).run(inv.id);
      this.db.prepare(`INSERT INTO invoices (id, invoice_number, invoice_date, vendor_name, state_code, jurisdiction, subtotal, invoice_discount_amount, discount_source, total_tax_amount, total_amount, currency, extraction_confidence, warnings, raw_extraction, created_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`)
        .run(inv.id, inv.invoiceNumber, inv.invoiceDate?.toISOString() ?? null, inv.vendorName, inv.stateCode, inv.jurisdiction, inv.subtotal.toString(), inv.invoiceDiscountAmount.toString(), inv.discountSource, inv.totalTaxAmount?.toString() ?? null, inv.totalAmount.toString(), inv.currency, inv.extractionConfidence, JSON.stringify(inv.warnings), inv.rawExtraction, new Date().toISOString());
      const insertLine = this.db.prepare(`INSERT INTO line_items (id, invoice_id, position, description, quantity, unit_price, line_total, line_discount_amount, allocated_discount, discounted_amount, applied_tax_amount, applied_tax_rate, tax_status) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`);
      for (const l of lineItems) {
        insertLine.run(l.id, l.invoiceId, l.position, l.description, l.quantity.toString(), l.unitPrice.toString(), l.lineTotal.toString(), l.lineDiscountAmount?.toString() ?? null, l.allocatedDiscount.toString(), l.discountedAmount.toString(), l.appliedTaxAmount.toString(), l.appliedTaxRate.toString(), l.taxStatus);
      }
    })();
  }

  findInvoice(invoiceId: string): NormalizedInvoice | undefined {
    const row = this.db.prepare(`SELECT * FROM invoices WHERE id = ?`).get(invoiceId) as InvoiceRow | undefined;
    if (!row) return undefined;
    const lines = this.db.prepare(`SELECT * FROM line_items WHERE invoice_id = ? ORDER BY position ASC`).all(invoiceId) as LineItemRow[];
    return { invoice: this.toInvoice(row), lineItems: lines.map(this.toLineItem) };
  }

  listInvoiceIds(): string[] {
    return (this.db.prepare(`SELECT id FROM invoices ORDER BY created_at ASC, id ASC`).all() as { id: string }[]).map(r => r.id);
  }

  private toInvoice(r: InvoiceRow): Invoice {
    return {
      id: r.id, invoiceNumber: r.invoice_number, invoiceDate: r.invoice_date ? new Date(r.invoice_date) : null, vendorName: r.vendor_name,
      stateCode: r.state_code, jurisdiction: r.jurisdiction, subtotal: dec(r.subtotal), invoiceDiscountAmount: dec(r.invoice_discount_amount),
      discountSource: r.discount_source as Invoice['discountSource'], totalTaxAmount: decOrNull(r.total_tax_amount), totalAmount: dec(r.total_amount),
      currency: r.currency, extractionConfidence: r.extraction_confidence, warnings: JSON.parse(r.warnings) as string[], rawExtraction: r.raw_extraction,
    };
  }

  private toLineItem(r: LineItemRow): LineItem {
    return {
      id: r.id, invoiceId: r.invoice_id, position: r.position, description: r.description, quantity: dec(r.quantity), unitPrice: dec(r.unit_price),
      lineTotal: dec(r.line_total), lineDiscountAmount: decOrNull(r.line_discount_amount), allocatedDiscount: dec(r.allocated_discount),
      discountedAmount: dec(r.discounted_amount), appliedTaxAmount: dec(r.applied_tax_amount), appliedTaxRate: dec(r.applied_tax_rate),
      taxStatus: r.tax_status as TaxStatus,
    };
  }

  //determinations
  saveDetermination(d: InvoiceTaxDetermination): void {
    this.db.transaction(() => {
      this.db.prepare(`DELETE FROM tax_determinations WHERE invoice_id = ?`).run(d.invoiceId);
      this.db.prepare(`INSERT INTO tax_determinations (invoice_id, status, total_expected_tax, total_actual_tax, actual_tax_source, discrepancy_amount, tolerance, confidence, summary, notes, verified_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`)
        .run(d.invoiceId, d.status, d.totalExpectedTax.toString(), d.totalActualTax.toString(), d.actualTaxSource, d.discrepancyAmount.toString(), d.tolerance.toString(), d.confidence, JSON.stringify(d.summary), JSON.stringify(d.notes), d.verifiedAt.toISOString());
      const insertLine = this.db.prepare(`INSERT INTO line_verifications (invoice_id, line_item_id, position, description, pattern, discounted_amount, contributes, expected_tax, verdict, failure) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`);
      for (const l of d.lines) {
        insertLine.run(d.invoiceId, l.lineItemId, l.position, l.description, l.pattern, l.discountedAmount.toString(), l.contributes ? 1 : 0, l.expectedTax.toString(), l.verdict ? JSON.stringify(l.verdict) : null, l.failure ? JSON.stringify(l.failure) : null);
      }
    })();
  }

  findDetermination(invoiceId: string): InvoiceTaxDetermination | undefined {
    const r = this.db.prepare(`SELECT * FROM tax_determinations WHERE invoice_id = ?`).get(invoiceId) as DeterminationRow | undefined;
    if (!r) return undefined;
    const lines = (this.db.prepare(`SELECT * FROM line_verifications WHERE invoice_id = ? ORDER BY position ASC`).all(invoiceId) as LineVerificationRow[]).map(this.toLineVerification);
    return {
      invoiceId: r.invoice_id, status: r.status as DeterminationStatus, totalExpectedTax: dec(r.total_expected_tax), totalActualTax: dec(r.total_actual_tax),
      actualTaxSource: r.actual_tax_source as InvoiceTaxDetermination['actualTaxSource'], discrepancyAmount: dec(r.discrepancy_amount), tolerance: dec(r.tolerance),
      confidence: r.confidence, lines, unverifiedLineItemIds: lines.filter(l => l.verdict === null).map(l => l.lineItemId),
      summary: JSON.parse(r.summary) as DeterminationSummary, notes: JSON.parse(r.notes) as string[], verifiedAt: new Date(r.verified_at),
    };
  }

  private toLineVerification(r: LineVerificationRow): LineVerification {
    let verdict: TaxVerdict | null = null;
    if (r.verdict) {
      const v = JSON.parse(r.verdict) as StoredVerdict;
      verdict = { ...v, expectedTaxRate: dec(v.expectedTaxRate), effectiveExpectedRate: dec(v.effectiveExpectedRate), appliedTaxRate: dec(v.appliedTaxRate) };
    }
    return {
      lineItemId: r.line_item_id, position: r.position, description: r.description, pattern: r.pattern as TaxDisplayPattern,
      discountedAmount: dec(r.discounted_amount), contributes: r.contributes === 1, expectedTax: dec(r.expected_tax), verdict,
      failure: r.failure ? (JSON.parse(r.failure) as LineFailure) : null,
    };
  }

  //audit Trail
  saveAuditEntry(entry: StoredAuditEntry): void {
    this.db.prepare(`INSERT INTO audit_trail (id, invoice_id, step, timestamp, details) VALUES (?, ?, ?, ?, ?)`).run(uuidv4(), entry.invoiceId, entry.step, entry.timestamp, entry.details);
  }

  getAuditTrail(invoiceId: string): AuditEntry[] {
    return (this.db.prepare(`SELECT step, timestamp, details FROM audit_trail WHERE invoice_id = ? ORDER BY rowid ASC`).all(invoiceId) as AuditEntryRow[])
      .map(r => ({ step: r.step as AuditEntry['step'], timestamp: r.timestamp, details: r.details }));
  }
}

//verdict as it sits in the JSON column: decimals serialize to strings
interface StoredVerdict {
  lineItemId: string; isCorrect: boolean; confidence: number; expectedTaxRate: string; effectiveExpectedRate: string; appliedTaxRate: string;
  reasoning: string; contradictionCorrected: boolean; corrections: ContradictionDetected[];
}

//row types (DB → App mapping)
interface InvoiceRow { id: string; invoice_number: string; invoice_date: string | null; vendor_name: string; state_code: string; jurisdiction: string; subtotal: string; invoice_discount_amount: string; discount_source: string; total_tax_amount: string | null; total_amount: string; currency: string; extraction_confidence: number | null; warnings: string; raw_extraction: string; created_at: string; }
interface LineItemRow { id: string; invoice_id: string; position: number; description: string; quantity: string; unit_price: string; line_total: string; line_discount_amount: string | null; allocated_discount: string; discounted_amount: string; applied_tax_amount: string; applied_tax_rate: string; tax_status: string; }
interface DeterminationRow { invoice_id: string; status: string; total_expected_tax: string; total_actual_tax: string; actual_tax_source: string; discrepancy_amount: string; tolerance: string; confidence: number; summary: string; notes: string; verified_at: string; }
interface LineVerificationRow { invoice_id: string; line_item_id: string; position: number; description: string; pattern: string; discounted_amount: string; contributes: number; expected_tax: string; verdict: string | null; failure: string | null; }
interface AuditEntryRow { step: string; timestamp: string; details: string; }
