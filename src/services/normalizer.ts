//NormalizerService: turns a raw extraction document into typed invoice + line item records
//it also decides how discounts are represented, which fixes the tax base of every line
import { Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { AuditEntry, Invoice, LineItem, NormalizedInvoice, TaxStatus, ToleranceConfig } from '../models/index.js';
import { DEFAULT_VERIFICATION_CONFIG, MalformedExtractionError } from '../models/index.js';
import { extractJsonObject, isObject } from './json.js';
import { ZERO, formatAmount, formatRate, isZero, parseDecimal, parseRate, roundAmount, roundRate, sum, withinTolerance } from './money.js';

//every field is optional; presence rules are enforced below, not by the schema
const RawLineItemSchema = z.object({
  description: z.unknown().optional(),
  quantity: z.unknown().optional(),
  unit_price: z.unknown().optional(),
  line_total: z.unknown().optional(),
  discount_amount: z.unknown().optional(),
  tax_amount: z.unknown().optional(),
  tax_rate: z.unknown().optional(),
  tax_status: z.unknown().optional(),
}).passthrough();

const RawExtractionSchema = z.object({
  invoice_number: z.unknown().optional(),
  date: z.unknown().optional(),
  vendor_name: z.unknown().optional(),
  total_amount: z.unknown().optional(),
  total_tax_amount: z.unknown().optional(),
  invoice_discount_amount: z.unknown().optional(),
  state_code: z.unknown().optional(),
  jurisdiction: z.unknown().optional(),
  currency: z.unknown().optional(),
  confidence: z.unknown().optional(),
  line_items: z.unknown().optional(),
}).passthrough();

type RawLineItem = z.infer<typeof RawLineItemSchema>;

export interface NormalizeOptions {
  id?: string;
  tolerances?: ToleranceConfig;
}

export interface NormalizeResult {
  normalized: NormalizedInvoice;
  auditEntry: AuditEntry;
}

export interface INormalizerService {
  normalize(raw: unknown, options?: NormalizeOptions): NormalizeResult;
}

const TAX_STATUSES: readonly TaxStatus[] = ['taxable', 'exempt', 'unknown'];

//shares of amount over pool, in proportion to line totals; each share is capped at its line's total,
//and what the last line cannot take (rounding residue, capping) goes back to lines with room
function spread(pool: readonly LineItem[], amount: Decimal): Map<LineItem, Decimal> {
  const shares = new Map<LineItem, Decimal>();
  const base = sum(pool.map(i => i.lineTotal));
  if (amount.lte(0) || base.isZero()) return shares;

  let remaining = amount;
  pool.forEach((item, idx) => {
    const proportional = idx === pool.length - 1 ? remaining : roundAmount(amount.times(item.lineTotal).div(base));
    const share = Decimal.min(proportional, item.lineTotal, remaining);
    shares.set(item, share);
    remaining = remaining.minus(share);
  });
  for (const item of [...pool].reverse()) {
    if (remaining.lte(0)) break;
    const current = shares.get(item) ?? ZERO;
    const extra = Decimal.min(item.lineTotal.minus(current), remaining);
    shares.set(item, current.plus(extra));
    remaining = remaining.minus(extra);
  }
  return shares;
}

//lines without a discount of their own get the invoice discount first; whatever exceeds their total
//spills onto the lines that carry one. No line base goes below zero, so the allocated sum is
//min(discount, positive line totals)
export function allocateInvoiceDiscount(items: readonly LineItem[], discount: Decimal): LineItem[] {
  const total = roundAmount(discount);
  const positive = items.filter(i => i.lineTotal.gt(0));
  const primary = positive.filter(i => i.lineDiscountAmount === null);
  const secondary = positive.filter(i => i.lineDiscountAmount !== null);

  const first = spread(primary, Decimal.min(total, sum(primary.map(i => i.lineTotal))));
  const rest = spread(secondary, total.minus(sum([...first.values()])));

  return items.map(item => {
    const share = first.get(item) ?? rest.get(item) ?? ZERO;
    return { ...item, allocatedDiscount: share, discountedAmount: item.lineTotal.minus(share) };
  });
}

export class NormalizerService implements INormalizerService {
  private readonly logger = new Logger(NormalizerService.name);

  normalize(raw: unknown, options: NormalizeOptions = {}): NormalizeResult {
    const tolerances = options.tolerances ?? DEFAULT_VERIFICATION_CONFIG.tolerances;
    const doc = this.readDocument(raw);
    const warnings: string[] = [];
    const id = options.id ?? uuidv4();

    const rawItems: unknown[] = Array.isArray(doc.line_items) ? doc.line_items : [];
    const drafts: LineItem[] = [];
    rawItems.forEach((entry, idx) => {
      const parsed = RawLineItemSchema.safeParse(entry);
      if (!isObject(entry) || !parsed.success) {
        warnings.push(`line_items[${idx}] is not an object, skipped`);
        return;
      }
      drafts.push(this.toLineItem(parsed.data, id, drafts.length + 1, warnings));
    });
    if (drafts.length === 0) throw new MalformedExtractionError('line_items', 'at least one line item is required');

    const totalAmount = parseDecimal(doc.total_amount);
    if (totalAmount === null) throw new MalformedExtractionError('total_amount');

    const totalTaxAmount = this.optionalAmount(doc.total_tax_amount, 'total_tax_amount', warnings);
    const subtotal = roundAmount(sum(drafts.map(d => d.lineTotal)));

    //discount resolution: declared invoice discount, else one inferred from the totals
    const declared = this.optionalAmount(doc.invoice_discount_amount, 'invoice_discount_amount', warnings)?.abs() ?? null;
    const hasLineDiscounts = drafts.some(d => d.lineDiscountAmount !== null);
    let discount = ZERO;
    let discountSource: Invoice['discountSource'] = 'none';
    if (declared !== null && !isZero(declared)) {
      discount = roundAmount(declared);
      discountSource = 'declared';
    } else if (!hasLineDiscounts && subtotal.minus(totalAmount).gt(tolerances.rounding)) {
      discount = roundAmount(subtotal.minus(totalAmount));
      discountSource = 'inferred';
      warnings.push(`Inferred invoice discount of ${formatAmount(discount)} from line totals ${formatAmount(subtotal)} vs total ${formatAmount(totalAmount)}`);
    }

    const allocated = allocateInvoiceDiscount(drafts, discount);
    const applied = sum(allocated.map(l => l.allocatedDiscount));
    const undiscountedBase = sum(drafts.filter(d => d.lineDiscountAmount === null && d.lineTotal.gt(0)).map(d => d.lineTotal));
    if (applied.gt(undiscountedBase)) {
      warnings.push(`${formatAmount(applied.minus(undiscountedBase))} of invoice discount ${formatAmount(discount)} spread over lines with their own discount`);
    }
    if (applied.lt(discount)) {
      warnings.push(`Invoice discount ${formatAmount(discount)} exceeds the line totals; only ${formatAmount(applied)} applied`);
      discount = applied;
    }
    const lineItems = allocated.map(item => this.deriveRate(item, warnings));

    //line totals less discount should land on the total, or on the total less tax when the total includes it
    const net = subtotal.minus(discount);
    const balanced = withinTolerance(net, totalAmount, tolerances.rounding)
      || (totalTaxAmount !== null && withinTolerance(net.plus(totalTaxAmount), totalAmount, tolerances.rounding));
    if (!balanced) {
      warnings.push(`Line totals less discount (${formatAmount(net)}) do not reconcile with total_amount ${formatAmount(totalAmount)}`);
    }

    const invoice: Invoice = {
      id,
      invoiceNumber: this.text(doc.invoice_number) || 'UNKNOWN',
      invoiceDate: this.parseDate(doc.date, warnings),
      vendorName: this.text(doc.vendor_name) || 'Unknown Vendor',
      stateCode: this.text(doc.state_code).toUpperCase().slice(0, 2),
      jurisdiction: this.text(doc.jurisdiction),
      subtotal,
      invoiceDiscountAmount: discount,
      discountSource,
      totalTaxAmount: totalTaxAmount === null ? null : roundAmount(totalTaxAmount),
      totalAmount: roundAmount(totalAmount),
      currency: (this.text(doc.currency) || 'USD').toUpperCase(),
      extractionConfidence: this.confidence(doc.confidence),
      warnings,
      rawExtraction: JSON.stringify(doc),
    };

    for (const w of warnings) this.logger.warn(`Invoice ${invoice.invoiceNumber}: ${w}`);

    return {
      normalized: { invoice, lineItems },
      auditEntry: {
        step: 'normalize',
        timestamp: new Date().toISOString(),
        details: `Invoice ${invoice.invoiceNumber}: ${lineItems.length} line item(s), discount ${formatAmount(discount)} (${discountSource}), ${warnings.length} warning(s)`,
      },
    };
  }

  private readDocument(raw: unknown): z.infer<typeof RawExtractionSchema> {
    const value = typeof raw === 'string' ? extractJsonObject(raw) : raw;
    const parsed = RawExtractionSchema.safeParse(value);
    if (!isObject(value) || !parsed.success) throw new MalformedExtractionError('document', 'extraction must be a JSON object');
    return parsed.data;
  }

  private toLineItem(raw: RawLineItem, invoiceId: string, position: number, warnings: string[]): LineItem {
    const field = (key: string) => `line ${position} ${key}`;
    const quantity = this.amount(raw.quantity, 1, field('quantity'), warnings);
    const unitPrice = this.amount(raw.unit_price, 0, field('unit_price'), warnings);
    let lineTotal = this.amount(raw.line_total, 0, field('line_total'), warnings);
    if (lineTotal.isZero() && quantity.gt(0)) lineTotal = roundAmount(quantity.times(unitPrice));

    const lineDiscount = this.optionalAmount(raw.discount_amount, field('discount_amount'), warnings);
    const rate = parseRate(raw.tax_rate);
    if (rate === null && raw.tax_rate !== undefined && raw.tax_rate !== null) warnings.push(`Invalid ${field('tax_rate')}: ${String(raw.tax_rate)}`);

    return {
      id: `${invoiceId}:${position}`,
      invoiceId,
      position,
      description: this.text(raw.description) || `Item ${position}`,
      quantity,
      unitPrice: roundAmount(unitPrice),
      lineTotal: roundAmount(lineTotal),
      lineDiscountAmount: lineDiscount === null ? null : roundAmount(lineDiscount.abs()),
      allocatedDiscount: ZERO,
      discountedAmount: roundAmount(lineTotal),
      appliedTaxAmount: roundAmount(this.amount(raw.tax_amount, 0, field('tax_amount'), warnings)),
      appliedTaxRate: rate ?? ZERO,
      taxStatus: this.taxStatus(raw.tax_status),
    };
  }

  //a line that shows tax but no rate gets the rate implied by its tax base
  private deriveRate(item: LineItem, warnings: string[]): LineItem {
    if (!item.appliedTaxRate.isZero() || item.appliedTaxAmount.lte(0) || item.discountedAmount.lte(0)) return item;
    const derived = roundRate(item.appliedTaxAmount.div(item.discountedAmount));
    warnings.push(`Derived tax rate ${formatRate(derived)} for line ${item.position} from its tax amount`);
    return { ...item, appliedTaxRate: derived };
  }

  private amount(value: unknown, fallback: number, name: string, warnings: string[]): Decimal {
    return this.optionalAmount(value, name, warnings) ?? parseDecimal(fallback) ?? ZERO;
  }

  private optionalAmount(value: unknown, name: string, warnings: string[]): Decimal | null {
    if (value === undefined || value === null || value === '') return null;
    const parsed = parseDecimal(value);
    if (parsed === null) warnings.push(`Invalid ${name}: ${String(value)}`);
    return parsed;
  }

  private text(value: unknown): string {
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number') return String(value);
    return '';
  }

  private taxStatus(value: unknown): TaxStatus {
    const status = this.text(value).toLowerCase();
    return TAX_STATUSES.find(s => s === status) ?? 'unknown';
  }

  private confidence(value: unknown): number | null {
    return typeof value === 'number' && value >= 0 && value <= 1 ? value : null;
  }

  //YYYY-MM-DD first, then the US layouts invoices commonly print
  private parseDate(value: unknown, warnings: string[]): Date | null {
    const s = this.text(value);
    if (!s) return null;

    const build = (y: string, m: string, d: string): Date | null => {
      const date = new Date(Date.UTC(+y, +m - 1, +d));
      return date.getUTCMonth() === +m - 1 && date.getUTCDate() === +d ? date : null;
    };

    const iso = s.match(/^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/);
    const us = s.match(/^(\d{1,2})[-/](\d{1,2})[-/](\d{4})$/);
    const date = iso ? build(iso[1], iso[2], iso[3]) : us ? build(us[3], us[1], us[2]) : null;
    if (!date) warnings.push(`Could not parse date: ${s}`);
    return date;
  }
}
