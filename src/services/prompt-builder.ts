//PromptBuilder: one deterministic advisory query per line item
//the tax-display pattern is spelled out because the advisory service misreads lines without it
import type { Invoice, LineItem, TaxDisplayPattern } from '../models/index.js';
import { formatAmount, formatPercent, formatRate } from './money.js';

export interface AdvisoryQuery {
  lineItemId: string;
  vendorName: string;
  stateCode: string;
  jurisdiction: string;
  description: string;
  quantity: string;
  lineAmount: string;
  pattern: TaxDisplayPattern;
  appliedTaxRate: string;
  appliedTaxAmount: string;
  //only for total_taxed lines
  invoiceTotalTax: string | null;
  prompt: string;
}

export interface IPromptBuilder {
  build(item: LineItem, invoice: Invoice): AdvisoryQuery;
}

export function classifyTaxDisplayPattern(item: LineItem, invoice: Invoice): TaxDisplayPattern {
  if (item.appliedTaxAmount.gt(0)) return 'per_line_taxed';
  if (item.appliedTaxRate.gt(0) && invoice.totalTaxAmount !== null && invoice.totalTaxAmount.gt(0)) return 'total_taxed';
  //a rate with no tax charged anywhere is read as untaxed
  return 'exempt_or_unknown';
}

const PATTERN_CONTEXT: Record<TaxDisplayPattern, (q: Omit<AdvisoryQuery, 'prompt'>) => string> = {
  per_line_taxed: q =>
    `Tax is shown on this line: ${q.appliedTaxAmount} charged at ${q.appliedTaxRate}.`,
  total_taxed: q =>
    `Tax is NOT itemized per line. The invoice shows a single total tax of ${q.invoiceTotalTax ?? '0.00'}, and this line is marked taxable at ${q.appliedTaxRate}. A zero per-line tax amount is expected for this layout and is not by itself an error.`,
  exempt_or_unknown: q =>
    `No tax was charged on this line (applied rate ${q.appliedTaxRate}). Decide whether the item should have been taxed.`,
};

export class PromptBuilder implements IPromptBuilder {
  build(item: LineItem, invoice: Invoice): AdvisoryQuery {
    const pattern = classifyTaxDisplayPattern(item, invoice);
    const base: Omit<AdvisoryQuery, 'prompt'> = {
      lineItemId: item.id,
      vendorName: invoice.vendorName,
      stateCode: invoice.stateCode,
      jurisdiction: invoice.jurisdiction,
      description: item.description,
      quantity: item.quantity.toString(),
      lineAmount: formatAmount(item.discountedAmount),
      pattern,
      appliedTaxRate: formatRate(item.appliedTaxRate),
      appliedTaxAmount: formatAmount(item.appliedTaxAmount),
      invoiceTotalTax: pattern === 'total_taxed' && invoice.totalTaxAmount !== null ? formatAmount(invoice.totalTaxAmount) : null,
    };
    return { ...base, prompt: this.render(base, item) };
  }

  private render(q: Omit<AdvisoryQuery, 'prompt'>, item: LineItem): string {
    const location = q.jurisdiction ? `${q.jurisdiction}, ${q.stateCode}` : q.stateCode;
    return [
      `You are verifying sales tax on a purchase invoice line for the state of ${q.stateCode}.`,
      '',
      `Vendor: ${q.vendorName} (use the vendor's line of business to infer whether the item is a taxable good or service)`,
      `Jurisdiction: ${location}`,
      `Item: ${q.description}`,
      `Quantity: ${q.quantity}`,
      `Taxable base after discounts: ${q.lineAmount}`,
      `Tax display pattern: ${q.pattern}`,
      `Applied tax rate: ${q.appliedTaxRate} (${formatPercent(item.appliedTaxRate)})`,
      `Applied tax amount: ${q.appliedTaxAmount}`,
      ...(q.invoiceTotalTax !== null ? [`Invoice total tax: ${q.invoiceTotalTax}`] : []),
      '',
      PATTERN_CONTEXT[q.pattern](q),
      '',
      'Compare rates numerically: 6.75% and 6.7500% are the same rate.',
      'Reply with only a JSON object:',
      '{"is_correct": boolean, "confidence": number between 0 and 1, "expected_tax_rate": decimal rate such as 0.0675, "reasoning": string}',
      'Use expected_tax_rate 0 only when the item is exempt, and say so explicitly in reasoning.',
    ].join('\n');
  }
}
