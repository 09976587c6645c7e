// Verification workflow orchestrator: Normalize → Prompt → Advise → Interpret → Reconcile → Persist
import { Logger } from '@nestjs/common';
import type {
  AuditEntry, Invoice, InvoiceTaxDetermination, LineFailure, LineItem, LineOutcome, NormalizedInvoice, VerificationConfig,
} from '../models/index.js';
import { AdvisoryParseError, AdvisoryServiceError, ConfigurationError, DEFAULT_VERIFICATION_CONFIG } from '../models/index.js';
import type { IVerificationRepository } from '../repository/verification-repository.js';
import type { IAdvisoryClient } from './advisory-client.js';
import { AdvisoryInterpreter, type IAdvisoryInterpreter } from './interpreter.js';
import { NormalizerService, type INormalizerService } from './normalizer.js';
import { mapBounded } from './pool.js';
import { PromptBuilder, type IPromptBuilder } from './prompt-builder.js';
import { ReconciliationEngine, type IReconciliationEngine } from './reconciliation.js';
import { withRetry } from './retry.js';

export interface OrchestratorOptions {
  config?: VerificationConfig;
  //clock for verifiedAt; fixed in tests so reruns are identical
  now?: () => Date;
}

export interface VerificationResult {
  invoiceId: string;
  determination: InvoiceTaxDetermination;
  auditTrail: AuditEntry[];
}

//public orchestrator interface
export interface IVerificationOrchestrator {
  ingest(raw: unknown, options?: { id?: string }): NormalizedInvoice;
  verifyInvoice(invoiceId: string): Promise<VerificationResult>;
  process(raw: unknown, options?: { id?: string }): Promise<VerificationResult>;
  getDetermination(invoiceId: string): InvoiceTaxDetermination | undefined;
}

interface LineRun {
  outcome: LineOutcome;
  auditEntries: AuditEntry[];
}

//main orchestrator implementation
export class VerificationOrchestrator implements IVerificationOrchestrator {
  private readonly logger = new Logger(VerificationOrchestrator.name);
  private readonly config: VerificationConfig;
  private readonly now: () => Date;
  private readonly normalizer: INormalizerService;
  private readonly promptBuilder: IPromptBuilder;
  private readonly interpreter: IAdvisoryInterpreter;
  private readonly engine: IReconciliationEngine;

  constructor(
    private readonly repository: IVerificationRepository,
    private readonly advisoryClient: IAdvisoryClient,
    options: OrchestratorOptions = {},
  ) {
    this.config = options.config ?? DEFAULT_VERIFICATION_CONFIG;
    this.now = options.now ?? (() => new Date());
    this.normalizer = new NormalizerService();
    this.promptBuilder = new PromptBuilder();
    this.interpreter = new AdvisoryInterpreter(this.config.tolerances.rate);
    this.engine = new ReconciliationEngine(this.config.tolerances);
  }

  //normalize and store one extraction document; MalformedExtractionError propagates
  ingest(raw: unknown, options: { id?: string } = {}): NormalizedInvoice {
    const { normalized, auditEntry } = this.normalizer.normalize(raw, { id: options.id, tolerances: this.config.tolerances });
    this.repository.saveInvoice(normalized);
    this.repository.saveAuditEntry({ ...auditEntry, invoiceId: normalized.invoice.id });
    this.logger.log(`Ingested invoice ${normalized.invoice.invoiceNumber} as ${normalized.invoice.id}`);
    return normalized;
  }

  async process(raw: unknown, options: { id?: string } = {}): Promise<VerificationResult> {
    const { invoice } = this.ingest(raw, options);
    return this.verifyInvoice(invoice.id);
  }

  async verifyInvoice(invoiceId: string): Promise<VerificationResult> {
    const stored = this.repository.findInvoice(invoiceId);
    if (!stored) throw new Error(`Invoice ${invoiceId} not found`);
    const { invoice, lineItems } = stored;
    this.logger.log(`Verifying taxes for invoice ${invoice.invoiceNumber} (${lineItems.length} line item(s), state ${invoice.stateCode || 'n/a'})`);

    const runs = await this.runLines(invoice, lineItems);
    const auditTrail = runs.flatMap(r => r.auditEntries);

    //join point: every line has settled before reconciliation
    const { determination, auditEntry } = this.engine.reconcile({
      invoice, lineItems, outcomes: runs.map(r => r.outcome), verifiedAt: this.now(),
    });
    auditTrail.push(auditEntry);

    this.repository.saveDetermination(determination);
    auditTrail.push({
      step: 'persist', timestamp: new Date().toISOString(),
      details: `Stored ${determination.status} determination for invoice ${invoice.id}`,
    });
    for (const entry of auditTrail) this.repository.saveAuditEntry({ ...entry, invoiceId: invoice.id });

    const message = `Invoice ${invoice.invoiceNumber}: ${determination.status}, expected ${determination.totalExpectedTax.toFixed(2)} vs actual ${determination.totalActualTax.toFixed(2)}`;
    if (determination.status === 'verified') this.logger.log(message);
    else this.logger.warn(message);

    return { invoiceId: invoice.id, determination, auditTrail };
  }

  getDetermination(invoiceId: string): InvoiceTaxDetermination | undefined {
    return this.repository.findDetermination(invoiceId);
  }

  private async runLines(invoice: Invoice, lineItems: LineItem[]): Promise<LineRun[]> {
    //invoice-level structural problems: no advisory calls at all
    if (!invoice.stateCode) {
      this.logger.error(`Invoice ${invoice.id} has no state code; skipping advisory queries`);
      return lineItems.map(item => this.failed(item, { kind: 'configuration', message: 'Invoice has no state code', attempts: 0 }));
    }

    const knowledgeBaseId = this.config.knowledgeBases[invoice.stateCode];
    if (!knowledgeBaseId) {
      const error = new ConfigurationError(`No knowledge base configured for state ${invoice.stateCode}`, invoice.stateCode);
      this.logger.error(error.message);
      return lineItems.map(item => this.failed(item, { kind: 'configuration', message: error.message, attempts: 0 }));
    }

    return mapBounded(lineItems, this.config.advisory.concurrency, item => this.runLine(item, invoice, knowledgeBaseId));
  }

  private async runLine(item: LineItem, invoice: Invoice, knowledgeBaseId: string): Promise<LineRun> {
    const query = this.promptBuilder.build(item, invoice);
    const { model, timeoutMs, maxRetries, baseDelayMs } = this.config.advisory;
    let attempts = 0;

    try {
      const { value: reply } = await withRetry(
        signal => { attempts++; return this.advisoryClient.ask({ query, knowledgeBaseId, model, signal }); },
        { timeoutMs, maxRetries, baseDelayMs },
        (attempt, error) => this.logger.warn(`Line ${item.id} attempt ${attempt} failed: ${error.message}; retrying`),
      );
      const adviseEntry: AuditEntry = {
        step: 'advise', timestamp: new Date().toISOString(),
        details: `Line ${item.id} [${query.pattern}]: reply received after ${attempts} attempt(s) from ${knowledgeBaseId}`,
      };
      const { verdict, auditEntry } = this.interpreter.interpret(reply, item);
      return { outcome: { lineItemId: item.id, verdict }, auditEntries: [adviseEntry, auditEntry] };
    } catch (error) {
      const failure = this.toFailure(error, attempts);
      this.logger.error(`Line ${item.id} unverified (${failure.kind}): ${failure.message}`);
      return this.failed(item, failure);
    }
  }

  private failed(item: LineItem, failure: LineFailure): LineRun {
    return {
      outcome: { lineItemId: item.id, failure },
      auditEntries: [{
        step: 'advise', timestamp: new Date().toISOString(),
        details: `Line ${item.id}: UNVERIFIED (${failure.kind}) ${failure.message}`,
      }],
    };
  }

  private toFailure(error: unknown, attempts: number): LineFailure {
    if (error instanceof AdvisoryParseError) return { kind: 'advisory_parse', message: error.message, attempts };
    if (error instanceof ConfigurationError) return { kind: 'configuration', message: error.message, attempts };
    if (error instanceof AdvisoryServiceError) return { kind: 'advisory_service', message: error.message, attempts };
    const message = error instanceof Error ? error.message : String(error);
    return { kind: 'advisory_service', message: `Unexpected failure: ${message}`, attempts };
  }
}
