#!/usr/bin/env node
import { readFileSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { envs, buildVerificationConfig } from './config/index.js';
import { openVerifierDatabase, closeVerifierDatabase } from './repository/database.js';
import { VerificationRepository } from './repository/verification-repository.js';
import { OpenAiAdvisoryClient } from './services/advisory-client.js';
import { VerificationOrchestrator } from './services/orchestrator.js';
import { formatAmount, formatRate } from './services/money.js';
import type { InvoiceTaxDetermination, LineVerification } from './models/index.js';

//parse CLI flags
const args = process.argv.slice(2);
const useMemory = ['--memory', '-m'].some(f => args.includes(f));
const files = args.filter(a => !a.startsWith('-'));

//ANSI color helpers
const c = { reset: '\x1b[0m', bright: '\x1b[1m', dim: '\x1b[2m', green: '\x1b[32m', yellow: '\x1b[33m', blue: '\x1b[34m', magenta: '\x1b[35m', cyan: '\x1b[36m', red: '\x1b[31m' };

const log = console.log;
const statusColor = (s: InvoiceTaxDetermination['status']) => s === 'verified' ? c.green : s === 'partial' ? c.yellow : c.red;

//pretty headers
const header = (t: string) => log(`\n${c.bright}${c.cyan}${'='.repeat(70)}\n ${t}\n${'='.repeat(70)}${c.reset}`);
const subHeader = (t: string) => log(`\n${c.bright}${c.blue}${'-'.repeat(50)}\n ${t}\n${'-'.repeat(50)}${c.reset}`);

const printLine = (l: LineVerification) => {
  const label = `${l.position}. ${l.description} [${l.pattern}] base=${formatAmount(l.discountedAmount)}`;
  if (!l.verdict) {
    log(`${c.yellow}  ${label} UNVERIFIED (${l.failure?.kind ?? 'unknown'}): ${l.failure?.message ?? ''}${c.reset}`);
    return;
  }
  const v = l.verdict;
  log(`  ${label} ${v.isCorrect ? `${c.green}CORRECT` : `${c.red}INCORRECT`}${c.reset} expected=${formatRate(v.effectiveExpectedRate)} applied=${formatRate(v.appliedTaxRate)} tax=${formatAmount(l.expectedTax)}`);
  v.corrections.forEach(x => log(`${c.magenta}     auto-corrected ${x.kind}: ${x.field} ${x.originalValue} -> ${x.correctedValue}${c.reset}`));
};

const printDetermination = (d: InvoiceTaxDetermination) => {
  log(`${statusColor(d.status)}${c.bright}Status: ${d.status.toUpperCase()}${c.reset} confidence=${d.confidence.toFixed(3)}`);
  log(`Expected tax ${formatAmount(d.totalExpectedTax)} | actual ${formatAmount(d.totalActualTax)} (${d.actualTaxSource}) | discrepancy ${formatAmount(d.discrepancyAmount)} | tolerance ${formatAmount(d.tolerance)}`);
  d.lines.forEach(printLine);
  d.notes.forEach(n => log(`${c.dim}  note: ${n}${c.reset}`));
};

//entry point
async function main() {
  header('INVOICE TAX VERIFIER');
  if (files.length === 0) {
    log(`${c.dim}Usage: verify-invoice <extraction.json>... [--memory|-m]${c.reset}`);
    process.exitCode = 1;
    return;
  }

  const dbPath = useMemory ? ':memory:' : envs.databasePath;
  if (dbPath !== ':memory:') mkdirSync(dirname(resolve(dbPath)), { recursive: true });
  const db = openVerifierDatabase(dbPath);
  const orchestrator = new VerificationOrchestrator(
    new VerificationRepository(db),
    new OpenAiAdvisoryClient({ apiKey: envs.openAiApiKey, baseURL: envs.openAiBaseUrl }),
    { config: buildVerificationConfig(envs) },
  );

  try {
    for (const file of files) {
      subHeader(file);
      //one unreadable or malformed file does not stop the rest
      try {
        const { invoiceId, determination } = await orchestrator.process(readFileSync(file, 'utf-8'));
        log(`${c.dim}Invoice id: ${invoiceId}${c.reset}`);
        printDetermination(determination);
      } catch (error) {
        console.error(`${c.red}${file}: ${error instanceof Error ? error.message : String(error)}${c.reset}`);
        process.exitCode = 1;
      }
    }
  } finally {
    closeVerifierDatabase(db);
  }
}

main().catch((error: unknown) => {
  console.error(`${c.red}${error instanceof Error ? error.message : String(error)}${c.reset}`);
  process.exitCode = 1;
});
