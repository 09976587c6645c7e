//this file manages the database schema and initialization for the tax verifier

import Database from 'better-sqlite3';

//SQL SCHEMA DEFINITION
//amounts and rates are stored as TEXT so no value ever passes through a float
const SCHEMA = `
-- Invoices (one per successful extraction)
CREATE TABLE IF NOT EXISTS invoices (
  id TEXT PRIMARY KEY,
  invoice_number TEXT NOT NULL,
  invoice_date TEXT,
  vendor_name TEXT NOT NULL,
  state_code TEXT NOT NULL,
  jurisdiction TEXT NOT NULL,
  subtotal TEXT NOT NULL,
  invoice_discount_amount TEXT NOT NULL,
  discount_source TEXT NOT NULL,
  total_tax_amount TEXT,
  total_amount TEXT NOT NULL,
  currency TEXT NOT NULL,
  extraction_confidence REAL,
  warnings TEXT NOT NULL,
  raw_extraction TEXT NOT NULL,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_invoices_number ON invoices(invoice_number);
CREATE INDEX IF NOT EXISTS idx_invoices_state ON invoices(state_code);

-- Line items, owned by their invoice
CREATE TABLE IF NOT EXISTS line_items (
  id TEXT PRIMARY KEY,
  invoice_id TEXT NOT NULL REFERENCES invoices(id) ON DELETE CASCADE,
  position INTEGER NOT NULL,
  description TEXT NOT NULL,
  quantity TEXT NOT NULL,
  unit_price TEXT NOT NULL,
  line_total TEXT NOT NULL,
  line_discount_amount TEXT,
  allocated_discount TEXT NOT NULL,
  discounted_amount TEXT NOT NULL,
  applied_tax_amount TEXT NOT NULL,
  applied_tax_rate TEXT NOT NULL,
  tax_status TEXT NOT NULL,
  UNIQUE(invoice_id, position)
);

CREATE INDEX IF NOT EXISTS idx_line_items_invoice ON line_items(invoice_id);

-- Tax determinations (one per invoice, replaced in full)
CREATE TABLE IF NOT EXISTS tax_determinations (
  invoice_id TEXT PRIMARY KEY REFERENCES invoices(id) ON DELETE CASCADE,
  status TEXT NOT NULL,
  total_expected_tax TEXT NOT NULL,
  total_actual_tax TEXT NOT NULL,
  actual_tax_source TEXT NOT NULL,
  discrepancy_amount TEXT NOT NULL,
  tolerance TEXT NOT NULL,
  confidence REAL NOT NULL,
  summary TEXT NOT NULL,
  notes TEXT NOT NULL,
  verified_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tax_determinations_status ON tax_determinations(status);

-- Per-line verification records, nested under a determination
CREATE TABLE IF NOT EXISTS line_verifications (
  invoice_id TEXT NOT NULL REFERENCES tax_determinations(invoice_id) ON DELETE CASCADE,
  line_item_id TEXT NOT NULL,
  position INTEGER NOT NULL,
  description TEXT NOT NULL,
  pattern TEXT NOT NULL,
  discounted_amount TEXT NOT NULL,
  contributes INTEGER NOT NULL,
  expected_tax TEXT NOT NULL,
  verdict TEXT,
  failure TEXT,
  PRIMARY KEY (invoice_id, line_item_id)
);

-- Audit Trail Table
CREATE TABLE IF NOT EXISTS audit_trail (
  id TEXT PRIMARY KEY,
  invoice_id TEXT NOT NULL,
  step TEXT NOT NULL,
  timestamp TEXT NOT NULL,
  details TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_audit_trail_invoice_id ON audit_trail(invoice_id);
`;

//opens the verifier store and creates any missing tables
//write-ahead journaling lets a reader query determinations while another run is storing one;
//foreign key enforcement is per connection and the cascading deletes depend on it
export function openVerifierDatabase(dbPath: string = ':memory:'): Database.Database {
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);
  return db;
}

export function closeVerifierDatabase(db: Database.Database): void {
  db.close();
}
