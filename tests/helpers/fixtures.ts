import { InvoiceItemInput, InvoiceTermInput, InvoiceView } from '../../src/models/financial/invoice.model';
import { AnalyticsService } from '../../src/services/analytics/analytics.service';
import { InvoiceService } from '../../src/services/financial/invoice.service';
import { PaymentLedgerService } from '../../src/services/financial/payment-ledger.service';
import { PaymentService } from '../../src/services/financial/payment.service';
import { RefundService } from '../../src/services/financial/refund.service';
import { isLedgerError } from '../../src/utils/errors';
import { MemoryClientDirectory, MemoryLedgerStore, MemoryLedgerStoreOptions } from './memory-ledger.store';

export const CLIENT_ID = '0b6f2a8e-1c1d-4e57-9a53-5d1f7c2b9a01';
export const OTHER_CLIENT_ID = '0b6f2a8e-1c1d-4e57-9a53-5d1f7c2b9a02';
export const PROJECT_ID = '7c3e9d10-4a2b-4f8e-8d61-2e9b0c4a7f01';
export const UNKNOWN_ID = '9d9d9d9d-9d9d-4d9d-8d9d-9d9d9d9d9d9d';

/** Fixed clock for every service under test. */
export const NOW = new Date('2024-03-15T10:00:00.000Z');

export interface Ledger {
  store: MemoryLedgerStore;
  clients: MemoryClientDirectory;
  invoices: InvoiceService;
  ledger: PaymentLedgerService;
  refunds: RefundService;
  payments: PaymentService;
  analytics: AnalyticsService;
}

export interface LedgerFixtureOptions extends MemoryLedgerStoreOptions {
  maxAttempts?: number;
  now?: Date;
}

export const createLedger = (options: LedgerFixtureOptions = {}): Ledger => {
  const store = new MemoryLedgerStore(options);
  const clients = new MemoryClientDirectory().addClient(CLIENT_ID, [PROJECT_ID]).addClient(OTHER_CLIENT_ID);
  const now = (): Date => options.now ?? NOW;
  const serviceOptions = {
    now,
    maxAttempts: options.maxAttempts ?? 10,
    retryDelayMs: 0,
    defaultCurrency: 'USD',
    invoiceDueDays: 30,
  };
  return {
    store,
    clients,
    invoices: new InvoiceService(store, clients, serviceOptions),
    ledger: new PaymentLedgerService(store, serviceOptions),
    refunds: new RefundService(store, serviceOptions),
    payments: new PaymentService(store, { now }),
    analytics: new AnalyticsService(store, { now }),
  };
};

export const consultingItems: InvoiceItemInput[] = [
  { description: 'Consulting', quantity: 2, unit_price: '100.00' },
  { description: 'Review', quantity: 1, unit_price: '50.00' },
];

export interface SentInvoiceOptions {
  items?: InvoiceItemInput[];
  taxRate?: number | string;
  terms?: InvoiceTermInput[];
  invoiceDate?: Date;
  dueDate?: Date;
}

/**
 * Creates, optionally schedules, and sends an invoice.
 */
export const createSentInvoice = async (ledger: Ledger, options: SentInvoiceOptions = {}): Promise<InvoiceView> => {
  const draft = await ledger.invoices.createInvoice({
    client_id: CLIENT_ID,
    items: options.items ?? consultingItems,
    tax_rate: options.taxRate ?? 0,
    invoice_date: options.invoiceDate ?? new Date('2024-03-01'),
    due_date: options.dueDate ?? new Date('2024-03-31'),
  });
  if (options.terms) {
    await ledger.invoices.setTerms(draft.id, options.terms);
  }
  return ledger.invoices.sendInvoice(draft.id);
};

/** Single line item worth exactly `amount`. */
export const flatItem = (amount: string): InvoiceItemInput[] => [{ description: 'Fixed fee', quantity: 1, unit_price: amount }];

/**
 * Deterministic PRNG (mulberry32) so randomized interleavings are reproducible.
 */
export const seededRandom = (seed: number): (() => number) => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

/**
 * Awaits a promise that is expected to reject and returns the serialized
 * ledger error, or the raw rejection for anything else.
 */
export const ledgerErrorOf = async (promise: Promise<unknown>): Promise<unknown> => {
  try {
    await promise;
  } catch (err) {
    return isLedgerError(err) ? err.toJSON() : err;
  }
  throw new Error('Expected the promise to reject');
};
