import {
  Invoice,
  InvoiceAggregate,
  InvoiceItem,
  InvoiceStatus,
  InvoiceTerm,
  NewInvoice,
  NewInvoiceItem,
  NewInvoiceTerm,
  TermStatus,
} from '../models/financial/invoice.model';
import { NewPayment, Payment, PaymentFilter } from '../models/financial/payment.model';
import {
  Account,
  AccountType,
  FinanceTransaction,
  NewFinanceTransaction,
  TransactionFilter,
  TransactionTotals,
} from '../models/financial/transaction.model';

/**
 * Writes performed inside one atomic unit of work.
 *
 * Implementations guarantee that either every write of the unit is committed
 * or none is, and that `saveInvoice` fails with LedgerConflictError when the
 * invoice row was committed by someone else after it was loaded here.
 */
export interface LedgerUnitOfWork {
  /** Loads an invoice with items, terms and payments, registering its version. */
  loadInvoice(invoiceId: string): Promise<InvoiceAggregate | null>;
  findTerm(termId: string): Promise<InvoiceTerm | null>;
  findActiveAccount(type: AccountType): Promise<Account | null>;
  nextInvoiceNumber(invoiceDate: Date): Promise<string>;

  insertInvoice(invoice: NewInvoice): Promise<Invoice>;
  /** Compare-and-swap on `invoice.version`; returns the row with the bumped version. */
  saveInvoice(invoice: Invoice): Promise<Invoice>;
  deleteInvoice(invoiceId: string, expectedVersion: number): Promise<void>;
  replaceItems(invoiceId: string, items: NewInvoiceItem[]): Promise<InvoiceItem[]>;
  replaceTerms(invoiceId: string, terms: NewInvoiceTerm[]): Promise<InvoiceTerm[]>;
  setTermStatus(termId: string, status: TermStatus): Promise<void>;
  insertPayment(payment: NewPayment): Promise<Payment>;
  insertTransaction(transaction: NewFinanceTransaction): Promise<FinanceTransaction>;
}

export interface InvoiceFilter {
  status?: InvoiceStatus;
  client_id?: string;
  /** Inclusive range on `invoice_date`. */
  from?: Date;
  to?: Date;
  /** `due_date` strictly before this day. */
  due_before?: Date;
  /** `due_date` on or after this day. */
  due_from?: Date;
  /** Most recently created first instead of by invoice date. */
  newest_first?: boolean;
  limit?: number;
}

export interface LedgerCounts {
  invoices: number;
  payments: number;
  refunds: number;
}

/**
 * Persistence boundary of the ledger. Reads outside `transaction` observe
 * committed data only and never block writers.
 */
export interface LedgerStore {
  transaction<T>(work: (uow: LedgerUnitOfWork) => Promise<T>): Promise<T>;

  findInvoice(invoiceId: string): Promise<InvoiceAggregate | null>;
  findPayment(paymentId: string): Promise<Payment | null>;
  listInvoices(filter?: InvoiceFilter): Promise<Invoice[]>;
  listPayments(filter?: PaymentFilter): Promise<Payment[]>;
  listTransactions(filter?: TransactionFilter): Promise<FinanceTransaction[]>;
  /** Income and expense totals of the matching transactions, summed by the store. */
  sumTransactions(filter?: TransactionFilter): Promise<TransactionTotals>;
  countRecords(): Promise<LedgerCounts>;
}

/**
 * Existence checks against the client/project records owned by the
 * surrounding application.
 */
export interface ClientDirectory {
  clientExists(clientId: string): Promise<boolean>;
  projectBelongsToClient(projectId: string, clientId: string): Promise<boolean>;
}
