import { Pool, PoolClient, types } from 'pg';
import {
  Discount,
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
import { NewPayment, Payment, PaymentFilter, PaymentMethod, PaymentType } from '../models/financial/payment.model';
import {
  Account,
  AccountType,
  FinanceTransaction,
  NewFinanceTransaction,
  TransactionFilter,
  TransactionTotals,
  TransactionType,
} from '../models/financial/transaction.model';
import { toIsoDate, parseIsoDate } from '../utils/dates';
import { LedgerConflictError } from '../utils/errors';
import { Money, Percentage, formatQuantity, parseQuantity } from '../utils/money';
import { ClientDirectory, InvoiceFilter, LedgerCounts, LedgerStore, LedgerUnitOfWork } from './ledger.store';

// DATE columns are calendar days; parse them as UTC midnight instead of local time.
types.setTypeParser(types.builtins.DATE, (value: string) => parseIsoDate(value));

type Queryable = Pool | PoolClient;

interface InvoiceRow {
  id: string;
  invoice_number: string;
  client_id: string;
  project_id: string | null;
  invoice_date: Date;
  due_date: Date;
  tax_rate: string;
  discount_type: 'fixed' | 'percentage' | null;
  discount_value: string | null;
  sub_total: string;
  discount_amount: string;
  tax_amount: string;
  total_amount: string;
  currency: string;
  status: InvoiceStatus;
  notes: string | null;
  version: number;
  created_at: Date;
  updated_at: Date;
}

interface InvoiceItemRow {
  id: string;
  invoice_id: string;
  position: number;
  description: string;
  quantity: string;
  unit_price: string;
  tax_rate: string | null;
  total_price: string;
}

interface InvoiceTermRow {
  id: string;
  invoice_id: string;
  term_number: number;
  percentage: string;
  amount: string;
  due_date: Date;
  description: string | null;
  status: TermStatus;
}

interface PaymentRow {
  id: string;
  invoice_id: string;
  invoice_term_id: string | null;
  amount: string;
  payment_type: PaymentType;
  payment_method: PaymentMethod;
  reference_number: string | null;
  payment_date: Date;
  notes: string | null;
  refunded_payment_id: string | null;
  refund_reason: string | null;
  created_at: Date;
}

interface TransactionRow {
  id: string;
  account_id: string;
  invoice_id: string | null;
  project_id: string | null;
  payment_id: string | null;
  transaction_type: TransactionType;
  amount: string;
  transaction_date: Date;
  description: string;
  created_at: Date;
}

interface AccountRow {
  id: string;
  code: string;
  name: string;
  type: AccountType;
  is_active: boolean;
}

const toDiscount = (row: InvoiceRow): Discount | null => {
  if (row.discount_type === 'fixed' && row.discount_value !== null) {
    return { type: 'fixed', value: Money.fromDecimal(row.discount_value) };
  }
  if (row.discount_type === 'percentage' && row.discount_value !== null) {
    return { type: 'percentage', value: Percentage.fromValue(row.discount_value) };
  }
  return null;
};

const toInvoice = (row: InvoiceRow): Invoice => ({
  id: row.id,
  invoice_number: row.invoice_number,
  client_id: row.client_id,
  project_id: row.project_id,
  invoice_date: row.invoice_date,
  due_date: row.due_date,
  tax_rate: Percentage.fromValue(row.tax_rate),
  discount: toDiscount(row),
  sub_total: Money.fromDecimal(row.sub_total),
  discount_amount: Money.fromDecimal(row.discount_amount),
  tax_amount: Money.fromDecimal(row.tax_amount),
  total_amount: Money.fromDecimal(row.total_amount),
  currency: row.currency,
  status: row.status,
  notes: row.notes,
  version: row.version,
  created_at: row.created_at,
  updated_at: row.updated_at,
});

const toItem = (row: InvoiceItemRow): InvoiceItem => ({
  id: row.id,
  invoice_id: row.invoice_id,
  position: row.position,
  description: row.description,
  quantity: parseQuantity(row.quantity),
  unit_price: Money.fromDecimal(row.unit_price),
  tax_rate: row.tax_rate === null ? null : Percentage.fromValue(row.tax_rate),
  total_price: Money.fromDecimal(row.total_price),
});

const toTerm = (row: InvoiceTermRow): InvoiceTerm => ({
  id: row.id,
  invoice_id: row.invoice_id,
  term_number: row.term_number,
  percentage: Percentage.fromValue(row.percentage),
  amount: Money.fromDecimal(row.amount),
  due_date: row.due_date,
  description: row.description,
  status: row.status,
});

const toPayment = (row: PaymentRow): Payment => ({
  id: row.id,
  invoice_id: row.invoice_id,
  invoice_term_id: row.invoice_term_id,
  amount: Money.fromDecimal(row.amount),
  payment_type: row.payment_type,
  payment_method: row.payment_method,
  reference_number: row.reference_number,
  payment_date: row.payment_date,
  notes: row.notes,
  refunded_payment_id: row.refunded_payment_id,
  refund_reason: row.refund_reason,
  created_at: row.created_at,
});

const toTransaction = (row: TransactionRow): FinanceTransaction => ({
  id: row.id,
  account_id: row.account_id,
  invoice_id: row.invoice_id,
  project_id: row.project_id,
  payment_id: row.payment_id,
  transaction_type: row.transaction_type,
  amount: Money.fromDecimal(row.amount),
  transaction_date: row.transaction_date,
  description: row.description,
  created_at: row.created_at,
});

const isTransientPgError = (err: unknown): boolean =>
  typeof err === 'object' &&
  err !== null &&
  'code' in err &&
  (err.code === '40001' || err.code === '40P01');

const loadAggregate = async (db: Queryable, invoiceId: string, lock: boolean): Promise<InvoiceAggregate | null> => {
  const invoiceResult = await db.query<InvoiceRow>(
    `SELECT * FROM invoices WHERE id = $1${lock ? ' FOR UPDATE' : ''}`,
    [invoiceId]
  );
  if (invoiceResult.rows.length === 0) return null;

  const [items, terms, payments] = [
    await db.query<InvoiceItemRow>('SELECT * FROM invoice_items WHERE invoice_id = $1 ORDER BY position ASC', [invoiceId]),
    await db.query<InvoiceTermRow>('SELECT * FROM invoice_terms WHERE invoice_id = $1 ORDER BY term_number ASC', [invoiceId]),
    await db.query<PaymentRow>(
      'SELECT * FROM payments WHERE invoice_id = $1 ORDER BY payment_date ASC, created_at ASC',
      [invoiceId]
    ),
  ];

  return {
    invoice: toInvoice(invoiceResult.rows[0]),
    items: items.rows.map(toItem),
    terms: terms.rows.map(toTerm),
    payments: payments.rows.map(toPayment),
  };
};

const findPaymentById = async (db: Queryable, paymentId: string): Promise<Payment | null> => {
  const result = await db.query<PaymentRow>('SELECT * FROM payments WHERE id = $1', [paymentId]);
  return result.rows.length > 0 ? toPayment(result.rows[0]) : null;
};

/**
 * Unit of work bound to one pooled client inside BEGIN/COMMIT.
 * Loading an invoice takes a row lock, so concurrent writers of the same
 * invoice queue behind each other; the version check in saveInvoice is the
 * backstop for writers that skipped the lock.
 */
class PgUnitOfWork implements LedgerUnitOfWork {
  constructor(private readonly client: PoolClient) {}

  loadInvoice(invoiceId: string): Promise<InvoiceAggregate | null> {
    return loadAggregate(this.client, invoiceId, true);
  }

  async findTerm(termId: string): Promise<InvoiceTerm | null> {
    const result = await this.client.query<InvoiceTermRow>('SELECT * FROM invoice_terms WHERE id = $1', [termId]);
    return result.rows.length > 0 ? toTerm(result.rows[0]) : null;
  }

  async findActiveAccount(type: AccountType): Promise<Account | null> {
    const result = await this.client.query<AccountRow>(
      'SELECT id, code, name, type, is_active FROM accounts WHERE type = $1 AND is_active = true ORDER BY code ASC LIMIT 1',
      [type]
    );
    return result.rows.length > 0 ? result.rows[0] : null;
  }

  async nextInvoiceNumber(invoiceDate: Date): Promise<string> {
    const result = await this.client.query<{ invoice_number: string }>(
      `SELECT 'INV-' || to_char($1::date, 'YYYYMMDD') || '-' || nextval('invoice_number_seq') AS invoice_number`,
      [toIsoDate(invoiceDate)]
    );
    return result.rows[0].invoice_number;
  }

  async insertInvoice(invoice: NewInvoice): Promise<Invoice> {
    const result = await this.client.query<InvoiceRow>(
      `INSERT INTO invoices (
        invoice_number, client_id, project_id, invoice_date, due_date, tax_rate,
        discount_type, discount_value, sub_total, discount_amount, tax_amount, total_amount,
        currency, status, notes
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)
      RETURNING *`,
      [
        invoice.invoice_number,
        invoice.client_id,
        invoice.project_id,
        toIsoDate(invoice.invoice_date),
        toIsoDate(invoice.due_date),
        invoice.tax_rate.toDecimal(),
        invoice.discount?.type ?? null,
        invoice.discount ? invoice.discount.value.toDecimal() : null,
        invoice.sub_total.toDecimal(),
        invoice.discount_amount.toDecimal(),
        invoice.tax_amount.toDecimal(),
        invoice.total_amount.toDecimal(),
        invoice.currency,
        invoice.status,
        invoice.notes,
      ]
    );
    return toInvoice(result.rows[0]);
  }

  async saveInvoice(invoice: Invoice): Promise<Invoice> {
    const result = await this.client.query<InvoiceRow>(
      `UPDATE invoices SET
        client_id = $1, project_id = $2, invoice_date = $3, due_date = $4, tax_rate = $5,
        discount_type = $6, discount_value = $7, sub_total = $8, discount_amount = $9,
        tax_amount = $10, total_amount = $11, currency = $12, status = $13, notes = $14,
        version = version + 1, updated_at = CURRENT_TIMESTAMP
      WHERE id = $15 AND version = $16
      RETURNING *`,
      [
        invoice.client_id,
        invoice.project_id,
        toIsoDate(invoice.invoice_date),
        toIsoDate(invoice.due_date),
        invoice.tax_rate.toDecimal(),
        invoice.discount?.type ?? null,
        invoice.discount ? invoice.discount.value.toDecimal() : null,
        invoice.sub_total.toDecimal(),
        invoice.discount_amount.toDecimal(),
        invoice.tax_amount.toDecimal(),
        invoice.total_amount.toDecimal(),
        invoice.currency,
        invoice.status,
        invoice.notes,
        invoice.id,
        invoice.version,
      ]
    );
    if (result.rows.length === 0) {
      throw new LedgerConflictError(`Invoice ${invoice.id} changed since version ${invoice.version}`);
    }
    return toInvoice(result.rows[0]);
  }

  async deleteInvoice(invoiceId: string, expectedVersion: number): Promise<void> {
    const result = await this.client.query('DELETE FROM invoices WHERE id = $1 AND version = $2', [
      invoiceId,
      expectedVersion,
    ]);
    if ((result.rowCount ?? 0) === 0) {
      throw new LedgerConflictError(`Invoice ${invoiceId} changed since version ${expectedVersion}`);
    }
  }

  async replaceItems(invoiceId: string, items: NewInvoiceItem[]): Promise<InvoiceItem[]> {
    await this.client.query('DELETE FROM invoice_items WHERE invoice_id = $1', [invoiceId]);
    const inserted: InvoiceItem[] = [];
    for (const item of items) {
      const result = await this.client.query<InvoiceItemRow>(
        `INSERT INTO invoice_items (invoice_id, position, description, quantity, unit_price, tax_rate, total_price)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING *`,
        [
          invoiceId,
          item.position,
          item.description,
          formatQuantity(item.quantity),
          item.unit_price.toDecimal(),
          item.tax_rate ? item.tax_rate.toDecimal() : null,
          item.total_price.toDecimal(),
        ]
      );
      inserted.push(toItem(result.rows[0]));
    }
    return inserted;
  }

  async replaceTerms(invoiceId: string, terms: NewInvoiceTerm[]): Promise<InvoiceTerm[]> {
    await this.client.query('DELETE FROM invoice_terms WHERE invoice_id = $1', [invoiceId]);
    const inserted: InvoiceTerm[] = [];
    for (const term of terms) {
      const result = await this.client.query<InvoiceTermRow>(
        `INSERT INTO invoice_terms (invoice_id, term_number, percentage, amount, due_date, description, status)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING *`,
        [
          invoiceId,
          term.term_number,
          term.percentage.toDecimal(),
          term.amount.toDecimal(),
          toIsoDate(term.due_date),
          term.description,
          term.status,
        ]
      );
      inserted.push(toTerm(result.rows[0]));
    }
    return inserted;
  }

  async setTermStatus(termId: string, status: TermStatus): Promise<void> {
    await this.client.query('UPDATE invoice_terms SET status = $1 WHERE id = $2', [status, termId]);
  }

  async insertPayment(payment: NewPayment): Promise<Payment> {
    const result = await this.client.query<PaymentRow>(
      `INSERT INTO payments (
        invoice_id, invoice_term_id, amount, payment_type, payment_method, reference_number,
        payment_date, notes, refunded_payment_id, refund_reason
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
      RETURNING *`,
      [
        payment.invoice_id,
        payment.invoice_term_id,
        payment.amount.toDecimal(),
        payment.payment_type,
        payment.payment_method,
        payment.reference_number,
        toIsoDate(payment.payment_date),
        payment.notes,
        payment.refunded_payment_id,
        payment.refund_reason,
      ]
    );
    return toPayment(result.rows[0]);
  }

  async insertTransaction(transaction: NewFinanceTransaction): Promise<FinanceTransaction> {
    const result = await this.client.query<TransactionRow>(
      `INSERT INTO finance_transactions (
        account_id, invoice_id, project_id, payment_id, transaction_type, amount, transaction_date, description
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      RETURNING *`,
      [
        transaction.account_id,
        transaction.invoice_id,
        transaction.project_id,
        transaction.payment_id,
        transaction.transaction_type,
        transaction.amount.toDecimal(),
        toIsoDate(transaction.transaction_date),
        transaction.description,
      ]
    );
    return toTransaction(result.rows[0]);
  }
}

const whereClause = (conditions: string[]): string =>
  conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

const asError = (err: unknown): Error => (err instanceof Error ? err : new Error(String(err)));

/**
 * PostgreSQL implementation of the ledger persistence boundary.
 */
export class PgLedgerStore implements LedgerStore {
  constructor(private readonly pool: Pool) {}

  async transaction<T>(work: (uow: LedgerUnitOfWork) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    // A client whose rollback failed is handed back to pg to be destroyed.
    let brokenConnection: Error | undefined;
    try {
      await client.query('BEGIN');
      const result = await work(new PgUnitOfWork(client));
      await client.query('COMMIT');
      return result;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        console.error('[PgLedgerStore] Rollback failed:', rollbackError);
        brokenConnection = asError(rollbackError);
      }
      if (isTransientPgError(err)) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new LedgerConflictError(`Transaction aborted by the database: ${reason}`);
      }
      throw err;
    } finally {
      client.release(brokenConnection);
    }
  }

  /**
   * Runs reads on one client inside a read-only snapshot, so the invoice row
   * and its payments come from the same point in time.
   */
  private async readSnapshot<T>(read: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    let brokenConnection: Error | undefined;
    try {
      await client.query('BEGIN READ ONLY ISOLATION LEVEL REPEATABLE READ');
      const result = await read(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        console.error('[PgLedgerStore] Rollback failed:', rollbackError);
        brokenConnection = asError(rollbackError);
      }
      throw err;
    } finally {
      client.release(brokenConnection);
    }
  }

  findInvoice(invoiceId: string): Promise<InvoiceAggregate | null> {
    return this.readSnapshot((client) => loadAggregate(client, invoiceId, false));
  }

  findPayment(paymentId: string): Promise<Payment | null> {
    return findPaymentById(this.pool, paymentId);
  }

  async listInvoices(filter: InvoiceFilter = {}): Promise<Invoice[]> {
    const conditions: string[] = [];
    const values: Array<string | number> = [];
    const add = (condition: string, value: string | number): void => {
      values.push(value);
      conditions.push(`${condition} $${values.length}`);
    };
    if (filter.status !== undefined) add('status =', filter.status);
    if (filter.client_id !== undefined) add('client_id =', filter.client_id);
    if (filter.from !== undefined) add('invoice_date >=', toIsoDate(filter.from));
    if (filter.to !== undefined) add('invoice_date <=', toIsoDate(filter.to));
    if (filter.due_before !== undefined) add('due_date <', toIsoDate(filter.due_before));
    if (filter.due_from !== undefined) add('due_date >=', toIsoDate(filter.due_from));

    let queryText = `SELECT * FROM invoices ${whereClause(conditions)} ORDER BY ${
      filter.newest_first ? 'created_at DESC' : 'invoice_date ASC, created_at ASC'
    }`;
    if (filter.limit !== undefined) {
      values.push(filter.limit);
      queryText += ` LIMIT $${values.length}`;
    }
    const result = await this.pool.query<InvoiceRow>(queryText, values);
    return result.rows.map(toInvoice);
  }

  async listPayments(filter: PaymentFilter = {}): Promise<Payment[]> {
    const conditions: string[] = [];
    const values: Array<string | number> = [];
    const add = (condition: string, value: string | number): void => {
      values.push(value);
      conditions.push(`${condition} $${values.length}`);
    };
    if (filter.from !== undefined) add('payment_date >=', toIsoDate(filter.from));
    if (filter.to !== undefined) add('payment_date <=', toIsoDate(filter.to));
    if (filter.payment_type !== undefined) add('payment_type =', filter.payment_type);

    let queryText = `SELECT * FROM payments ${whereClause(conditions)} ORDER BY ${
      filter.newest_first ? 'payment_date DESC, created_at DESC' : 'payment_date ASC, created_at ASC'
    }`;
    if (filter.limit !== undefined) {
      values.push(filter.limit);
      queryText += ` LIMIT $${values.length}`;
    }
    const result = await this.pool.query<PaymentRow>(queryText, values);
    return result.rows.map(toPayment);
  }

  async listTransactions(filter: TransactionFilter = {}): Promise<FinanceTransaction[]> {
    const { where, values } = transactionRange(filter);
    const result = await this.pool.query<TransactionRow>(
      `SELECT * FROM finance_transactions ${where} ORDER BY transaction_date ASC, created_at ASC`,
      values
    );
    return result.rows.map(toTransaction);
  }

  async sumTransactions(filter: TransactionFilter = {}): Promise<TransactionTotals> {
    const { where, values } = transactionRange(filter);
    const result = await this.pool.query<{ transaction_type: TransactionType; total: string }>(
      `SELECT transaction_type, COALESCE(SUM(amount), 0)::text AS total
       FROM finance_transactions ${where}
       GROUP BY transaction_type`,
      values
    );
    const totals: TransactionTotals = { income: Money.zero(), expense: Money.zero() };
    for (const row of result.rows) {
      totals[row.transaction_type] = Money.fromDecimal(row.total);
    }
    return totals;
  }

  async countRecords(): Promise<LedgerCounts> {
    const result = await this.pool.query<{ invoices: string; payments: string; refunds: string }>(
      `SELECT
        (SELECT COUNT(*) FROM invoices)::text AS invoices,
        (SELECT COUNT(*) FROM payments WHERE payment_type = 'payment')::text AS payments,
        (SELECT COUNT(*) FROM payments WHERE payment_type = 'refund')::text AS refunds`
    );
    const row = result.rows[0];
    return {
      invoices: Number(row.invoices),
      payments: Number(row.payments),
      refunds: Number(row.refunds),
    };
  }
}

const transactionRange = (filter: TransactionFilter): { where: string; values: string[] } => {
  const conditions: string[] = [];
  const values: string[] = [];
  if (filter.from !== undefined) {
    values.push(toIsoDate(filter.from));
    conditions.push(`transaction_date >= $${values.length}`);
  }
  if (filter.to !== undefined) {
    values.push(toIsoDate(filter.to));
    conditions.push(`transaction_date <= $${values.length}`);
  }
  return { where: whereClause(conditions), values };
};

/**
 * Client/project existence checks against the application's own tables.
 */
export class PgClientDirectory implements ClientDirectory {
  constructor(private readonly pool: Pool) {}

  async clientExists(clientId: string): Promise<boolean> {
    const result = await this.pool.query('SELECT 1 FROM clients WHERE id = $1', [clientId]);
    return result.rows.length > 0;
  }

  async projectBelongsToClient(projectId: string, clientId: string): Promise<boolean> {
    const result = await this.pool.query('SELECT 1 FROM projects WHERE id = $1 AND client_id = $2', [
      projectId,
      clientId,
    ]);
    return result.rows.length > 0;
  }
}
