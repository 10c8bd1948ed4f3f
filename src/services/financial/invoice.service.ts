import {
  CreateInvoiceDto,
  DiscountInput,
  InvoiceAggregate,
  Invoice,
  InvoiceItemInput,
  InvoiceListEntry,
  InvoiceListFilter,
  InvoiceTermInput,
  InvoiceView,
  UpdateInvoiceDto,
} from '../../models/financial/invoice.model';
import { ClientDirectory, InvoiceFilter, LedgerStore } from '../../repositories/ledger.store';
import { config } from '../../utils/config';
import { addDays, startOfUtcDay } from '../../utils/dates';
import { InvalidScheduleError, InvalidTransitionError, NotFoundError, ValidationError, errorMessage } from '../../utils/errors';
import { Money, formatQuantity } from '../../utils/money';
import { calculateInvoiceTotals } from './invoice-calculator';
import { buildInvoiceView, effectiveStatusAt } from './invoice-balance';
import { RetryPolicy, defaultRetryPolicy, reconcileInvoice, runLedgerTransaction } from './ledger-transaction';
import { LedgerServiceOptions, loadInvoiceOrFail } from './payment-ledger.service';
import { scheduleTerms } from './term-scheduler';

const CURRENCY_PATTERN = /^[A-Z]{3}$/;

export interface InvoiceServiceOptions extends LedgerServiceOptions {
  defaultCurrency?: string;
  /** Days between invoice date and the default due date. */
  invoiceDueDays?: number;
}

const normalizeCurrency = (currency: string): string => {
  const code = currency.trim().toUpperCase();
  if (!CURRENCY_PATTERN.test(code)) {
    throw new ValidationError(`Currency must be a three-letter ISO 4217 code, got "${currency}"`);
  }
  return code;
};

const checkDates = (invoiceDate: Date, dueDate: Date): void => {
  if (Number.isNaN(invoiceDate.getTime()) || Number.isNaN(dueDate.getTime())) {
    throw new ValidationError('Invoice date and due date must be valid dates');
  }
  if (startOfUtcDay(dueDate).getTime() < startOfUtcDay(invoiceDate).getTime()) {
    throw new ValidationError('Due date must be on or after the invoice date');
  }
};

const itemsAsInput = (aggregate: InvoiceAggregate): InvoiceItemInput[] =>
  aggregate.items.map((item) => ({
    description: item.description,
    quantity: String(formatQuantity(item.quantity)),
    unit_price: item.unit_price.toDecimal(),
    tax_rate: item.tax_rate ? item.tax_rate.toDecimal() : null,
  }));

const discountAsInput = (aggregate: InvoiceAggregate): DiscountInput | null => {
  const { discount } = aggregate.invoice;
  if (!discount) return null;
  return { type: discount.type, value: discount.value.toDecimal() };
};

const termsAsInput = (aggregate: InvoiceAggregate): InvoiceTermInput[] =>
  aggregate.terms.map((term) => ({
    term_number: term.term_number,
    percentage: term.percentage.toDecimal(),
    due_date: term.due_date,
    description: term.description,
  }));

/**
 * Invoice lifecycle up to the point where payments take over: drafting,
 * editing, scheduling terms and sending.
 *
 * Drafts are freely editable; once sent, items, dates and terms are frozen and
 * only the payment ledger changes the invoice.
 */
export class InvoiceService {
  private readonly policy: RetryPolicy;
  private readonly now: () => Date;
  private readonly defaultCurrency: string;
  private readonly invoiceDueDays: number;

  constructor(
    private readonly store: LedgerStore,
    private readonly clients: ClientDirectory,
    options: InvoiceServiceOptions = {}
  ) {
    const defaults = defaultRetryPolicy();
    this.policy = {
      maxAttempts: options.maxAttempts ?? defaults.maxAttempts,
      retryDelayMs: options.retryDelayMs ?? defaults.retryDelayMs,
    };
    this.now = options.now ?? (() => new Date());
    this.defaultCurrency = options.defaultCurrency ?? config.defaultCurrency;
    this.invoiceDueDays = options.invoiceDueDays ?? config.invoiceDueDays;
  }

  /**
   * Creates a draft invoice with computed totals and a generated number.
   *
   * @example
   * const invoice = await invoiceService.createInvoice({
   *   client_id: 'client-uuid',
   *   items: [{ description: 'Consulting', quantity: 2, unit_price: '100.00' }],
   *   tax_rate: 10,
   * });
   * // invoice.invoice_number: INV-20240115-1, invoice.total_amount: 220.00
   */
  async createInvoice(dto: CreateInvoiceDto): Promise<InvoiceView> {
    await this.checkClient(dto.client_id, dto.project_id ?? null);

    const invoiceDate = startOfUtcDay(dto.invoice_date ?? this.now());
    const dueDate = dto.due_date ?? addDays(invoiceDate, this.invoiceDueDays);
    checkDates(invoiceDate, dueDate);
    const currency = normalizeCurrency(dto.currency ?? this.defaultCurrency);
    const totals = calculateInvoiceTotals(dto.items ?? [], dto.tax_rate ?? 0, dto.discount);

    try {
      const aggregate = await this.store.transaction(async (uow) => {
        const invoiceNumber = await uow.nextInvoiceNumber(invoiceDate);
        const invoice = await uow.insertInvoice({
          invoice_number: invoiceNumber,
          client_id: dto.client_id,
          project_id: dto.project_id ?? null,
          invoice_date: invoiceDate,
          due_date: dueDate,
          tax_rate: totals.tax_rate,
          discount: totals.discount,
          sub_total: totals.sub_total,
          discount_amount: totals.discount_amount,
          tax_amount: totals.tax_amount,
          total_amount: totals.total_amount,
          currency,
          status: 'draft',
          notes: dto.notes ?? null,
        });
        const items = await uow.replaceItems(invoice.id, totals.items);
        return { invoice, items, terms: [], payments: [] };
      });

      console.log(
        `[InvoiceService] Created invoice ${aggregate.invoice.invoice_number} (${aggregate.invoice.total_amount.toDecimal()} ${currency})`
      );
      return buildInvoiceView(aggregate, this.now());
    } catch (err) {
      console.error('[InvoiceService] Error creating invoice:', errorMessage(err));
      throw err;
    }
  }

  /**
   * Updates a draft invoice and recomputes its totals. Supplying `items`
   * replaces all line items. Existing terms keep their percentages and are
   * re-split over the new total.
   */
  async updateInvoice(invoiceId: string, dto: UpdateInvoiceDto): Promise<InvoiceView> {
    try {
      const aggregate = await runLedgerTransaction(this.store, invoiceId, this.policy, async (uow) => {
        const current = await loadInvoiceOrFail(uow, invoiceId);
        const { invoice } = current;
        if (invoice.status !== 'draft') {
          throw new InvalidTransitionError(invoice.status, 'draft', `Only draft invoices can be updated; invoice is ${invoice.status}`);
        }

        const clientId = dto.client_id ?? invoice.client_id;
        const projectId = dto.project_id !== undefined ? dto.project_id : invoice.project_id;
        if (dto.client_id !== undefined || dto.project_id !== undefined) {
          await this.checkClient(clientId, projectId);
        }

        const invoiceDate = dto.invoice_date ? startOfUtcDay(dto.invoice_date) : invoice.invoice_date;
        const dueDate = dto.due_date ?? invoice.due_date;
        checkDates(invoiceDate, dueDate);

        const totals = calculateInvoiceTotals(
          dto.items ?? itemsAsInput(current),
          dto.tax_rate ?? invoice.tax_rate.toDecimal(),
          dto.discount !== undefined ? dto.discount : discountAsInput(current)
        );

        const items = await uow.replaceItems(invoice.id, totals.items);
        const terms =
          current.terms.length > 0
            ? await uow.replaceTerms(invoice.id, scheduleTerms(totals.total_amount, termsAsInput(current)))
            : current.terms;

        const saved = await uow.saveInvoice({
          ...invoice,
          client_id: clientId,
          project_id: projectId,
          invoice_date: invoiceDate,
          due_date: dueDate,
          tax_rate: totals.tax_rate,
          discount: totals.discount,
          sub_total: totals.sub_total,
          discount_amount: totals.discount_amount,
          tax_amount: totals.tax_amount,
          total_amount: totals.total_amount,
          currency: dto.currency !== undefined ? normalizeCurrency(dto.currency) : invoice.currency,
          notes: dto.notes !== undefined ? dto.notes : invoice.notes,
        });
        return { ...current, invoice: saved, items, terms };
      });

      console.log(`[InvoiceService] Updated invoice ${aggregate.invoice.invoice_number}`);
      return buildInvoiceView(aggregate, this.now());
    } catch (err) {
      console.error(`[InvoiceService] Error updating invoice ${invoiceId}:`, errorMessage(err));
      throw err;
    }
  }

  /**
   * Deletes a draft invoice with its items and terms.
   */
  async deleteInvoice(invoiceId: string): Promise<void> {
    await runLedgerTransaction(this.store, invoiceId, this.policy, async (uow) => {
      const { invoice } = await loadInvoiceOrFail(uow, invoiceId);
      if (invoice.status !== 'draft') {
        throw new InvalidTransitionError(invoice.status, 'deleted', `Only draft invoices can be deleted; invoice is ${invoice.status}`);
      }
      await uow.deleteInvoice(invoice.id, invoice.version);
    });
    console.log(`[InvoiceService] Deleted invoice ${invoiceId}`);
  }

  async getInvoice(invoiceId: string): Promise<InvoiceView> {
    const aggregate = await this.store.findInvoice(invoiceId);
    if (!aggregate) {
      throw new NotFoundError('Invoice', invoiceId);
    }
    return buildInvoiceView(aggregate, this.now());
  }

  /**
   * Lists invoices by effective status, client and invoice date range,
   * oldest invoice date first.
   *
   * @example
   * const overdue = await invoiceService.listInvoices({ status: 'overdue', client_id: 'client-uuid' });
   */
  async listInvoices(filter: InvoiceListFilter = {}): Promise<InvoiceListEntry[]> {
    const today = startOfUtcDay(this.now());
    const { status, ...range } = filter;
    const storeFilter: InvoiceFilter = { ...range };
    if (status === 'overdue') {
      storeFilter.status = 'sent';
      storeFilter.due_before = today;
    } else if (status === 'sent') {
      storeFilter.status = 'sent';
      storeFilter.due_from = today;
    } else {
      storeFilter.status = status;
    }
    return this.toListEntries(await this.store.listInvoices(storeFilter), today);
  }

  listOverdue(clientId?: string): Promise<InvoiceListEntry[]> {
    return this.listInvoices({ status: 'overdue', client_id: clientId });
  }

  /**
   * Invoices still awaiting payment: every sent invoice, overdue or not.
   */
  async listUnpaid(clientId?: string): Promise<InvoiceListEntry[]> {
    const invoices = await this.store.listInvoices({ status: 'sent', client_id: clientId });
    return this.toListEntries(invoices, startOfUtcDay(this.now()));
  }

  private toListEntries(invoices: Invoice[], today: Date): InvoiceListEntry[] {
    return invoices.map((invoice) => ({ ...invoice, status: effectiveStatusAt(invoice, today) }));
  }

  /**
   * Replaces the payment schedule of a draft invoice. An empty list removes it.
   */
  async setTerms(invoiceId: string, terms: InvoiceTermInput[]): Promise<InvoiceView> {
    const aggregate = await runLedgerTransaction(this.store, invoiceId, this.policy, async (uow) => {
      const current = await loadInvoiceOrFail(uow, invoiceId);
      const { invoice } = current;
      if (invoice.status !== 'draft') {
        throw new InvalidTransitionError(invoice.status, invoice.status, `Terms can only be changed on a draft invoice; invoice is ${invoice.status}`);
      }
      const scheduled = await uow.replaceTerms(invoice.id, scheduleTerms(invoice.total_amount, terms));
      const saved = await uow.saveInvoice(invoice);
      return { ...current, invoice: saved, terms: scheduled };
    });

    console.log(`[InvoiceService] Scheduled ${aggregate.terms.length} terms on invoice ${aggregate.invoice.invoice_number}`);
    return buildInvoiceView(aggregate, this.now());
  }

  /**
   * Moves a draft to sent. An invoice with a zero total is settled on sending.
   */
  async sendInvoice(invoiceId: string): Promise<InvoiceView> {
    const aggregate = await runLedgerTransaction(this.store, invoiceId, this.policy, async (uow) => {
      const current = await loadInvoiceOrFail(uow, invoiceId);
      const { invoice } = current;
      if (invoice.status !== 'draft') {
        throw new InvalidTransitionError(invoice.status, 'sent');
      }
      if (current.items.length === 0) {
        throw new ValidationError(`Invoice ${invoice.invoice_number} has no items and cannot be sent`);
      }
      if (current.terms.length > 0) {
        const scheduled = Money.sum(current.terms.map((term) => term.amount));
        if (!scheduled.equals(invoice.total_amount)) {
          throw new InvalidScheduleError(
            `Terms add up to ${scheduled.toDecimal()} but the invoice total is ${invoice.total_amount.toDecimal()}`
          );
        }
      }
      return reconcileInvoice(uow, { ...current, invoice: { ...invoice, status: 'sent' } });
    });

    console.log(`[InvoiceService] Sent invoice ${aggregate.invoice.invoice_number} (status ${aggregate.invoice.status})`);
    return buildInvoiceView(aggregate, this.now());
  }

  private async checkClient(clientId: string, projectId: string | null): Promise<void> {
    if (!(await this.clients.clientExists(clientId))) {
      throw new ValidationError(`Client ${clientId} does not exist`);
    }
    if (projectId && !(await this.clients.projectBelongsToClient(projectId, clientId))) {
      throw new ValidationError(`Project ${projectId} does not belong to client ${clientId}`);
    }
  }
}
