import { InvoiceAggregate, InvoiceTerm, InvoiceView } from '../../models/financial/invoice.model';
import { ApplyPaymentDto, PAYMENT_METHODS, Payment } from '../../models/financial/payment.model';
import { AccountType } from '../../models/financial/transaction.model';
import { LedgerStore, LedgerUnitOfWork } from '../../repositories/ledger.store';
import {
  InvalidTransitionError,
  NotFoundError,
  errorMessage,
  OverpaymentRejectedError,
  ValidationError,
} from '../../utils/errors';
import { Money } from '../../utils/money';
import { buildInvoiceView, computeBalance, termRemaining } from './invoice-balance';
import { RetryPolicy, defaultRetryPolicy, reconcileInvoice, runLedgerTransaction } from './ledger-transaction';

export interface LedgerServiceOptions extends Partial<RetryPolicy> {
  /** Clock used for default dates and overdue derivation. */
  now?: () => Date;
}

export interface PaymentResult {
  payment: Payment;
  invoice: InvoiceView;
}

/**
 * Loads an invoice inside a unit of work or fails with NotFound.
 */
export const loadInvoiceOrFail = async (uow: LedgerUnitOfWork, invoiceId: string): Promise<InvoiceAggregate> => {
  const aggregate = await uow.loadInvoice(invoiceId);
  if (!aggregate) {
    throw new NotFoundError('Invoice', invoiceId);
  }
  return aggregate;
};

/**
 * Finds the account a finance transaction of the given direction is posted to.
 */
export const findPostingAccount = async (uow: LedgerUnitOfWork, type: AccountType): Promise<string> => {
  const account = await uow.findActiveAccount(type);
  if (!account) {
    throw new NotFoundError('Account', `of type ${type}`);
  }
  return account.id;
};

/**
 * Records payments against invoices.
 *
 * Each payment is a single read-check-write unit of work: the invoice, its terms
 * and its payment history are loaded, the remaining balance is recomputed from
 * that history, and the payment is only written when it fits. The commit fails
 * if another writer committed against the same invoice in between, in which
 * case the whole unit is replayed on fresh data.
 */
export class PaymentLedgerService {
  private readonly policy: RetryPolicy;
  private readonly now: () => Date;

  constructor(private readonly store: LedgerStore, options: LedgerServiceOptions = {}) {
    const defaults = defaultRetryPolicy();
    this.policy = {
      maxAttempts: options.maxAttempts ?? defaults.maxAttempts,
      retryDelayMs: options.retryDelayMs ?? defaults.retryDelayMs,
    };
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Applies a payment to an invoice, optionally against one of its terms.
   *
   * @throws {ValidationError} Non-positive amount, unknown method, or a term of another invoice
   * @throws {NotFoundError} Unknown invoice or term
   * @throws {InvalidTransitionError} Invoice is draft or cancelled
   * @throws {OverpaymentRejectedError} Amount exceeds the remaining balance
   * @throws {LedgerContentionError} Retry budget exhausted
   */
  async applyPayment(dto: ApplyPaymentDto): Promise<PaymentResult> {
    const amount = Money.fromDecimal(dto.amount, 'Payment amount');
    if (!amount.isPositive()) {
      throw new ValidationError('Payment amount must be greater than 0');
    }
    if (!PAYMENT_METHODS.includes(dto.payment_method)) {
      throw new ValidationError(`Unknown payment method "${dto.payment_method}"`);
    }
    const paymentDate = dto.payment_date ?? this.now();

    try {
      const result = await runLedgerTransaction(this.store, dto.invoice_id, this.policy, async (uow) => {
        const aggregate = await loadInvoiceOrFail(uow, dto.invoice_id);
        const { invoice } = aggregate;

        if (invoice.status !== 'sent' && invoice.status !== 'paid') {
          throw new InvalidTransitionError(
            invoice.status,
            'paid',
            `Cannot record a payment on a ${invoice.status} invoice`
          );
        }

        const balance = computeBalance(invoice, aggregate.payments);
        let term: InvoiceTerm | null = null;
        if (dto.invoice_term_id) {
          term = await this.resolveTerm(uow, aggregate, dto.invoice_term_id);
        }

        const available = term ? Money.min(termRemaining(term, balance), balance.remaining) : balance.remaining;
        if (amount.greaterThan(available)) {
          throw new OverpaymentRejectedError(amount, Money.max(available, Money.zero()), term ? 'term' : 'invoice');
        }

        const accountId = await findPostingAccount(uow, 'income');
        const payment = await uow.insertPayment({
          invoice_id: invoice.id,
          invoice_term_id: term ? term.id : null,
          amount,
          payment_type: 'payment',
          payment_method: dto.payment_method,
          reference_number: dto.reference_number ?? null,
          payment_date: paymentDate,
          notes: dto.notes ?? null,
          refunded_payment_id: null,
          refund_reason: null,
        });

        await uow.insertTransaction({
          account_id: accountId,
          invoice_id: invoice.id,
          project_id: invoice.project_id,
          payment_id: payment.id,
          transaction_type: 'income',
          amount,
          transaction_date: paymentDate,
          description: `Payment received for invoice ${invoice.invoice_number}`,
        });

        const updated = await reconcileInvoice(uow, { ...aggregate, payments: [...aggregate.payments, payment] });
        return { payment, invoice: buildInvoiceView(updated, this.now()) };
      });

      console.log(
        `[PaymentLedger] Recorded payment ${result.payment.id} of ${amount.toDecimal()} on invoice ${result.invoice.invoice_number} (remaining ${result.invoice.remaining_balance.toDecimal()}, status ${result.invoice.status})`
      );
      return result;
    } catch (err) {
      console.error(`[PaymentLedger] Payment of ${amount.toDecimal()} on invoice ${dto.invoice_id} failed:`, errorMessage(err));
      throw err;
    }
  }

  /**
   * Cancels a draft or sent invoice that has no net payments.
   */
  async cancelInvoice(invoiceId: string): Promise<InvoiceView> {
    try {
      const view = await runLedgerTransaction(this.store, invoiceId, this.policy, async (uow) => {
        const aggregate = await loadInvoiceOrFail(uow, invoiceId);
        const { invoice } = aggregate;

        if (invoice.status !== 'draft' && invoice.status !== 'sent') {
          throw new InvalidTransitionError(invoice.status, 'cancelled');
        }
        const balance = computeBalance(invoice, aggregate.payments);
        if (!balance.paid.isZero()) {
          throw new InvalidTransitionError(
            invoice.status,
            'cancelled',
            `Cannot cancel invoice ${invoice.invoice_number}: ${balance.paid.toDecimal()} has been paid`
          );
        }

        const saved = await uow.saveInvoice({ ...invoice, status: 'cancelled' });
        return buildInvoiceView({ ...aggregate, invoice: saved }, this.now());
      });

      console.log(`[PaymentLedger] Cancelled invoice ${view.invoice_number}`);
      return view;
    } catch (err) {
      console.error(`[PaymentLedger] Cancelling invoice ${invoiceId} failed:`, errorMessage(err));
      throw err;
    }
  }

  private async resolveTerm(uow: LedgerUnitOfWork, aggregate: InvoiceAggregate, termId: string): Promise<InvoiceTerm> {
    const term = aggregate.terms.find((candidate) => candidate.id === termId);
    if (term) {
      return term;
    }
    const elsewhere = await uow.findTerm(termId);
    if (elsewhere) {
      throw new ValidationError(`Term ${termId} does not belong to invoice ${aggregate.invoice.id}`);
    }
    throw new NotFoundError('Invoice term', termId);
  }
}
