import { InvoiceView } from '../../models/financial/invoice.model';
import { Payment, RefundPaymentDto } from '../../models/financial/payment.model';
import { LedgerStore } from '../../repositories/ledger.store';
import { NotFoundError, RefundNotEligibleError, ValidationError, errorMessage } from '../../utils/errors';
import { Money } from '../../utils/money';
import { buildInvoiceView } from './invoice-balance';
import { RetryPolicy, defaultRetryPolicy, reconcileInvoice, runLedgerTransaction } from './ledger-transaction';
import { LedgerServiceOptions, findPostingAccount, loadInvoiceOrFail } from './payment-ledger.service';

export interface RefundResult {
  refund: Payment;
  invoice: InvoiceView;
}

/**
 * Amount of `payment` not yet returned by earlier refund entries.
 */
export const refundableAmount = (payment: Payment, history: Payment[]): Money =>
  history
    .filter((entry) => entry.payment_type === 'refund' && entry.refunded_payment_id === payment.id)
    .reduce((left, entry) => left.subtract(entry.amount.abs()), payment.amount);

export const refundReference = (payment: Payment): string =>
  `REFUND-${payment.reference_number ?? payment.id.slice(0, 8)}`;

/**
 * Returns money from a prior payment as a negative counter-entry.
 * The original payment is never modified.
 */
export class RefundService {
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
   * @throws {ValidationError} Non-positive amount or missing reason
   * @throws {NotFoundError} Unknown payment
   * @throws {RefundNotEligibleError} Refund entry, cancelled invoice, or more than the refundable amount
   * @throws {LedgerContentionError} Retry budget exhausted
   */
  async refund(dto: RefundPaymentDto): Promise<RefundResult> {
    const amount = Money.fromDecimal(dto.refund_amount, 'Refund amount');
    if (!amount.isPositive()) {
      throw new ValidationError('Refund amount must be greater than 0');
    }
    const reason = typeof dto.reason === 'string' ? dto.reason.trim() : '';
    if (reason === '') {
      throw new ValidationError('Refund reason is required');
    }

    const target = await this.store.findPayment(dto.payment_id);
    if (!target) {
      throw new NotFoundError('Payment', dto.payment_id);
    }
    const refundDate = dto.refund_date ?? this.now();

    try {
      const result = await runLedgerTransaction(this.store, target.invoice_id, this.policy, async (uow) => {
        const aggregate = await loadInvoiceOrFail(uow, target.invoice_id);
        const { invoice } = aggregate;

        const original = aggregate.payments.find((entry) => entry.id === dto.payment_id);
        if (!original) {
          throw new NotFoundError('Payment', dto.payment_id);
        }
        if (original.payment_type === 'refund') {
          throw new RefundNotEligibleError('A refund entry cannot be refunded', Money.zero());
        }
        if (invoice.status === 'cancelled') {
          throw new RefundNotEligibleError(
            `Invoice ${invoice.invoice_number} is cancelled; its payments cannot be refunded`,
            Money.zero()
          );
        }

        const refundable = refundableAmount(original, aggregate.payments);
        if (!refundable.isPositive()) {
          throw new RefundNotEligibleError(`Payment ${original.id} has already been fully refunded`, Money.zero());
        }
        if (amount.greaterThan(refundable)) {
          throw new RefundNotEligibleError(
            `Refund of ${amount.toDecimal()} exceeds the refundable amount of ${refundable.toDecimal()}`,
            refundable
          );
        }

        const accountId = await findPostingAccount(uow, 'expense');
        const refund = await uow.insertPayment({
          invoice_id: invoice.id,
          invoice_term_id: original.invoice_term_id,
          amount: amount.negate(),
          payment_type: 'refund',
          payment_method: original.payment_method,
          reference_number: refundReference(original),
          payment_date: refundDate,
          notes: null,
          refunded_payment_id: original.id,
          refund_reason: reason,
        });

        await uow.insertTransaction({
          account_id: accountId,
          invoice_id: invoice.id,
          project_id: invoice.project_id,
          payment_id: refund.id,
          transaction_type: 'expense',
          amount,
          transaction_date: refundDate,
          description: `Refund for invoice ${invoice.invoice_number}: ${reason}`,
        });

        const updated = await reconcileInvoice(uow, { ...aggregate, payments: [...aggregate.payments, refund] });
        return { refund, invoice: buildInvoiceView(updated, this.now()) };
      });

      console.log(
        `[PaymentLedger] Refunded ${amount.toDecimal()} of payment ${dto.payment_id} on invoice ${result.invoice.invoice_number} (status ${result.invoice.status})`
      );
      return result;
    } catch (err) {
      console.error(`[PaymentLedger] Refund of payment ${dto.payment_id} failed:`, errorMessage(err));
      throw err;
    }
  }
}
