import { Payment, PaymentMethod } from '../../models/financial/payment.model';
import { LedgerStore } from '../../repositories/ledger.store';
import { addDays, toIsoDate } from '../../utils/dates';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { Money } from '../../utils/money';

export interface PaymentTotals {
  count: number;
  total: Money;
}

export interface DailyPaymentTotals extends PaymentTotals {
  date: string;
}

export interface PaymentStatistics {
  period: { from: string | null; to: string | null };
  count: number;
  total_received: Money;
  average_payment: Money;
  total_refunded: Money;
  refund_count: number;
  net_received: Money;
  by_method: Record<PaymentMethod, PaymentTotals>;
  daily: DailyPaymentTotals[];
}

export interface StatisticsRange {
  from?: Date;
  to?: Date;
}

export interface PaymentTrendPoint extends DailyPaymentTotals {
  average: Money;
}

export interface PaymentServiceOptions {
  now?: () => Date;
}

const average = (total: Money, count: number): Money =>
  count > 0 ? total.multiply(1n, BigInt(count)) : Money.zero();

const emptyTotals = (): PaymentTotals => ({ count: 0, total: Money.zero() });

/**
 * Read side of the payment ledger.
 */
export class PaymentService {
  private readonly now: () => Date;

  constructor(private readonly store: LedgerStore, options: PaymentServiceOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async findById(paymentId: string): Promise<Payment> {
    const payment = await this.store.findPayment(paymentId);
    if (!payment) {
      throw new NotFoundError('Payment', paymentId);
    }
    return payment;
  }

  /**
   * Payments and refunds of an invoice, oldest first.
   */
  async findByInvoiceId(invoiceId: string): Promise<Payment[]> {
    const aggregate = await this.store.findInvoice(invoiceId);
    if (!aggregate) {
      throw new NotFoundError('Invoice', invoiceId);
    }
    return aggregate.payments;
  }

  /**
   * Aggregates received payments in a date range. Refund entries are kept out
   * of the counts and reported as `total_refunded`.
   */
  async getStatistics(range: StatisticsRange = {}): Promise<PaymentStatistics> {
    const entries = await this.store.listPayments({ from: range.from, to: range.to });
    const payments = entries.filter((entry) => entry.payment_type === 'payment');
    const refunds = entries.filter((entry) => entry.payment_type === 'refund');

    const byMethod: Record<PaymentMethod, PaymentTotals> = {
      cash: emptyTotals(),
      bank_transfer: emptyTotals(),
      card: emptyTotals(),
      check: emptyTotals(),
      other: emptyTotals(),
    };
    const daily = new Map<string, DailyPaymentTotals>();

    for (const payment of payments) {
      const method = byMethod[payment.payment_method];
      method.count += 1;
      method.total = method.total.add(payment.amount);

      const date = toIsoDate(payment.payment_date);
      const day = daily.get(date) ?? { date, count: 0, total: Money.zero() };
      day.count += 1;
      day.total = day.total.add(payment.amount);
      daily.set(date, day);
    }

    const totalReceived = Money.sum(payments.map((payment) => payment.amount));
    const totalRefunded = Money.sum(refunds.map((refund) => refund.amount.abs()));

    return {
      period: {
        from: range.from ? toIsoDate(range.from) : null,
        to: range.to ? toIsoDate(range.to) : null,
      },
      count: payments.length,
      total_received: totalReceived,
      average_payment: average(totalReceived, payments.length),
      total_refunded: totalRefunded,
      refund_count: refunds.length,
      net_received: totalReceived.subtract(totalRefunded),
      by_method: byMethod,
      daily: [...daily.values()].sort((a, b) => a.date.localeCompare(b.date)),
    };
  }

  /**
   * Received payments per day over the last `days` days, today included.
   * Days without payments are left out; refunds are not counted.
   *
   * @example
   * const trend = await paymentService.getPaymentTrends(7);
   * // [{ date: '2024-03-12', count: 2, total: 450.00, average: 225.00 }, ...]
   */
  async getPaymentTrends(days: number = 30): Promise<PaymentTrendPoint[]> {
    if (!Number.isInteger(days) || days < 1) {
      throw new ValidationError(`Trend window must be a positive number of days, got ${days}`);
    }
    const today = this.now();
    const payments = await this.store.listPayments({
      from: addDays(today, -(days - 1)),
      to: today,
      payment_type: 'payment',
    });

    const byDay = new Map<string, DailyPaymentTotals>();
    for (const payment of payments) {
      const date = toIsoDate(payment.payment_date);
      const day = byDay.get(date) ?? { date, count: 0, total: Money.zero() };
      day.count += 1;
      day.total = day.total.add(payment.amount);
      byDay.set(date, day);
    }
    return [...byDay.values()].map((day) => ({ ...day, average: average(day.total, day.count) }));
  }
}
