import {
  EffectiveInvoiceStatus,
  EffectiveTermStatus,
  Invoice,
  InvoiceAggregate,
  InvoiceStatus,
  InvoiceTerm,
  InvoiceView,
  TermStatus,
} from '../../models/financial/invoice.model';
import { Payment } from '../../models/financial/payment.model';
import { daysBetween, startOfUtcDay } from '../../utils/dates';
import { Money, formatQuantity, ratioPercent } from '../../utils/money';

export interface InvoiceBalance {
  paid: Money;
  remaining: Money;
  /** Net amount paid per term id, refunds included. */
  termPaid: Map<string, Money>;
}

/**
 * Recomputes the paid amount from the payment history. Refund entries are
 * negative and reduce both the invoice and the term they belong to.
 */
export function computeBalance(invoice: Invoice, payments: Payment[]): InvoiceBalance {
  const termPaid = new Map<string, Money>();
  let paid = Money.zero();
  for (const payment of payments) {
    paid = paid.add(payment.amount);
    if (payment.invoice_term_id) {
      termPaid.set(payment.invoice_term_id, (termPaid.get(payment.invoice_term_id) ?? Money.zero()).add(payment.amount));
    }
  }
  return { paid, remaining: invoice.total_amount.subtract(paid), termPaid };
}

export const termRemaining = (term: InvoiceTerm, balance: InvoiceBalance): Money =>
  term.amount.subtract(balance.termPaid.get(term.id) ?? Money.zero());

/**
 * Stored status after a balance change: a sent invoice that is covered becomes
 * paid, a paid invoice that lost coverage goes back to sent.
 */
export function resolveInvoiceStatus(invoice: Invoice, balance: InvoiceBalance): InvoiceStatus {
  const covered = !balance.paid.lessThan(invoice.total_amount);
  if (invoice.status === 'sent' && covered) return 'paid';
  if (invoice.status === 'paid' && !covered) return 'sent';
  return invoice.status;
}

/**
 * Stored term status for a given invoice status and balance. Every term of a
 * paid invoice is paid; otherwise a term is paid once its own amount is covered.
 */
export function resolveTermStatus(
  term: InvoiceTerm,
  invoiceStatus: InvoiceStatus,
  balance: InvoiceBalance
): TermStatus {
  if (invoiceStatus === 'paid') return 'paid';
  const paid = balance.termPaid.get(term.id) ?? Money.zero();
  return term.amount.isPositive() && !paid.lessThan(term.amount) ? 'paid' : 'pending';
}

export const isPastDue = (dueDate: Date, now: Date): boolean =>
  startOfUtcDay(dueDate).getTime() < startOfUtcDay(now).getTime();

/**
 * Effective status from the invoice row alone. A stored `sent` invoice always
 * has a balance left, since covering it moves it to `paid`.
 */
export const effectiveStatusAt = (invoice: Invoice, now: Date): EffectiveInvoiceStatus =>
  invoice.status === 'sent' && isPastDue(invoice.due_date, now) ? 'overdue' : invoice.status;

export function deriveInvoiceStatus(invoice: Invoice, balance: InvoiceBalance, now: Date): EffectiveInvoiceStatus {
  if (invoice.status === 'sent' && isPastDue(invoice.due_date, now) && balance.paid.lessThan(invoice.total_amount)) {
    return 'overdue';
  }
  return invoice.status;
}

export function deriveTermStatus(term: InvoiceTerm, invoiceStatus: InvoiceStatus, now: Date): EffectiveTermStatus {
  if (
    term.status === 'pending' &&
    invoiceStatus !== 'paid' &&
    invoiceStatus !== 'cancelled' &&
    isPastDue(term.due_date, now)
  ) {
    return 'overdue';
  }
  return term.status;
}

/**
 * Read model of an invoice with balances, effective statuses and counters.
 */
export function buildInvoiceView(aggregate: InvoiceAggregate, now: Date): InvoiceView {
  const { invoice, items, terms, payments } = aggregate;
  const balance = computeBalance(invoice, payments);
  const status = deriveInvoiceStatus(invoice, balance, now);
  const isFullyPaid = invoice.status === 'paid';

  const termViews = terms.map((term) => {
    const paidAmount = balance.termPaid.get(term.id) ?? Money.zero();
    return {
      ...term,
      status: deriveTermStatus(term, invoice.status, now),
      paid_amount: paidAmount,
      remaining_balance: Money.max(term.amount.subtract(paidAmount), Money.zero()),
    };
  });

  return {
    ...invoice,
    status,
    paid_amount: balance.paid,
    remaining_balance: balance.remaining,
    payment_percentage: invoice.total_amount.isZero()
      ? isFullyPaid ? 100 : 0
      : ratioPercent(balance.paid, invoice.total_amount),
    is_fully_paid: isFullyPaid,
    is_partially_paid: balance.paid.isPositive() && balance.paid.lessThan(invoice.total_amount),
    days_overdue: status === 'overdue' ? daysBetween(invoice.due_date, now) : 0,
    items: items.map((item) => ({ ...item, quantity: formatQuantity(item.quantity) })),
    terms: termViews,
    payments,
    statistics: {
      total_items: items.length,
      total_terms: terms.length,
      total_payments: payments.filter((payment) => payment.payment_type === 'payment').length,
      paid_terms: termViews.filter((term) => term.status === 'paid').length,
      pending_terms: termViews.filter((term) => term.status === 'pending').length,
      overdue_terms: termViews.filter((term) => term.status === 'overdue').length,
    },
  };
}
