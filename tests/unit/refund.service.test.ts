import { Payment } from '../../src/models/financial/payment.model';
import { refundReference, refundableAmount } from '../../src/services/financial/refund.service';
import { LedgerConflictError, LedgerContentionError, OverpaymentRejectedError } from '../../src/utils/errors';
import { Money } from '../../src/utils/money';
import {
  Ledger,
  NOW,
  UNKNOWN_ID,
  createLedger,
  createSentInvoice,
  flatItem,
  ledgerErrorOf,
  seededRandom,
} from '../helpers/fixtures';
import { EXPENSE_ACCOUNT_ID } from '../helpers/memory-ledger.store';

const entry = (overrides: Partial<Payment>): Payment => ({
  id: 'pay-00000001',
  invoice_id: 'inv-1',
  invoice_term_id: null,
  amount: Money.fromDecimal('100.00'),
  payment_type: 'payment',
  payment_method: 'cash',
  reference_number: null,
  payment_date: NOW,
  notes: null,
  refunded_payment_id: null,
  refund_reason: null,
  created_at: NOW,
  ...overrides,
});

describe('RefundService', () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = createLedger();
  });

  it('should reverse a payment with a negative entry and reopen the invoice', async () => {
    const invoice = await createSentInvoice(ledger, { items: flatItem('500.00') });
    const { payment, invoice: paid } = await ledger.ledger.applyPayment({
      invoice_id: invoice.id,
      amount: '500.00',
      payment_method: 'bank_transfer',
      reference_number: 'TX-1',
      payment_date: new Date('2024-03-05'),
    });
    expect(paid.status).toBe('paid');

    const { refund, invoice: reopened } = await ledger.refunds.refund({
      payment_id: payment.id,
      refund_amount: '500.00',
      reason: 'Duplicate charge',
    });

    expect(refund).toMatchObject({
      invoice_id: invoice.id,
      payment_type: 'refund',
      payment_method: 'bank_transfer',
      reference_number: 'REFUND-TX-1',
      refunded_payment_id: payment.id,
      refund_reason: 'Duplicate charge',
      payment_date: NOW,
    });
    expect(refund.amount.toDecimal()).toBe('-500.00');
    expect(reopened.status).toBe('sent');
    expect(reopened.paid_amount.toDecimal()).toBe('0.00');
    expect(reopened.remaining_balance.toDecimal()).toBe('500.00');
    expect(reopened.statistics.total_payments).toBe(1);

    const original = await ledger.payments.findById(payment.id);
    expect(original.amount.toDecimal()).toBe('500.00');
    expect(original.payment_type).toBe('payment');

    const [, expense] = await ledger.store.listTransactions();
    expect(expense).toMatchObject({
      account_id: EXPENSE_ACCOUNT_ID,
      transaction_type: 'expense',
      payment_id: refund.id,
      description: `Refund for invoice ${invoice.invoice_number}: Duplicate charge`,
    });
    expect(expense.amount.toDecimal()).toBe('500.00');
  });

  it('should refuse to refund a fully refunded payment again', async () => {
    const invoice = await createSentInvoice(ledger, { items: flatItem('500.00') });
    const { payment } = await ledger.ledger.applyPayment({ invoice_id: invoice.id, amount: '500.00', payment_method: 'cash' });
    await ledger.refunds.refund({ payment_id: payment.id, refund_amount: '500.00', reason: 'Returned goods' });

    expect(
      await ledgerErrorOf(ledger.refunds.refund({ payment_id: payment.id, refund_amount: '1.00', reason: 'Again' }))
    ).toEqual({
      code: 'REFUND_NOT_ELIGIBLE',
      message: `Payment ${payment.id} has already been fully refunded`,
      refundable: '0.00',
    });
  });

  it('should cap partial refunds at what is left of the payment', async () => {
    const invoice = await createSentInvoice(ledger, { items: flatItem('500.00') });
    const { payment } = await ledger.ledger.applyPayment({ invoice_id: invoice.id, amount: '300.00', payment_method: 'card' });
    await ledger.refunds.refund({ payment_id: payment.id, refund_amount: '100.00', reason: 'Partial return' });

    expect(
      await ledgerErrorOf(ledger.refunds.refund({ payment_id: payment.id, refund_amount: '250.00', reason: 'Rest' }))
    ).toEqual({
      code: 'REFUND_NOT_ELIGIBLE',
      message: 'Refund of 250.00 exceeds the refundable amount of 200.00',
      refundable: '200.00',
    });

    const { invoice: after } = await ledger.refunds.refund({
      payment_id: payment.id,
      refund_amount: '200.00',
      reason: 'Rest',
    });
    expect(after.paid_amount.toDecimal()).toBe('0.00');
  });

  it('should validate the amount and reason before looking up the payment', async () => {
    const findPayment = jest.spyOn(ledger.store, 'findPayment');

    await expect(ledger.refunds.refund({ payment_id: UNKNOWN_ID, refund_amount: 0, reason: 'x' })).rejects.toThrow(
      'Refund amount must be greater than 0'
    );
    await expect(
      ledger.refunds.refund({ payment_id: UNKNOWN_ID, refund_amount: '10.00', reason: '   ' })
    ).rejects.toThrow('Refund reason is required');
    expect(findPayment).not.toHaveBeenCalled();
  });

  it('should fail for an unknown payment', async () => {
    expect(
      await ledgerErrorOf(ledger.refunds.refund({ payment_id: UNKNOWN_ID, refund_amount: '10.00', reason: 'x' }))
    ).toEqual({
      code: 'NOT_FOUND',
      message: `Payment ${UNKNOWN_ID} not found`,
      resource: 'Payment',
      id: UNKNOWN_ID,
    });
  });

  it('should not refund a refund entry', async () => {
    const invoice = await createSentInvoice(ledger, { items: flatItem('100.00') });
    const { payment } = await ledger.ledger.applyPayment({ invoice_id: invoice.id, amount: '100.00', payment_method: 'cash' });
    const { refund } = await ledger.refunds.refund({ payment_id: payment.id, refund_amount: '40.00', reason: 'Discount' });

    expect(
      await ledgerErrorOf(ledger.refunds.refund({ payment_id: refund.id, refund_amount: '10.00', reason: 'Oops' }))
    ).toMatchObject({ code: 'REFUND_NOT_ELIGIBLE', message: 'A refund entry cannot be refunded' });
  });

  it('should move a refunded term back to pending', async () => {
    const invoice = await createSentInvoice(ledger, {
      items: flatItem('1000.00'),
      terms: [
        { term_number: 1, percentage: 60, due_date: new Date('2024-03-20') },
        { term_number: 2, percentage: 40, due_date: new Date('2024-04-20') },
      ],
    });
    const firstTerm = invoice.terms[0];
    const { payment, invoice: afterPayment } = await ledger.ledger.applyPayment({
      invoice_id: invoice.id,
      invoice_term_id: firstTerm.id,
      amount: '600.00',
      payment_method: 'bank_transfer',
    });
    expect(afterPayment.terms[0].status).toBe('paid');

    const { refund, invoice: afterRefund } = await ledger.refunds.refund({
      payment_id: payment.id,
      refund_amount: '100.00',
      reason: 'Scope reduced',
    });

    expect(refund.invoice_term_id).toBe(firstTerm.id);
    expect(afterRefund.terms[0].status).toBe('pending');
    expect(afterRefund.terms[0].paid_amount.toDecimal()).toBe('500.00');
    expect(afterRefund.terms[0].remaining_balance.toDecimal()).toBe('100.00');
  });

  it('should refuse refunds on a cancelled invoice', async () => {
    const invoice = await createSentInvoice(ledger, { items: flatItem('200.00') });
    const { payment } = await ledger.ledger.applyPayment({ invoice_id: invoice.id, amount: '200.00', payment_method: 'cash' });
    await ledger.refunds.refund({ payment_id: payment.id, refund_amount: '200.00', reason: 'Client withdrew' });
    await ledger.ledger.cancelInvoice(invoice.id);

    expect(
      await ledgerErrorOf(ledger.refunds.refund({ payment_id: payment.id, refund_amount: '50.00', reason: 'Late' }))
    ).toEqual({
      code: 'REFUND_NOT_ELIGIBLE',
      message: `Invoice ${invoice.invoice_number} is cancelled; its payments cannot be refunded`,
      refundable: '0.00',
    });
  });

  describe('concurrent refunds', () => {
    const yieldingLatency = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

    it.each([1, 7, 42, 99, 2024])(
      'should keep the paid amount within the total when a refund races a payment (seed %i)',
      async (seed) => {
        const random = seededRandom(seed);
        ledger = createLedger({
          maxAttempts: 20,
          latency: () => (random() < 0.5 ? yieldingLatency() : Promise.resolve()),
        });
        const invoice = await createSentInvoice(ledger, { items: flatItem('400.00') });
        const { payment } = await ledger.ledger.applyPayment({
          invoice_id: invoice.id,
          amount: '300.00',
          payment_method: 'cash',
        });

        const [refund, topUp] = await Promise.allSettled([
          ledger.refunds.refund({ payment_id: payment.id, refund_amount: '300.00', reason: 'Returned goods' }),
          ledger.ledger.applyPayment({ invoice_id: invoice.id, amount: '400.00', payment_method: 'card' }),
        ]);

        expect(refund.status).toBe('fulfilled');
        const view = await ledger.invoices.getInvoice(invoice.id);
        expect(view.paid_amount.lessThan(view.total_amount) || view.paid_amount.equals(view.total_amount)).toBe(true);

        if (topUp.status === 'fulfilled') {
          // The payment only fits once the refund has committed.
          expect(view.paid_amount.toDecimal()).toBe('400.00');
          expect(view.status).toBe('paid');
          expect(view.payments).toHaveLength(3);
        } else {
          expect(topUp.reason).toBeInstanceOf(OverpaymentRejectedError);
          expect(view.paid_amount.toDecimal()).toBe('0.00');
          expect(view.status).toBe('sent');
          expect(view.payments).toHaveLength(2);
        }
      }
    );

    it('should serialize a refund behind a concurrent payment on the same invoice', async () => {
      ledger = createLedger({ latency: yieldingLatency });
      const invoice = await createSentInvoice(ledger, { items: flatItem('400.00') });
      const { payment } = await ledger.ledger.applyPayment({
        invoice_id: invoice.id,
        amount: '100.00',
        payment_method: 'cash',
      });

      const results = await Promise.allSettled([
        ledger.refunds.refund({ payment_id: payment.id, refund_amount: '100.00', reason: 'Duplicate' }),
        ledger.ledger.applyPayment({ invoice_id: invoice.id, amount: '250.00', payment_method: 'card' }),
      ]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'fulfilled']);
      expect(ledger.store.conflicts).toBeGreaterThanOrEqual(1);
      const view = await ledger.invoices.getInvoice(invoice.id);
      expect(view.paid_amount.toDecimal()).toBe('250.00');
      expect(view.payments.map((entry) => entry.amount.toDecimal()).sort()).toEqual(['-100.00', '100.00', '250.00']);
    });

    it('should give up with LedgerContention when every attempt conflicts', async () => {
      const invoice = await createSentInvoice(ledger, { items: flatItem('400.00') });
      const { payment } = await ledger.ledger.applyPayment({
        invoice_id: invoice.id,
        amount: '400.00',
        payment_method: 'cash',
      });
      const transaction = jest.spyOn(ledger.store, 'transaction').mockRejectedValue(new LedgerConflictError('stale version'));

      const error = await ledgerErrorOf(
        ledger.refunds.refund({ payment_id: payment.id, refund_amount: '50.00', reason: 'Partial return' })
      );

      expect(error).toEqual({
        code: 'LEDGER_CONTENTION',
        message: `Invoice ${invoice.id} is being modified concurrently; gave up after 10 attempts`,
        attempts: 10,
      });
      expect(transaction).toHaveBeenCalledTimes(10);
      transaction.mockRestore();
      const view = await ledger.invoices.getInvoice(invoice.id);
      expect(view.paid_amount.toDecimal()).toBe('400.00');
      expect(view.payments).toHaveLength(1);
    });

    it('should report contention as a LedgerContentionError instance', async () => {
      const invoice = await createSentInvoice(ledger, { items: flatItem('40.00') });
      const { payment } = await ledger.ledger.applyPayment({ invoice_id: invoice.id, amount: '40.00', payment_method: 'cash' });
      jest.spyOn(ledger.store, 'transaction').mockRejectedValue(new LedgerConflictError('stale version'));

      await expect(
        ledger.refunds.refund({ payment_id: payment.id, refund_amount: '10.00', reason: 'Partial return' })
      ).rejects.toBeInstanceOf(LedgerContentionError);
    });
  });

  describe('refundableAmount', () => {
    it('should subtract earlier refunds of the same payment only', () => {
      const payment = entry({});
      const history = [
        payment,
        entry({ id: 'ref-1', payment_type: 'refund', amount: Money.fromDecimal('-30.00'), refunded_payment_id: payment.id }),
        entry({ id: 'ref-2', payment_type: 'refund', amount: Money.fromDecimal('-5.00'), refunded_payment_id: 'other' }),
      ];

      expect(refundableAmount(payment, history).toDecimal()).toBe('70.00');
    });
  });

  describe('refundReference', () => {
    it('should fall back to the payment id prefix without a reference', () => {
      expect(refundReference(entry({ reference_number: 'CHK-7' }))).toBe('REFUND-CHK-7');
      expect(refundReference(entry({}))).toBe('REFUND-pay-0000');
    });
  });
});
