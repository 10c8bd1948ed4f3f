import { EffectiveInvoiceStatus } from '../../src/models/financial/invoice.model';
import { InvalidScheduleError, InvalidTransitionError, NotFoundError, ValidationError } from '../../src/utils/errors';
import {
  CLIENT_ID,
  Ledger,
  OTHER_CLIENT_ID,
  PROJECT_ID,
  UNKNOWN_ID,
  consultingItems,
  createLedger,
  createSentInvoice,
  flatItem,
  ledgerErrorOf,
} from '../helpers/fixtures';

const splitSchedule = [
  { term_number: 1, percentage: 60, due_date: new Date('2024-04-01') },
  { term_number: 2, percentage: 40, due_date: new Date('2024-05-01') },
];

describe('InvoiceService', () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = createLedger();
  });

  describe('createInvoice', () => {
    it('should create a draft with a generated number and computed totals', async () => {
      const invoice = await ledger.invoices.createInvoice({
        client_id: CLIENT_ID,
        invoice_date: new Date('2024-03-01'),
        items: consultingItems,
        tax_rate: 10,
      });

      expect(invoice.invoice_number).toBe('INV-20240301-1');
      expect(invoice.status).toBe('draft');
      expect(invoice.currency).toBe('USD');
      expect(invoice.due_date).toEqual(new Date('2024-03-31'));
      expect(invoice.sub_total.toDecimal()).toBe('250.00');
      expect(invoice.tax_amount.toDecimal()).toBe('25.00');
      expect(invoice.total_amount.toDecimal()).toBe('275.00');
      expect(invoice.remaining_balance.toDecimal()).toBe('275.00');
      expect(invoice.items.map((item) => item.quantity)).toEqual([2, 1]);
      expect(invoice.statistics.total_items).toBe(2);
      expect(invoice.version).toBe(0);
    });

    it('should number invoices sequentially and default the date to today', async () => {
      await ledger.invoices.createInvoice({ client_id: CLIENT_ID, items: consultingItems });
      const second = await ledger.invoices.createInvoice({ client_id: CLIENT_ID, items: consultingItems });

      expect(second.invoice_number).toBe('INV-20240315-2');
      expect(second.invoice_date).toEqual(new Date('2024-03-15'));
      expect(second.due_date).toEqual(new Date('2024-04-14'));
    });

    it('should accept a project of the client', async () => {
      const invoice = await ledger.invoices.createInvoice({
        client_id: CLIENT_ID,
        project_id: PROJECT_ID,
        items: consultingItems,
      });

      expect(invoice.project_id).toBe(PROJECT_ID);
    });

    it('should reject unknown clients and foreign projects', async () => {
      await expect(ledger.invoices.createInvoice({ client_id: UNKNOWN_ID, items: consultingItems })).rejects.toThrow(
        `Client ${UNKNOWN_ID} does not exist`
      );
      await expect(
        ledger.invoices.createInvoice({ client_id: OTHER_CLIENT_ID, project_id: PROJECT_ID, items: consultingItems })
      ).rejects.toThrow(`Project ${PROJECT_ID} does not belong to client ${OTHER_CLIENT_ID}`);
    });

    it('should reject a due date before the invoice date', async () => {
      await expect(
        ledger.invoices.createInvoice({
          client_id: CLIENT_ID,
          invoice_date: new Date('2024-03-10'),
          due_date: new Date('2024-03-09'),
          items: consultingItems,
        })
      ).rejects.toThrow('Due date must be on or after the invoice date');
    });

    it('should normalize and check the currency', async () => {
      const invoice = await ledger.invoices.createInvoice({ client_id: CLIENT_ID, items: consultingItems, currency: 'eur' });
      expect(invoice.currency).toBe('EUR');

      await expect(
        ledger.invoices.createInvoice({ client_id: CLIENT_ID, items: consultingItems, currency: 'EURO' })
      ).rejects.toThrow('Currency must be a three-letter ISO 4217 code, got "EURO"');
    });

    it('should not store anything when an item is invalid', async () => {
      await expect(
        ledger.invoices.createInvoice({
          client_id: CLIENT_ID,
          items: [{ description: 'Broken', quantity: -1, unit_price: '10.00' }],
        })
      ).rejects.toBeInstanceOf(ValidationError);
      expect(await ledger.store.listInvoices()).toEqual([]);
    });
  });

  describe('updateInvoice', () => {
    it('should recompute totals and re-split existing terms', async () => {
      const draft = await ledger.invoices.createInvoice({ client_id: CLIENT_ID, items: flatItem('1000.00') });
      await ledger.invoices.setTerms(draft.id, splitSchedule);

      const updated = await ledger.invoices.updateInvoice(draft.id, { items: flatItem('500.00') });

      expect(updated.total_amount.toDecimal()).toBe('500.00');
      expect(updated.terms.map((term) => term.amount.toDecimal())).toEqual(['300.00', '200.00']);
      expect(updated.terms.map((term) => term.percentage.toDecimal())).toEqual(['60.00', '40.00']);
    });

    it('should keep the items when only the tax rate changes', async () => {
      const draft = await ledger.invoices.createInvoice({ client_id: CLIENT_ID, items: flatItem('200.00') });

      const updated = await ledger.invoices.updateInvoice(draft.id, { tax_rate: 10, notes: 'Net 30' });

      expect(updated.items).toHaveLength(1);
      expect(updated.items[0].quantity).toBe(1);
      expect(updated.tax_amount.toDecimal()).toBe('20.00');
      expect(updated.total_amount.toDecimal()).toBe('220.00');
      expect(updated.notes).toBe('Net 30');
    });

    it('should add and remove a discount', async () => {
      const draft = await ledger.invoices.createInvoice({ client_id: CLIENT_ID, items: flatItem('200.00') });

      const discounted = await ledger.invoices.updateInvoice(draft.id, { discount: { type: 'percentage', value: 25 } });
      expect(discounted.discount_amount.toDecimal()).toBe('50.00');
      expect(discounted.total_amount.toDecimal()).toBe('150.00');

      const plain = await ledger.invoices.updateInvoice(draft.id, { discount: null });
      expect(plain.discount).toBeNull();
      expect(plain.total_amount.toDecimal()).toBe('200.00');
    });

    it('should only update drafts', async () => {
      const sent = await createSentInvoice(ledger);

      expect(await ledgerErrorOf(ledger.invoices.updateInvoice(sent.id, { notes: 'late edit' }))).toEqual({
        code: 'INVALID_TRANSITION',
        message: 'Only draft invoices can be updated; invoice is sent',
        from: 'sent',
        to: 'draft',
      });
    });

    it('should fail for an unknown invoice', async () => {
      await expect(ledger.invoices.updateInvoice(UNKNOWN_ID, { notes: 'x' })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('deleteInvoice', () => {
    it('should delete a draft', async () => {
      const draft = await ledger.invoices.createInvoice({ client_id: CLIENT_ID, items: consultingItems });

      await ledger.invoices.deleteInvoice(draft.id);

      await expect(ledger.invoices.getInvoice(draft.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should not delete a sent invoice', async () => {
      const sent = await createSentInvoice(ledger);

      await expect(ledger.invoices.deleteInvoice(sent.id)).rejects.toBeInstanceOf(InvalidTransitionError);
      expect((await ledger.invoices.getInvoice(sent.id)).status).toBe('sent');
    });
  });

  describe('setTerms', () => {
    it('should replace and clear the schedule of a draft', async () => {
      const draft = await ledger.invoices.createInvoice({ client_id: CLIENT_ID, items: flatItem('1000.00') });

      const scheduled = await ledger.invoices.setTerms(draft.id, splitSchedule);
      expect(scheduled.terms.map((term) => term.amount.toDecimal())).toEqual(['600.00', '400.00']);
      expect(scheduled.statistics.total_terms).toBe(2);

      const cleared = await ledger.invoices.setTerms(draft.id, []);
      expect(cleared.terms).toEqual([]);
    });

    it('should reject an invalid schedule', async () => {
      const draft = await ledger.invoices.createInvoice({ client_id: CLIENT_ID, items: flatItem('1000.00') });

      await expect(
        ledger.invoices.setTerms(draft.id, [{ term_number: 1, percentage: 90, due_date: new Date('2024-04-01') }])
      ).rejects.toBeInstanceOf(InvalidScheduleError);
    });

    it('should not change terms once sent', async () => {
      const sent = await createSentInvoice(ledger);

      expect(await ledgerErrorOf(ledger.invoices.setTerms(sent.id, []))).toMatchObject({
        code: 'INVALID_TRANSITION',
        message: 'Terms can only be changed on a draft invoice; invoice is sent',
      });
    });
  });

  describe('sendInvoice', () => {
    it('should move a draft to sent', async () => {
      const sent = await createSentInvoice(ledger, { terms: splitSchedule });

      expect(sent.status).toBe('sent');
      expect(sent.terms.map((term) => term.status)).toEqual(['pending', 'pending']);
      expect(sent.version).toBe(2);
    });

    it('should refuse to send an invoice without items', async () => {
      const draft = await ledger.invoices.createInvoice({ client_id: CLIENT_ID, items: [] });

      expect(await ledgerErrorOf(ledger.invoices.sendInvoice(draft.id))).toEqual({
        code: 'VALIDATION_ERROR',
        message: `Invoice ${draft.invoice_number} has no items and cannot be sent`,
      });
    });

    it('should settle a zero-total invoice on sending', async () => {
      const draft = await ledger.invoices.createInvoice({
        client_id: CLIENT_ID,
        items: [{ description: 'Goodwill visit', quantity: 1, unit_price: '0.00' }],
      });

      const sent = await ledger.invoices.sendInvoice(draft.id);

      expect(sent.status).toBe('paid');
      expect(sent.is_fully_paid).toBe(true);
      expect(sent.payment_percentage).toBe(100);
    });

    it('should not send an invoice twice', async () => {
      const sent = await createSentInvoice(ledger);

      expect(await ledgerErrorOf(ledger.invoices.sendInvoice(sent.id))).toEqual({
        code: 'INVALID_TRANSITION',
        message: 'Invalid status transition from sent to sent',
        from: 'sent',
        to: 'sent',
      });
    });
  });

  describe('listInvoices', () => {
    let lateId: string;
    let currentId: string;
    let settledId: string;
    let otherClientId: string;

    // Clock is 2024-03-15.
    beforeEach(async () => {
      lateId = (
        await createSentInvoice(ledger, {
          items: flatItem('100.00'),
          invoiceDate: new Date('2024-02-01'),
          dueDate: new Date('2024-03-01'),
        })
      ).id;
      currentId = (
        await createSentInvoice(ledger, {
          items: flatItem('200.00'),
          invoiceDate: new Date('2024-03-05'),
          dueDate: new Date('2024-04-04'),
        })
      ).id;
      settledId = (
        await createSentInvoice(ledger, {
          items: flatItem('50.00'),
          invoiceDate: new Date('2024-03-06'),
          dueDate: new Date('2024-04-05'),
        })
      ).id;
      await ledger.ledger.applyPayment({ invoice_id: settledId, amount: '50.00', payment_method: 'cash' });
      otherClientId = (
        await ledger.invoices.createInvoice({
          client_id: OTHER_CLIENT_ID,
          items: flatItem('10.00'),
          invoice_date: new Date('2024-03-10'),
        })
      ).id;
    });

    it('should list every invoice by invoice date with its effective status', async () => {
      const invoices = await ledger.invoices.listInvoices();

      expect(invoices.map((invoice) => [invoice.id, invoice.status])).toEqual([
        [lateId, 'overdue'],
        [currentId, 'sent'],
        [settledId, 'paid'],
        [otherClientId, 'draft'],
      ]);
    });

    it('should filter by effective status', async () => {
      const ids = async (status: EffectiveInvoiceStatus): Promise<string[]> =>
        (await ledger.invoices.listInvoices({ status })).map((invoice) => invoice.id);

      expect(await ids('overdue')).toEqual([lateId]);
      expect(await ids('sent')).toEqual([currentId]);
      expect(await ids('paid')).toEqual([settledId]);
      expect(await ids('draft')).toEqual([otherClientId]);
      expect(await ids('cancelled')).toEqual([]);
    });

    it('should treat an invoice due today as sent rather than overdue', async () => {
      const dueToday = await createSentInvoice(ledger, {
        items: flatItem('20.00'),
        invoiceDate: new Date('2024-03-14'),
        dueDate: new Date('2024-03-15'),
      });

      const sent = await ledger.invoices.listInvoices({ status: 'sent' });
      const overdue = await ledger.invoices.listInvoices({ status: 'overdue' });

      expect(sent.map((invoice) => invoice.id)).toEqual([currentId, dueToday.id]);
      expect(overdue.map((invoice) => invoice.id)).toEqual([lateId]);
    });

    it('should filter by client and invoice date range', async () => {
      const forOtherClient = await ledger.invoices.listInvoices({ client_id: OTHER_CLIENT_ID });
      const early = await ledger.invoices.listInvoices({ from: new Date('2024-03-01'), to: new Date('2024-03-06') });

      expect(forOtherClient.map((invoice) => invoice.id)).toEqual([otherClientId]);
      expect(early.map((invoice) => invoice.id)).toEqual([currentId, settledId]);
    });

    it('should list overdue invoices per client', async () => {
      expect((await ledger.invoices.listOverdue()).map((invoice) => invoice.id)).toEqual([lateId]);
      expect(await ledger.invoices.listOverdue(OTHER_CLIENT_ID)).toEqual([]);
    });

    it('should list unpaid invoices, overdue ones included', async () => {
      const unpaid = await ledger.invoices.listUnpaid();

      expect(unpaid.map((invoice) => [invoice.id, invoice.status])).toEqual([
        [lateId, 'overdue'],
        [currentId, 'sent'],
      ]);
      expect(unpaid[0].total_amount.toDecimal()).toBe('100.00');
    });
  });
});
