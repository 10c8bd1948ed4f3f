import { Request, Response } from 'express';
import { InvoiceService } from '../../services/financial/invoice.service';
import { PaymentLedgerService } from '../../services/financial/payment-ledger.service';
import { PaymentService } from '../../services/financial/payment.service';
import { sendLedgerError, validateRequest } from '../../utils/http';

// Joi Validation Schemas
import {
  clientScopeQuerySchema,
  createInvoiceSchema,
  invoiceIdSchema,
  listInvoicesQuerySchema,
  setTermsSchema,
  updateInvoiceSchema,
} from '../../schemas/financial/invoice.schema';

/**
 * Controller for invoice lifecycle endpoints.
 * Validates requests with Joi and delegates to the invoice and ledger services.
 */
export class InvoiceController {
  constructor(
    private readonly invoiceService: InvoiceService,
    private readonly paymentLedger: PaymentLedgerService,
    private readonly paymentService: PaymentService
  ) {}

  /**
   * Creates a draft invoice. Totals and the invoice number are computed.
   *
   * @example
   * POST /api/invoices
   * Body: { client_id: "uuid", items: [{ description: "Consulting", quantity: 2, unit_price: "100.00" }], tax_rate: 10 }
   * Response: 201 { message: "Invoice created successfully", invoice: { ..., total_amount: "220.00" } }
   */
  async create(req: Request, res: Response): Promise<void> {
    const body = validateRequest(createInvoiceSchema, req.body, res);
    if (!body) return;

    try {
      const invoice = await this.invoiceService.createInvoice(body);
      res.status(201).json({ message: 'Invoice created successfully', invoice });
    } catch (err) {
      sendLedgerError(res, err, 'Create invoice');
    }
  }

  /**
   * @example
   * GET /api/invoices?status=overdue&client_id=uuid&from=2024-01-01&to=2024-03-31
   * Response: 200 [{ id: "uuid", invoice_number: "INV-20240115-1", status: "overdue", ... }]
   */
  async list(req: Request, res: Response): Promise<void> {
    const query = validateRequest(listInvoicesQuerySchema, req.query, res);
    if (!query) return;

    try {
      res.status(200).json(await this.invoiceService.listInvoices(query));
    } catch (err) {
      sendLedgerError(res, err, 'List invoices');
    }
  }

  async listOverdue(req: Request, res: Response): Promise<void> {
    const query = validateRequest(clientScopeQuerySchema, req.query, res);
    if (!query) return;

    try {
      res.status(200).json(await this.invoiceService.listOverdue(query.client_id));
    } catch (err) {
      sendLedgerError(res, err, 'List overdue invoices');
    }
  }

  async listUnpaid(req: Request, res: Response): Promise<void> {
    const query = validateRequest(clientScopeQuerySchema, req.query, res);
    if (!query) return;

    try {
      res.status(200).json(await this.invoiceService.listUnpaid(query.client_id));
    } catch (err) {
      sendLedgerError(res, err, 'List unpaid invoices');
    }
  }

  /**
   * @example
   * GET /api/invoices/123e4567-e89b-12d3-a456-426614174000
   * Response: 200 { id: "uuid", status: "overdue", paid_amount: "100.00", remaining_balance: "120.00", ... }
   * Response: 404 { code: "NOT_FOUND", message: "Invoice ... not found" }
   */
  async findById(req: Request, res: Response): Promise<void> {
    const { error } = invoiceIdSchema.validate(req.params.id);
    if (error) {
      res.status(400).json({ message: 'Invalid Invoice ID.', details: error.details[0].message });
      return;
    }

    try {
      const invoice = await this.invoiceService.getInvoice(req.params.id);
      res.status(200).json(invoice);
    } catch (err) {
      sendLedgerError(res, err, 'Find invoice by ID');
    }
  }

  async update(req: Request, res: Response): Promise<void> {
    const { error } = invoiceIdSchema.validate(req.params.id);
    if (error) {
      res.status(400).json({ message: 'Invalid Invoice ID.', details: error.details[0].message });
      return;
    }
    const body = validateRequest(updateInvoiceSchema, req.body, res);
    if (!body) return;

    try {
      const invoice = await this.invoiceService.updateInvoice(req.params.id, body);
      res.status(200).json({ message: 'Invoice updated successfully', invoice });
    } catch (err) {
      sendLedgerError(res, err, 'Update invoice');
    }
  }

  async delete(req: Request, res: Response): Promise<void> {
    const { error } = invoiceIdSchema.validate(req.params.id);
    if (error) {
      res.status(400).json({ message: 'Invalid Invoice ID.', details: error.details[0].message });
      return;
    }

    try {
      await this.invoiceService.deleteInvoice(req.params.id);
      res.status(200).json({ message: 'Invoice deleted successfully' });
    } catch (err) {
      sendLedgerError(res, err, 'Delete invoice');
    }
  }

  /**
   * Replaces the payment terms of a draft invoice.
   *
   * @example
   * PUT /api/invoices/:id/terms
   * Body: { terms: [{ term_number: 1, percentage: 60, due_date: "2024-02-01" }, { term_number: 2, percentage: 40, due_date: "2024-03-01" }] }
   */
  async setTerms(req: Request, res: Response): Promise<void> {
    const { error } = invoiceIdSchema.validate(req.params.id);
    if (error) {
      res.status(400).json({ message: 'Invalid Invoice ID.', details: error.details[0].message });
      return;
    }
    const body = validateRequest(setTermsSchema, req.body, res);
    if (!body) return;

    try {
      const invoice = await this.invoiceService.setTerms(req.params.id, body.terms);
      res.status(200).json({ message: 'Invoice terms updated successfully', invoice });
    } catch (err) {
      sendLedgerError(res, err, 'Set invoice terms');
    }
  }

  async send(req: Request, res: Response): Promise<void> {
    const { error } = invoiceIdSchema.validate(req.params.id);
    if (error) {
      res.status(400).json({ message: 'Invalid Invoice ID.', details: error.details[0].message });
      return;
    }

    try {
      const invoice = await this.invoiceService.sendInvoice(req.params.id);
      res.status(200).json({ message: 'Invoice sent successfully', invoice });
    } catch (err) {
      sendLedgerError(res, err, 'Send invoice');
    }
  }

  async cancel(req: Request, res: Response): Promise<void> {
    const { error } = invoiceIdSchema.validate(req.params.id);
    if (error) {
      res.status(400).json({ message: 'Invalid Invoice ID.', details: error.details[0].message });
      return;
    }

    try {
      const invoice = await this.paymentLedger.cancelInvoice(req.params.id);
      res.status(200).json({ message: 'Invoice cancelled successfully', invoice });
    } catch (err) {
      sendLedgerError(res, err, 'Cancel invoice');
    }
  }

  async getPayments(req: Request, res: Response): Promise<void> {
    const { error } = invoiceIdSchema.validate(req.params.id);
    if (error) {
      res.status(400).json({ message: 'Invalid Invoice ID.', details: error.details[0].message });
      return;
    }

    try {
      const payments = await this.paymentService.findByInvoiceId(req.params.id);
      res.status(200).json(payments);
    } catch (err) {
      sendLedgerError(res, err, 'Get invoice payments');
    }
  }
}
