import { Router } from 'express';
import { InvoiceController } from '../../controllers/financial/invoice.controller';

export const createInvoiceRouter = (invoiceController: InvoiceController): Router => {
  const router = Router();

  /**
   * @openapi
   * /api/invoices:
   *   post:
   *     tags:
   *       - Invoices
   *     summary: Create a draft invoice
   *     description: Computes totals from the line items and assigns an invoice number
   *     responses:
   *       201:
   *         description: Invoice created successfully
   *       400:
   *         $ref: '#/components/responses/BadRequest'
   *       422:
   *         description: Invalid item, discount or tax rate
   */
  router.post('/', invoiceController.create.bind(invoiceController));

  /**
   * @openapi
   * /api/invoices:
   *   get:
   *     tags:
   *       - Invoices
   *     summary: List invoices by effective status, client and invoice date range
   *     parameters:
   *       - in: query
   *         name: status
   *         schema:
   *           type: string
   *           enum: [draft, sent, paid, overdue, cancelled]
   *       - in: query
   *         name: client_id
   *         schema:
   *           type: string
   *           format: uuid
   */
  router.get('/', invoiceController.list.bind(invoiceController));

  // Must precede /:id
  router.get('/overdue', invoiceController.listOverdue.bind(invoiceController));
  router.get('/unpaid', invoiceController.listUnpaid.bind(invoiceController));

  /**
   * @openapi
   * /api/invoices/{id}:
   *   get:
   *     tags:
   *       - Invoices
   *     summary: Get invoice with balances, terms and payments
   *     responses:
   *       200:
   *         description: Invoice view
   *       404:
   *         $ref: '#/components/responses/NotFound'
   */
  router.get('/:id', invoiceController.findById.bind(invoiceController));

  /**
   * @openapi
   * /api/invoices/{id}:
   *   put:
   *     tags:
   *       - Invoices
   *     summary: Update a draft invoice
   *     responses:
   *       200:
   *         description: Invoice updated successfully
   *       422:
   *         description: Invoice is not a draft, or invalid items
   */
  router.put('/:id', invoiceController.update.bind(invoiceController));

  router.delete('/:id', invoiceController.delete.bind(invoiceController));

  /**
   * @openapi
   * /api/invoices/{id}/terms:
   *   put:
   *     tags:
   *       - Invoices
   *     summary: Replace the payment terms of a draft invoice
   *     responses:
   *       200:
   *         description: Terms scheduled
   *       422:
   *         description: Percentages do not add up to 100 or term numbers are not 1..n
   */
  router.put('/:id/terms', invoiceController.setTerms.bind(invoiceController));

  router.post('/:id/send', invoiceController.send.bind(invoiceController));
  router.post('/:id/cancel', invoiceController.cancel.bind(invoiceController));
  router.get('/:id/payments', invoiceController.getPayments.bind(invoiceController));

  return router;
};
