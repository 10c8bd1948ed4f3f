import { Router } from 'express';
import { PaymentController } from '../../controllers/financial/payment.controller';

export const createPaymentRouter = (paymentController: PaymentController): Router => {
  const router = Router();

  /**
   * @openapi
   * /api/payments:
   *   post:
   *     tags:
   *       - Payments
   *     summary: Record a payment against an invoice or one of its terms
   *     responses:
   *       201:
   *         description: Payment recorded
   *       409:
   *         description: Invoice is under heavy concurrent modification, retry later
   *       422:
   *         description: Payment exceeds the remaining balance, or invoice is draft/cancelled
   */
  router.post('/', paymentController.create.bind(paymentController));

  // Must precede /:id
  router.get('/statistics', paymentController.getStatistics.bind(paymentController));
  router.get('/trends', paymentController.getTrends.bind(paymentController));
  router.get('/:id', paymentController.findById.bind(paymentController));

  /**
   * @openapi
   * /api/payments/{id}/refund:
   *   post:
   *     tags:
   *       - Payments
   *     summary: Refund part or all of a payment
   *     responses:
   *       201:
   *         description: Refund recorded
   *       422:
   *         description: Amount exceeds the refundable portion, or payment is not refundable
   */
  router.post('/:id/refund', paymentController.refund.bind(paymentController));

  return router;
};
