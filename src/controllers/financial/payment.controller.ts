import { Request, Response } from 'express';
import { PaymentLedgerService } from '../../services/financial/payment-ledger.service';
import { PaymentService } from '../../services/financial/payment.service';
import { RefundService } from '../../services/financial/refund.service';
import { sendLedgerError, validateRequest } from '../../utils/http';

// Joi Validation Schemas
import {
  applyPaymentSchema,
  paymentIdSchema,
  paymentStatisticsQuerySchema,
  paymentTrendsQuerySchema,
  refundPaymentSchema,
} from '../../schemas/financial/payment.schema';

export class PaymentController {
  constructor(
    private readonly paymentLedger: PaymentLedgerService,
    private readonly refundService: RefundService,
    private readonly paymentService: PaymentService
  ) {}

  /**
   * Records a payment. Answers 422 with the remaining balance when the
   * amount does not fit.
   *
   * @example
   * POST /api/payments
   * Body: { invoice_id: "uuid", amount: "450.00", payment_method: "bank_transfer" }
   * Response: 422 { code: "OVERPAYMENT_REJECTED", message: "...", requested: "450.00", remaining: "400.00" }
   */
  async create(req: Request, res: Response): Promise<void> {
    const body = validateRequest(applyPaymentSchema, req.body, res);
    if (!body) return;

    try {
      const result = await this.paymentLedger.applyPayment(body);
      res.status(201).json({ message: 'Payment recorded successfully', ...result });
    } catch (err) {
      sendLedgerError(res, err, 'Create payment');
    }
  }

  async findById(req: Request, res: Response): Promise<void> {
    const { error } = paymentIdSchema.validate(req.params.id);
    if (error) {
      res.status(400).json({ message: 'Invalid Payment ID.', details: error.details[0].message });
      return;
    }

    try {
      const payment = await this.paymentService.findById(req.params.id);
      res.status(200).json(payment);
    } catch (err) {
      sendLedgerError(res, err, 'Find payment by ID');
    }
  }

  async refund(req: Request, res: Response): Promise<void> {
    const { error } = paymentIdSchema.validate(req.params.id);
    if (error) {
      res.status(400).json({ message: 'Invalid Payment ID.', details: error.details[0].message });
      return;
    }
    const body = validateRequest(refundPaymentSchema, req.body, res);
    if (!body) return;

    try {
      const result = await this.refundService.refund({ ...body, payment_id: req.params.id });
      res.status(201).json({ message: 'Refund recorded successfully', ...result });
    } catch (err) {
      sendLedgerError(res, err, 'Refund payment');
    }
  }

  async getStatistics(req: Request, res: Response): Promise<void> {
    const query = validateRequest(paymentStatisticsQuerySchema, req.query, res);
    if (!query) return;

    try {
      const statistics = await this.paymentService.getStatistics(query);
      res.status(200).json(statistics);
    } catch (err) {
      sendLedgerError(res, err, 'Payment statistics');
    }
  }

  /**
   * @example
   * GET /api/payments/trends?days=7
   * Response: 200 [{ date: "2024-03-12", count: 2, total: "450.00", average: "225.00" }]
   */
  async getTrends(req: Request, res: Response): Promise<void> {
    const query = validateRequest(paymentTrendsQuerySchema, req.query, res);
    if (!query) return;

    try {
      res.status(200).json(await this.paymentService.getPaymentTrends(query.days));
    } catch (err) {
      sendLedgerError(res, err, 'Payment trends');
    }
  }
}
