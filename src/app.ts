import express, { Express, NextFunction, Request, Response } from 'express';
import { DashboardController } from './controllers/analytics/dashboard.controller';
import { InvoiceController } from './controllers/financial/invoice.controller';
import { PaymentController } from './controllers/financial/payment.controller';
import { ClientDirectory, LedgerStore } from './repositories/ledger.store';
import { createDashboardRouter } from './routes/analytics/dashboard.routes';
import { createInvoiceRouter } from './routes/financial/invoice.routes';
import { createPaymentRouter } from './routes/financial/payment.routes';
import { AnalyticsService } from './services/analytics/analytics.service';
import { InvoiceService, InvoiceServiceOptions } from './services/financial/invoice.service';
import { PaymentLedgerService } from './services/financial/payment-ledger.service';
import { PaymentService } from './services/financial/payment.service';
import { RefundService } from './services/financial/refund.service';

export interface AppDependencies {
  store: LedgerStore;
  clients: ClientDirectory;
  options?: InvoiceServiceOptions;
}

/**
 * Builds the Express application around a ledger store.
 * Kept free of connection handling so tests can pass an in-process store.
 */
export const createApp = ({ store, clients, options = {} }: AppDependencies): Express => {
  const invoiceService = new InvoiceService(store, clients, options);
  const paymentLedger = new PaymentLedgerService(store, options);
  const refundService = new RefundService(store, options);
  const paymentService = new PaymentService(store, options);
  const analyticsService = new AnalyticsService(store, options);

  const app = express();
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  app.use('/api/invoices', createInvoiceRouter(new InvoiceController(invoiceService, paymentLedger, paymentService)));
  app.use('/api/payments', createPaymentRouter(new PaymentController(paymentLedger, refundService, paymentService)));
  app.use('/api/dashboard', createDashboardRouter(new DashboardController(analyticsService)));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ message: 'Route not found' });
  });

  // Malformed JSON bodies surface here from express.json()
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ message: 'Malformed JSON body' });
      return;
    }
    console.error('Unhandled error:', err);
    res.status(500).json({ message: 'Internal server error' });
  });

  return app;
};
