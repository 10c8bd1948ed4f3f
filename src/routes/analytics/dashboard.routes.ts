import { Router } from 'express';
import { DashboardController } from '../../controllers/analytics/dashboard.controller';

export const createDashboardRouter = (dashboardController: DashboardController): Router => {
  const router = Router();

  /**
   * @openapi
   * /api/dashboard/summary:
   *   get:
   *     tags:
   *       - Dashboard
   *     summary: Income, expenses, outstanding balance, collection rate and monthly trend for a period
   *     parameters:
   *       - in: query
   *         name: from
   *         required: true
   *         schema:
   *           type: string
   *           format: date
   *       - in: query
   *         name: to
   *         required: true
   *         schema:
   *           type: string
   *           format: date
   */
  router.get('/summary', dashboardController.getSummary.bind(dashboardController));

  router.get('/overview', dashboardController.getOverview.bind(dashboardController));

  router.get('/reports/:period', dashboardController.getReport.bind(dashboardController));

  return router;
};
