import { Router } from 'express';
import { asyncRoute, authRequired, requireRole } from '../middleware/auth';
import { BillingService } from '../services/billingService';
import { roundCurrency } from '../services/payrollService';

export default function financeRouter(deps: { billing: BillingService; jwtSecret: string }) {
  const router = Router();
  router.use(authRequired(deps.jwtSecret), requireRole('CEO'));

  router.get(
    '/summary',
    asyncRoute(async (_req, res) => {
      const summary = await deps.billing.financialSummary();
      res.json({
        ...summary,
        totalOutstanding: roundCurrency(summary.totalOutstanding),
        totalBaseSalary: roundCurrency(summary.totalBaseSalary)
      });
    })
  );

  return router;
}
