import { Router } from 'express';
import { sendError } from '../errors';
import { asyncRoute, authRequired, requireRole } from '../middleware/auth';
import { BillingService } from '../services/billingService';

export default function clientsRouter(deps: { billing: BillingService; jwtSecret: string }) {
  const router = Router();
  router.use(authRequired(deps.jwtSecret), requireRole('CEO'));

  router.get(
    '/',
    asyncRoute(async (req, res) => {
      const q = typeof req.query.q === 'string' ? req.query.q : '';
      res.json(await deps.billing.search(q));
    })
  );

  router.post(
    '/',
    asyncRoute(async (req, res) => {
      const result = await deps.billing.registerClient(req.body);
      if (!result.ok) return sendError(res, result.error);
      console.log(`Client registered: ${result.value.clientId}`);
      return res.status(201).json(result.value);
    })
  );

  router.get(
    '/:id',
    asyncRoute(async (req, res) => {
      const result = await deps.billing.getClientProfile(req.params.id);
      if (!result.ok) return sendError(res, result.error);
      return res.json(result.value);
    })
  );

  router.post(
    '/:id/installments',
    asyncRoute(async (req, res) => {
      const result = await deps.billing.recordInstallment(req.params.id, req.body ?? {});
      if (!result.ok) return sendError(res, result.error);
      return res.status(201).json(result.value);
    })
  );

  return router;
}
