import { Router } from 'express';
import { sendError } from '../errors';
import { asyncRoute, authRequired, currentContext, requireRole } from '../middleware/auth';
import { AttendanceService } from '../services/attendanceService';
import { roundCurrency } from '../services/payrollService';

export default function attendanceRouter(deps: { attendance: AttendanceService; jwtSecret: string }) {
  const router = Router();
  router.use(authRequired(deps.jwtSecret));

  // CEO "View All Attendance"
  router.get(
    '/',
    requireRole('CEO'),
    asyncRoute(async (_req, res) => {
      res.json(await deps.attendance.listAll());
    })
  );

  router.post(
    '/check-in',
    asyncRoute(async (req, res) => {
      const { employeeId } = currentContext(req);
      const result = await deps.attendance.checkIn(employeeId, req.body ?? {});
      if (!result.ok) return sendError(res, result.error);
      return res.status(201).json(result.value);
    })
  );

  router.post(
    '/check-out',
    asyncRoute(async (req, res) => {
      const { employeeId } = currentContext(req);
      const result = await deps.attendance.checkOut(employeeId, req.body ?? {});
      if (!result.ok) return sendError(res, result.error);
      return res.json({ ...result.value, workingHoursDisplay: roundCurrency(result.value.workingHours) });
    })
  );

  return router;
}
