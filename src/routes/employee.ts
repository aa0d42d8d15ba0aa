import { Router } from 'express';
import { sendError } from '../errors';
import { asyncRoute, authRequired, requireRole, requireSelfOrCeo } from '../middleware/auth';
import { EmployeeService } from '../services/employeeService';
import { PayrollService, roundBreakdown } from '../services/payrollService';
import { PhotoStore } from '../services/photoStore';

const photoFields = { photo: 'photo', aadhar: 'aadharPhoto', signature: 'signaturePhoto' } as const;
type PhotoField = keyof typeof photoFields;

const isPhotoField = (kind: string): kind is PhotoField => Object.prototype.hasOwnProperty.call(photoFields, kind);

export default function employeesRouter(deps: {
  employees: EmployeeService;
  payroll: PayrollService;
  photos: PhotoStore;
  jwtSecret: string;
}) {
  const router = Router();
  router.use(authRequired(deps.jwtSecret));

  router.get(
    '/',
    requireRole('CEO'),
    asyncRoute(async (req, res) => {
      const q = typeof req.query.q === 'string' ? req.query.q : '';
      res.json(await deps.employees.search(q));
    })
  );

  router.post(
    '/',
    requireRole('CEO'),
    asyncRoute(async (req, res) => {
      const result = await deps.employees.registerEmployee(req.body);
      if (!result.ok) return sendError(res, result.error);
      console.log(`Employee registered: ${result.value.employeeId}`);
      return res.status(201).json(result.value);
    })
  );

  router.get(
    '/:id',
    requireSelfOrCeo('id'),
    asyncRoute(async (req, res) => {
      const profile = await deps.employees.getProfile(req.params.id);
      if (!profile.ok) return sendError(res, profile.error);

      const salary = await deps.payroll.computeSalary(req.params.id);
      if (!salary.ok) return sendError(res, salary.error);
      return res.json({ ...profile.value, salary: salary.value ? roundBreakdown(salary.value) : null });
    })
  );

  router.put(
    '/:id/assignment',
    requireRole('CEO'),
    asyncRoute(async (req, res) => {
      const result = await deps.employees.assignToClient(req.params.id, req.body);
      if (!result.ok) return sendError(res, result.error);
      return res.json(result.value);
    })
  );

  router.get(
    '/:id/photos/:kind',
    requireSelfOrCeo('id'),
    asyncRoute(async (req, res) => {
      const kind = req.params.kind;
      if (!isPhotoField(kind)) return res.status(404).json({ message: 'Unknown photo kind' });
      const profile = await deps.employees.getProfile(req.params.id);
      if (!profile.ok) return sendError(res, profile.error);

      const key = profile.value.employee[photoFields[kind]];
      const bytes = key ? await deps.photos.get(key) : null;
      if (!bytes) return res.status(404).json({ message: 'Photo not found' });
      res.setHeader('Content-Type', 'application/octet-stream');
      return res.end(bytes);
    })
  );

  return router;
}
