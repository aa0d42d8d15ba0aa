import { Router } from 'express';
import { asyncRoute, signToken } from '../middleware/auth';
import { EmployeeService } from '../services/employeeService';
import { loginSchema } from '../validation/schemas';

export default function authRouter(deps: { employees: EmployeeService; jwtSecret: string }) {
  const router = Router();

  router.post(
    '/login',
    asyncRoute(async (req, res) => {
      const parsed = loginSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ message: 'employeeId and password required' });

      const ctx = await deps.employees.authenticate(parsed.data.employeeId, parsed.data.password);
      if (!ctx) return res.status(401).json({ ok: false, message: 'Invalid credentials' });

      const token = signToken(ctx, deps.jwtSecret);
      return res.json({ ok: true, token, user: { id: ctx.employeeId, name: ctx.fullName, role: ctx.role } });
    })
  );

  return router;
}
