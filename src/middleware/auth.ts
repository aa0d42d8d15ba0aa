import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '../config/env';
import { EmployeeRole } from '../entities/Employee';
import { RequestContext } from '../types';

export type AuthRequest = Request & { context?: RequestContext };

const tokenPayloadSchema = z.object({
  id: z.string(),
  role: z.enum(['CEO', 'Employee']),
  name: z.string().optional()
});

export function signToken(ctx: RequestContext, secret = env.JWT_SECRET) {
  return jwt.sign({ id: ctx.employeeId, role: ctx.role, name: ctx.fullName }, secret, {
    expiresIn: env.JWT_EXPIRES_IN_SECONDS
  });
}

export function authRequired(secret = env.JWT_SECRET) {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    const auth = req.headers.authorization;
    if (!auth || !auth.startsWith('Bearer ')) return res.status(401).json({ message: 'Missing token' });
    const token = auth.slice(7);
    try {
      const payload = tokenPayloadSchema.safeParse(jwt.verify(token, secret));
      if (!payload.success) return res.status(401).json({ message: 'Invalid token' });
      req.context = { employeeId: payload.data.id, role: payload.data.role, fullName: payload.data.name };
      next();
    } catch (err) {
      return res.status(401).json({ message: 'Invalid token' });
    }
  };
}

export function requireRole(role: EmployeeRole) {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.context) return res.status(401).json({ message: 'Unauthorized' });
    if (req.context.role !== role && req.context.role !== 'CEO') {
      return res.status(403).json({ message: 'Forbidden' });
    }
    next();
  };
}

/** CEO, or the employee named in the route parameter. */
export function requireSelfOrCeo(param: string) {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.context) return res.status(401).json({ message: 'Unauthorized' });
    if (req.context.role !== 'CEO' && req.context.employeeId !== req.params[param]) {
      return res.status(403).json({ message: 'Forbidden' });
    }
    next();
  };
}

export function currentContext(req: AuthRequest): RequestContext {
  if (!req.context) throw new Error('authRequired must run before this handler');
  return req.context;
}

export function asyncRoute(handler: (req: AuthRequest, res: Response) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}
