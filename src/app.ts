import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { DataSource } from 'typeorm';
import authRouter from './routes/auth';
import employeesRouter from './routes/employee';
import attendanceRouter from './routes/attendance';
import payrollRouter from './routes/payroll';
import clientsRouter from './routes/client';
import financeRouter from './routes/finance';
import { AttendanceService } from './services/attendanceService';
import { BillingService } from './services/billingService';
import { Clock } from './services/clock';
import { EmployeeService } from './services/employeeService';
import { Mailer } from './services/mailer';
import { PayrollService } from './services/payrollService';
import { PhotoStore } from './services/photoStore';

export type AppDeps = {
  dataSource: DataSource;
  clock: Clock;
  photos: PhotoStore;
  mailer: Mailer;
  jwtSecret: string;
  bcryptRounds: number;
  companyName: string;
  corsOrigin: string;
};

export function createServices(deps: Pick<AppDeps, 'dataSource' | 'clock' | 'photos' | 'bcryptRounds'>) {
  const employees = new EmployeeService(deps.dataSource, deps.photos, deps.bcryptRounds);
  const attendance = new AttendanceService(deps.dataSource, deps.clock, deps.photos);
  const payroll = new PayrollService(deps.dataSource, deps.clock);
  const billing = new BillingService(deps.dataSource, deps.clock, payroll);
  return { employees, attendance, payroll, billing };
}

export function createApp(deps: AppDeps) {
  const app = express();
  app.use(cors({ origin: deps.corsOrigin, credentials: true }));
  app.use(express.json({ limit: '12mb' }));

  const services = createServices(deps);
  const { jwtSecret } = deps;

  app.use('/api/auth', authRouter({ employees: services.employees, jwtSecret }));
  app.use('/api/employees', employeesRouter({ ...services, photos: deps.photos, jwtSecret }));
  app.use('/api/attendance', attendanceRouter({ attendance: services.attendance, jwtSecret }));
  app.use('/api/payroll', payrollRouter({ payroll: services.payroll, mailer: deps.mailer, companyName: deps.companyName, jwtSecret }));
  app.use('/api/clients', clientsRouter({ billing: services.billing, jwtSecret }));
  app.use('/api/finance', financeRouter({ billing: services.billing, jwtSecret }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError && 'body' in err) {
      return res.status(400).json({ message: 'Malformed JSON body' });
    }
    console.error('Unhandled route error', err);
    return res.status(500).json({ message: 'Internal server error' });
  });

  return app;
}
