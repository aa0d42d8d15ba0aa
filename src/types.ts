import { Employee, EmployeeRole } from './entities/Employee';

/** Who is making the request; built per request from the bearer token. */
export type RequestContext = {
  employeeId: string;
  role: EmployeeRole;
  fullName?: string;
};

export type EmployeeView = Omit<Employee, 'password'>;

export type Period = {
  start: Date; // inclusive
  end: Date; // exclusive
};

export type PayrollBreakdown = {
  totalHours: number;
  ratePerHour: number;
  baseSalary: number;
  retirementBenefit1: number; // 12%, deducted
  retirementBenefit2: number; // 13%, not deducted
  insurance1: number; // 5%, deducted
  insurance2: number; // 5%, not deducted
  netSalary: number;
};

export type Payslip = {
  employee: Pick<EmployeeView, 'employeeId' | 'fullName' | 'email' | 'role' | 'assignedClientId'>;
  period: { start: string; end: string };
  generatedAt: string;
  payroll: PayrollBreakdown;
};

export type FinancialSummary = {
  totalOutstanding: number;
  totalBaseSalary: number;
  period: { start: string; end: string };
};

export type CheckInReceipt = {
  sessionId: number;
  checkInTime: string;
};

export type CheckOutReceipt = {
  sessionId: number;
  workingHours: number;
  checkOutTime: string;
};
