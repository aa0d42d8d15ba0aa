import { startOfMonth } from 'date-fns';
import { And, DataSource, EntityManager, LessThan, MoreThanOrEqual, Not, IsNull } from 'typeorm';
import { Attendance } from '../entities/Attendance';
import { Employee } from '../entities/Employee';
import { Result, fail, notFound, ok } from '../errors';
import { PayrollBreakdown, Payslip, Period } from '../types';
import { Clock } from './clock';

export const RETIREMENT_BENEFIT_1_RATE = 0.12;
export const RETIREMENT_BENEFIT_2_RATE = 0.13;
export const INSURANCE_1_RATE = 0.05;
export const INSURANCE_2_RATE = 0.05;

/**
 * Net pay deducts only retirement benefit 1 and insurance 1. Benefit 2 and
 * insurance 2 are reported alongside but never subtracted.
 */
export function computeBreakdown(ratePerHour: number, totalHours: number): PayrollBreakdown {
  const baseSalary = ratePerHour * totalHours;
  const retirementBenefit1 = RETIREMENT_BENEFIT_1_RATE * baseSalary;
  const retirementBenefit2 = RETIREMENT_BENEFIT_2_RATE * baseSalary;
  const insurance1 = INSURANCE_1_RATE * baseSalary;
  const insurance2 = INSURANCE_2_RATE * baseSalary;
  return {
    totalHours,
    ratePerHour,
    baseSalary,
    retirementBenefit1,
    retirementBenefit2,
    insurance1,
    insurance2,
    netSalary: baseSalary - (retirementBenefit1 + insurance1)
  };
}

export function roundCurrency(n: number): number {
  return Math.round((n + Number.EPSILON) * 100) / 100;
}

export function roundBreakdown(b: PayrollBreakdown): PayrollBreakdown {
  return {
    totalHours: roundCurrency(b.totalHours),
    ratePerHour: roundCurrency(b.ratePerHour),
    baseSalary: roundCurrency(b.baseSalary),
    retirementBenefit1: roundCurrency(b.retirementBenefit1),
    retirementBenefit2: roundCurrency(b.retirementBenefit2),
    insurance1: roundCurrency(b.insurance1),
    insurance2: roundCurrency(b.insurance2),
    netSalary: roundCurrency(b.netSalary)
  };
}

/** Closed sessions whose check-in falls inside [start, end). */
export function closedSessionsIn(manager: EntityManager, period: Period, employeeId?: string) {
  return manager.getRepository(Attendance).find({
    where: {
      ...(employeeId ? { employeeId } : {}),
      checkOutTime: Not(IsNull()),
      checkInTime: And(MoreThanOrEqual(period.start.toISOString()), LessThan(period.end.toISOString()))
    }
  });
}

export class PayrollService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly clock: Clock
  ) {}

  /** First day of the current month up to now, on the caller's clock. */
  monthToDate(): Period {
    const now = this.clock.now();
    return { start: startOfMonth(now), end: now };
  }

  resolvePeriod(period: Partial<Period> = {}): Period {
    const defaults = this.monthToDate();
    return { start: period.start ?? defaults.start, end: period.end ?? defaults.end };
  }

  /** Resolves to `ok(null)` when the employee has no hourly rate yet. */
  async computeSalary(employeeId: string, period: Partial<Period> = {}): Promise<Result<PayrollBreakdown | null>> {
    const range = this.resolvePeriod(period);
    const manager = this.dataSource.manager;
    const emp = await manager.getRepository(Employee).findOneBy({ employeeId });
    if (!emp) return fail(notFound('employee', employeeId));
    if (emp.ratePerHour === null) return ok(null);

    const sessions = await closedSessionsIn(manager, range, employeeId);
    const totalHours = sessions.reduce((sum, s) => sum + (s.workingHours ?? 0), 0);
    return ok(computeBreakdown(emp.ratePerHour, totalHours));
  }

  async payslipFor(employeeId: string, period: Partial<Period> = {}): Promise<Result<Payslip | null>> {
    const range = this.resolvePeriod(period);
    const salary = await this.computeSalary(employeeId, range);
    if (!salary.ok) return salary;
    if (!salary.value) return ok(null);

    const emp = await this.dataSource.getRepository(Employee).findOneByOrFail({ employeeId });
    return ok({
      employee: {
        employeeId: emp.employeeId,
        fullName: emp.fullName,
        email: emp.email,
        role: emp.role,
        assignedClientId: emp.assignedClientId
      },
      period: { start: range.start.toISOString(), end: range.end.toISOString() },
      generatedAt: this.clock.now().toISOString(),
      payroll: roundBreakdown(salary.value)
    });
  }
}
