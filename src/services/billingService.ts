import { DataSource, ILike, In } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Client } from '../entities/Client';
import { Employee } from '../entities/Employee';
import { Installment } from '../entities/Installment';
import { Result, fail, invalid, notFound, ok } from '../errors';
import { EmployeeView, FinancialSummary } from '../types';
import { ClientRegistration, clientRegistrationSchema, installmentSchema, parseInput } from '../validation/schemas';
import { Clock } from './clock';
import { runInTransaction } from './transactions';
import { toEmployeeView } from './employeeService';
import { PayrollService, closedSessionsIn } from './payrollService';

export type ClientProfile = {
  client: Client;
  installments: Installment[];
  employees: EmployeeView[];
};

export class BillingService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly clock: Clock,
    private readonly payroll: PayrollService
  ) {}

  /** Outstanding always starts equal to the contracted total. */
  async registerClient(input: ClientRegistration): Promise<Result<Client>> {
    const parsed = parseInput(clientRegistrationSchema, input);
    if (!parsed.ok) return parsed;
    const { clientId: requestedId, ...data } = parsed.value;

    const clientId = requestedId ?? `CLI-${uuidv4().slice(0, 8)}`;
    return runInTransaction(this.dataSource, async (manager) => {
      const repo = manager.getRepository(Client);
      if (await repo.existsBy({ clientId })) {
        return fail<Client>(invalid(`Client ID ${clientId} is already registered`));
      }

      const client = repo.create({ clientId, ...data, outstanding: data.totalBill });
      await repo.insert(client);
      return ok(client);
    });
  }

  /**
   * Appends the installment and decrements outstanding in one transaction.
   * The decrement is a single `outstanding = outstanding - :amount` statement,
   * so concurrent payments for a client never overwrite each other. Overpayment
   * may leave outstanding negative.
   */
  async recordInstallment(clientId: string, input: { amount?: unknown }): Promise<Result<{ installment: Installment; outstanding: number }>> {
    const parsed = parseInput(installmentSchema, input);
    if (!parsed.ok) return parsed;
    const { amount } = parsed.value;

    return runInTransaction(this.dataSource, async (manager) => {
      const updated = await manager
        .createQueryBuilder()
        .update(Client)
        .set({ outstanding: () => 'outstanding - :amount' })
        .setParameter('amount', amount)
        .where('client_id = :clientId', { clientId })
        .execute();
      if (updated.affected !== 1) return fail(notFound('client', clientId));

      const repo = manager.getRepository(Installment);
      const installment = repo.create({ clientId, amountPaid: amount, timestamp: this.clock.now().toISOString() });
      await repo.save(installment);

      const client = await manager.getRepository(Client).findOneByOrFail({ clientId });
      return ok({ installment, outstanding: client.outstanding });
    });
  }

  async getClientProfile(clientId: string): Promise<Result<ClientProfile>> {
    const client = await this.dataSource.getRepository(Client).findOneBy({ clientId });
    if (!client) return fail(notFound('client', clientId));
    const installments = await this.dataSource
      .getRepository(Installment)
      .find({ where: { clientId }, order: { timestamp: 'ASC', id: 'ASC' } });
    const employees = await this.dataSource
      .getRepository(Employee)
      .find({ where: { assignedClientId: clientId }, order: { employeeId: 'ASC' } });
    return ok({ client, installments, employees: employees.map(toEmployeeView) });
  }

  async search(term: string): Promise<Client[]> {
    const pattern = `%${term}%`;
    return this.dataSource.getRepository(Client).find({
      where: [{ clientId: ILike(pattern) }, { orgName: ILike(pattern) }],
      order: { clientId: 'ASC' }
    });
  }

  /**
   * Total outstanding across clients, and month-to-date base salary
   * (hours x rate) summed over employees with closed sessions. Read only.
   */
  async financialSummary(): Promise<FinancialSummary> {
    const period = this.payroll.monthToDate();
    const manager = this.dataSource.manager;

    const clients = await manager.getRepository(Client).find({ select: { clientId: true, outstanding: true } });
    const totalOutstanding = clients.reduce((sum, c) => sum + c.outstanding, 0);

    const hoursByEmployee = new Map<string, number>();
    for (const s of await closedSessionsIn(manager, period)) {
      hoursByEmployee.set(s.employeeId, (hoursByEmployee.get(s.employeeId) ?? 0) + (s.workingHours ?? 0));
    }

    let totalBaseSalary = 0;
    if (hoursByEmployee.size > 0) {
      const employees = await manager.getRepository(Employee).find({
        where: { employeeId: In([...hoursByEmployee.keys()]) },
        select: { employeeId: true, ratePerHour: true }
      });
      for (const e of employees) {
        if (e.ratePerHour) totalBaseSalary += e.ratePerHour * (hoursByEmployee.get(e.employeeId) ?? 0);
      }
    }

    return {
      totalOutstanding,
      totalBaseSalary,
      period: { start: period.start.toISOString(), end: period.end.toISOString() }
    };
  }
}
