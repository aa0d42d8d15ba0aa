import bcrypt from 'bcrypt';
import { DataSource, ILike } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Employee } from '../entities/Employee';
import { Attendance } from '../entities/Attendance';
import { Client } from '../entities/Client';
import { Result, fail, invalid, notFound, ok } from '../errors';
import { RequestContext, EmployeeView } from '../types';
import {
  AssignmentInput,
  EmployeeRegistration,
  assignmentSchema,
  employeeRegistrationSchema,
  parseInput
} from '../validation/schemas';
import { PhotoStore } from './photoStore';
import { runInTransaction } from './transactions';

export function toEmployeeView(e: Employee): EmployeeView {
  const { password: _password, ...rest } = e;
  return rest;
}

export class EmployeeService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly photos: PhotoStore,
    private readonly bcryptRounds = 10
  ) {}

  async registerEmployee(input: EmployeeRegistration): Promise<Result<EmployeeView>> {
    const parsed = parseInput(employeeRegistrationSchema, input);
    if (!parsed.ok) return parsed;
    const data = parsed.value;

    const employeeId = data.employeeId ?? `EMP-${uuidv4().slice(0, 8)}`;
    const store = (kind: 'photo' | 'aadhar' | 'signature', bytes: Buffer | null) =>
      bytes ? this.photos.put(kind, employeeId, bytes) : Promise.resolve(null);

    return runInTransaction(this.dataSource, async (manager) => {
      const repo = manager.getRepository(Employee);
      if (await repo.existsBy({ employeeId })) {
        return fail<EmployeeView>(invalid(`Employee ID ${employeeId} is already registered`));
      }

      const employee = repo.create({
        employeeId,
        fullName: data.fullName,
        contactNumber: data.contactNumber,
        email: data.email,
        aadhar: data.aadhar,
        dob: data.dob,
        address: data.address,
        photo: await store('photo', data.photo),
        aadharPhoto: await store('aadhar', data.aadharPhoto),
        signaturePhoto: await store('signature', data.signaturePhoto),
        role: data.role,
        password: await bcrypt.hash(data.password, this.bcryptRounds),
        assignedClientId: null,
        ratePerHour: null
      });
      await repo.insert(employee);
      return ok(toEmployeeView(employee));
    });
  }

  async authenticate(employeeId: string, password: string): Promise<RequestContext | null> {
    const emp = await this.dataSource.getRepository(Employee).findOneBy({ employeeId });
    if (!emp) return null;
    const matches = await bcrypt.compare(password, emp.password);
    return matches ? { employeeId: emp.employeeId, role: emp.role, fullName: emp.fullName } : null;
  }

  /** The only place an employee's client and hourly rate change. */
  async assignToClient(employeeId: string, input: AssignmentInput): Promise<Result<EmployeeView>> {
    const parsed = parseInput(assignmentSchema, input);
    if (!parsed.ok) return parsed;
    const { clientId, ratePerHour } = parsed.value;

    return runInTransaction(this.dataSource, async (manager) => {
      const repo = manager.getRepository(Employee);
      const emp = await repo.findOneBy({ employeeId });
      if (!emp) return fail(notFound('employee', employeeId));
      if (!(await manager.getRepository(Client).existsBy({ clientId }))) return fail(notFound('client', clientId));

      await repo.update({ employeeId }, { assignedClientId: clientId, ratePerHour });
      return ok(toEmployeeView({ ...emp, assignedClientId: clientId, ratePerHour }));
    });
  }

  async getProfile(employeeId: string): Promise<Result<{ employee: EmployeeView; attendance: Attendance[] }>> {
    const emp = await this.dataSource.getRepository(Employee).findOneBy({ employeeId });
    if (!emp) return fail(notFound('employee', employeeId));
    const attendance = await this.dataSource
      .getRepository(Attendance)
      .find({ where: { employeeId }, order: { checkInTime: 'ASC', id: 'ASC' } });
    return ok({ employee: toEmployeeView(emp), attendance });
  }

  async search(term: string): Promise<EmployeeView[]> {
    const pattern = `%${term}%`;
    const rows = await this.dataSource.getRepository(Employee).find({
      where: [{ employeeId: ILike(pattern) }, { fullName: ILike(pattern) }],
      order: { employeeId: 'ASC' }
    });
    return rows.map(toEmployeeView);
  }
}
