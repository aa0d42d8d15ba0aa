import { DataSource, IsNull } from 'typeorm';
import { Attendance } from '../entities/Attendance';
import { Employee } from '../entities/Employee';
import { Result, fail, notFound, ok } from '../errors';
import { CheckInReceipt, CheckOutReceipt } from '../types';
import { checkInSchema, checkOutSchema, parseInput } from '../validation/schemas';
import { Clock } from './clock';
import { PhotoStore } from './photoStore';
import { runInTransaction } from './transactions';

const MS_PER_HOUR = 60 * 60 * 1000;

/** Clamped at zero if the clock stepped back between check-in and check-out. */
export function hoursBetween(from: string | Date, to: string | Date): number {
  return Math.max(0, (new Date(to).getTime() - new Date(from).getTime()) / MS_PER_HOUR);
}

export type AttendanceListing = Attendance & { fullName: string | null };

export class AttendanceService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly clock: Clock,
    private readonly photos: PhotoStore
  ) {}

  /**
   * Opens a new session. A check-in while another session is still open is
   * accepted; checkOut only ever closes the newest open one.
   */
  async checkIn(employeeId: string, input: { location?: string; selfie?: string }): Promise<Result<CheckInReceipt>> {
    const parsed = parseInput(checkInSchema, input);
    if (!parsed.ok) return parsed;

    if (!(await this.dataSource.getRepository(Employee).existsBy({ employeeId }))) {
      return fail(notFound('employee', employeeId));
    }

    const checkInTime = this.clock.now().toISOString();
    const selfieKey = parsed.value.selfie ? await this.photos.put('selfie', employeeId, parsed.value.selfie) : null;

    const session = this.dataSource.getRepository(Attendance).create({
      employeeId,
      checkInTime,
      checkInLocation: parsed.value.location,
      checkInSelfie: selfieKey,
      checkOutTime: null,
      checkOutLocation: null,
      workingHours: null
    });
    await runInTransaction(this.dataSource, (manager) => manager.getRepository(Attendance).save(session));
    return ok({ sessionId: session.id, checkInTime });
  }

  /**
   * Closes the most recent open session. The update only applies while the
   * row is still open, so two concurrent checkouts cannot close the same row;
   * the loser re-reads and moves on to the next open session, if any.
   */
  async checkOut(employeeId: string, input: { location?: string }): Promise<Result<CheckOutReceipt>> {
    const parsed = parseInput(checkOutSchema, input);
    if (!parsed.ok) return parsed;
    const { location } = parsed.value;

    return runInTransaction(this.dataSource, async (manager) => {
      const repo = manager.getRepository(Attendance);
      for (;;) {
        const open = await repo.findOne({
          where: { employeeId, checkOutTime: IsNull() },
          order: { checkInTime: 'DESC', id: 'DESC' }
        });
        if (!open) return fail({ kind: 'NoOpenSession', employeeId });

        const now = this.clock.now();
        const checkOutTime = now.toISOString();
        const workingHours = hoursBetween(open.checkInTime, now);

        const result = await manager
          .createQueryBuilder()
          .update(Attendance)
          .set({ checkOutTime, checkOutLocation: location, workingHours })
          .where('id = :id', { id: open.id })
          .andWhere('check_out_time IS NULL')
          .execute();
        if (result.affected === 1) {
          return ok({ sessionId: open.id, workingHours, checkOutTime });
        }
      }
    });
  }

  async listAll(): Promise<AttendanceListing[]> {
    const rows = await this.dataSource
      .getRepository(Attendance)
      .createQueryBuilder('a')
      .leftJoin(Employee, 'e', 'e.employeeId = a.employeeId')
      .addSelect('e.fullName', 'full_name')
      .orderBy('a.checkInTime', 'DESC')
      .addOrderBy('a.id', 'DESC')
      .getRawAndEntities();

    return rows.entities.map((entity, i) => {
      const raw: unknown = rows.raw[i];
      const fullName =
        typeof raw === 'object' && raw !== null && 'full_name' in raw && typeof raw.full_name === 'string'
          ? raw.full_name
          : null;
      return Object.assign(entity, { fullName });
    });
  }
}
