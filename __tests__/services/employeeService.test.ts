import { DataSource } from 'typeorm';
import { Employee } from '../../src/entities/Employee';
import { AttendanceService } from '../../src/services/attendanceService';
import { BillingService } from '../../src/services/billingService';
import { EmployeeService } from '../../src/services/employeeService';
import { PayrollService } from '../../src/services/payrollService';
import { FAKE_IMAGE, FixedClock, MemoryPhotoStore, TEST_BCRYPT_ROUNDS, createTestDataSource } from '../helpers';

describe('EmployeeService', () => {
  let ds: DataSource;
  let clock: FixedClock;
  let photos: MemoryPhotoStore;
  let employees: EmployeeService;
  let billing: BillingService;

  beforeEach(async () => {
    ds = await createTestDataSource();
    clock = new FixedClock('2024-03-10T08:00:00.000Z');
    photos = new MemoryPhotoStore();
    employees = new EmployeeService(ds, photos, TEST_BCRYPT_ROUNDS);
    billing = new BillingService(ds, clock, new PayrollService(ds, clock));
  });

  afterEach(async () => {
    await ds.destroy();
  });

  describe('registerEmployee', () => {
    it('stores the employee without a client or rate and hides the password', async () => {
      const result = await employees.registerEmployee({
        employeeId: 'E1',
        fullName: '  Asha Verma ',
        email: 'asha@example.com',
        dob: '1990-04-21',
        password: 'test-secret'
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).not.toHaveProperty('password');
      expect(result.value).toMatchObject({
        employeeId: 'E1',
        fullName: 'Asha Verma',
        email: 'asha@example.com',
        dob: '1990-04-21',
        contactNumber: null,
        role: 'Employee',
        assignedClientId: null,
        ratePerHour: null
      });

      const row = await ds.getRepository(Employee).findOneByOrFail({ employeeId: 'E1' });
      expect(row.password).not.toBe('test-secret');
      expect(row.password.startsWith('$2')).toBe(true);
    });

    it('generates an ID when none is given', async () => {
      const result = await employees.registerEmployee({ fullName: 'Ravi Kumar', password: 'test-secret' });
      expect(result.ok && result.value.employeeId).toMatch(/^EMP-[0-9a-f]{8}$/);
    });

    it('keeps photo bytes in the photo store and only keys on the row', async () => {
      await employees.registerEmployee({
        employeeId: 'E1',
        fullName: 'Asha Verma',
        password: 'test-secret',
        photo: `data:image/png;base64,${FAKE_IMAGE}`,
        signaturePhoto: FAKE_IMAGE
      });

      const row = await ds.getRepository(Employee).findOneByOrFail({ employeeId: 'E1' });
      expect(row.photo).toBe('photo-E1-1');
      expect(row.aadharPhoto).toBeNull();
      expect(row.signaturePhoto).toBe('signature-E1-2');
      expect(photos.items.get('photo-E1-1')?.toString()).toBe('fake-image-bytes');
    });

    it('registers only one of two concurrent employees with the same ID', async () => {
      const results = await Promise.all([
        employees.registerEmployee({ employeeId: 'E1', fullName: 'Asha Verma', password: 'test-secret' }),
        employees.registerEmployee({ employeeId: 'E1', fullName: 'Ravi Kumar', password: 'test-secret' })
      ]);
      expect(results.map((r) => r.ok).sort()).toEqual([false, true]);
      expect(await ds.getRepository(Employee).count()).toBe(1);
    });

    it('rejects duplicates and malformed fields', async () => {
      await employees.registerEmployee({ employeeId: 'E1', fullName: 'Asha Verma', password: 'test-secret' });

      expect(await employees.registerEmployee({ employeeId: 'E1', fullName: 'Other', password: 'test-secret' })).toEqual({
        ok: false,
        error: { kind: 'ValidationError', issues: ['Employee ID E1 is already registered'] }
      });

      expect(
        await employees.registerEmployee({ employeeId: 'E2', fullName: 'Ravi Kumar', password: 'test-secret', email: 'not-an-email' })
      ).toEqual({ ok: false, error: { kind: 'ValidationError', issues: ['email: Invalid email address'] } });

      expect(
        await employees.registerEmployee({ employeeId: 'E2', fullName: 'Ravi Kumar', password: 'test-secret', dob: '2024-13-45' })
      ).toEqual({ ok: false, error: { kind: 'ValidationError', issues: ['dob: Invalid date'] } });

      expect(await ds.getRepository(Employee).count()).toBe(1);
    });
  });

  describe('authenticate', () => {
    beforeEach(async () => {
      await employees.registerEmployee({ employeeId: 'CEO1', fullName: 'Chitra Rao', role: 'CEO', password: 'test-secret' });
    });

    it('returns the request context for matching credentials', async () => {
      expect(await employees.authenticate('CEO1', 'test-secret')).toEqual({
        employeeId: 'CEO1',
        role: 'CEO',
        fullName: 'Chitra Rao'
      });
    });

    it('returns null for a wrong password or an unknown employee', async () => {
      expect(await employees.authenticate('CEO1', 'wrong-secret')).toBeNull();
      expect(await employees.authenticate('NOPE', 'test-secret')).toBeNull();
    });
  });

  describe('assignToClient', () => {
    beforeEach(async () => {
      await employees.registerEmployee({ employeeId: 'E1', fullName: 'Asha Verma', password: 'test-secret' });
      await billing.registerClient({ clientId: 'C1', orgName: 'Acme Facilities', totalBill: 5000 });
    });

    it('sets the client and hourly rate', async () => {
      const result = await employees.assignToClient('E1', { clientId: 'C1', ratePerHour: 120.5 });
      expect(result.ok && [result.value.assignedClientId, result.value.ratePerHour]).toEqual(['C1', 120.5]);

      const row = await ds.getRepository(Employee).findOneByOrFail({ employeeId: 'E1' });
      expect(row.assignedClientId).toBe('C1');
      expect(row.ratePerHour).toBe(120.5);
    });

    it('returns NotFound for an unknown employee or client', async () => {
      expect(await employees.assignToClient('E404', { clientId: 'C1', ratePerHour: 10 })).toEqual({
        ok: false,
        error: { kind: 'NotFound', entity: 'employee', id: 'E404' }
      });
      expect(await employees.assignToClient('E1', { clientId: 'C404', ratePerHour: 10 })).toEqual({
        ok: false,
        error: { kind: 'NotFound', entity: 'client', id: 'C404' }
      });

      const row = await ds.getRepository(Employee).findOneByOrFail({ employeeId: 'E1' });
      expect(row.assignedClientId).toBeNull();
    });

    it('rejects a negative rate', async () => {
      expect(await employees.assignToClient('E1', { clientId: 'C1', ratePerHour: -1 })).toEqual({
        ok: false,
        error: { kind: 'ValidationError', issues: ['ratePerHour: ratePerHour must not be negative'] }
      });
    });
  });

  it('returns the profile with attendance in check-in order', async () => {
    await employees.registerEmployee({ employeeId: 'E1', fullName: 'Asha Verma', password: 'test-secret' });
    const attendance = new AttendanceService(ds, clock, photos);
    await attendance.checkIn('E1', { location: 'office', selfie: FAKE_IMAGE });
    clock.advanceMinutes(60);
    await attendance.checkOut('E1', { location: 'office' });
    clock.advanceMinutes(60);
    await attendance.checkIn('E1', { location: 'site', selfie: FAKE_IMAGE });

    const profile = await employees.getProfile('E1');
    expect(profile.ok).toBe(true);
    if (!profile.ok) return;
    expect(profile.value.employee).not.toHaveProperty('password');
    expect(profile.value.attendance.map((a) => [a.checkInLocation, a.workingHours])).toEqual([
      ['office', 1],
      ['site', null]
    ]);

    expect(await employees.getProfile('E404')).toEqual({
      ok: false,
      error: { kind: 'NotFound', entity: 'employee', id: 'E404' }
    });
  });

  it('searches by ID or name, case-insensitively', async () => {
    await employees.registerEmployee({ employeeId: 'E1', fullName: 'Asha Verma', password: 'test-secret' });
    await employees.registerEmployee({ employeeId: 'E2', fullName: 'Ravi Kumar', password: 'test-secret' });

    expect((await employees.search('asha')).map((e) => e.employeeId)).toEqual(['E1']);
    expect((await employees.search('e2')).map((e) => e.employeeId)).toEqual(['E2']);
    expect((await employees.search('')).map((e) => e.employeeId)).toEqual(['E1', 'E2']);
    expect(await employees.search('zzz')).toEqual([]);
  });
});
