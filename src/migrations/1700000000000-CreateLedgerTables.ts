import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm';

const text = (name: string, isNullable = true) => ({ name, type: 'text', isNullable });
const amount = (name: string, isNullable = false) => ({ name, type: 'double precision', isNullable });
const serial = (name: string) => ({
  name,
  type: 'integer',
  isPrimary: true,
  isGenerated: true,
  generationStrategy: 'increment' as const
});

export class CreateLedgerTables1700000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'employees',
        columns: [
          { name: 'employee_id', type: 'text', isPrimary: true },
          text('full_name', false),
          text('contact_number'),
          text('email'),
          text('aadhar'),
          text('dob'),
          text('address'),
          text('photo'),
          text('aadhar_photo'),
          text('signature_photo'),
          { name: 'role', type: 'text', isNullable: false, default: "'Employee'" },
          text('password', false),
          text('assigned_client_id'),
          amount('rate_per_hour', true)
        ]
      }),
      true
    );

    await queryRunner.createTable(
      new Table({
        name: 'attendance',
        columns: [
          serial('id'),
          text('employee_id', false),
          text('check_in_time', false),
          text('check_in_location'),
          text('check_in_selfie'),
          text('check_out_time'),
          text('check_out_location'),
          amount('working_hours', true)
        ]
      }),
      true
    );
    await queryRunner.createIndex(
      'attendance',
      new TableIndex({ name: 'idx_attendance_employee_check_in', columnNames: ['employee_id', 'check_in_time'] })
    );

    await queryRunner.createTable(
      new Table({
        name: 'clients',
        columns: [
          { name: 'client_id', type: 'text', isPrimary: true },
          text('org_name', false),
          text('description'),
          text('requirements'),
          text('company_contact'),
          text('company_email'),
          text('person_in_charge_name'),
          text('person_in_charge_phone'),
          text('person_in_charge_email'),
          text('company_type'),
          amount('total_bill'),
          amount('outstanding')
        ]
      }),
      true
    );

    await queryRunner.createTable(
      new Table({
        name: 'installments',
        columns: [serial('id'), text('client_id', false), amount('amount_paid'), text('timestamp', false)]
      }),
      true
    );
    await queryRunner.createIndex(
      'installments',
      new TableIndex({ name: 'idx_installments_client', columnNames: ['client_id'] })
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropIndex('installments', 'idx_installments_client');
    await queryRunner.dropTable('installments', true);
    await queryRunner.dropTable('clients', true);
    await queryRunner.dropIndex('attendance', 'idx_attendance_employee_check_in');
    await queryRunner.dropTable('attendance', true);
    await queryRunner.dropTable('employees', true);
  }
}
