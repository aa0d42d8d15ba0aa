import { Entity, PrimaryColumn, Column } from 'typeorm';

export type EmployeeRole = 'CEO' | 'Employee';

@Entity('employees')
export class Employee {
  @PrimaryColumn({ name: 'employee_id', type: 'text' })
  employeeId!: string;

  @Column({ name: 'full_name', type: 'text' })
  fullName!: string;

  @Column({ name: 'contact_number', type: 'text', nullable: true })
  contactNumber!: string | null;

  @Column({ name: 'email', type: 'text', nullable: true })
  email!: string | null;

  @Column({ name: 'aadhar', type: 'text', nullable: true })
  aadhar!: string | null;

  @Column({ name: 'dob', type: 'text', nullable: true })
  dob!: string | null; // YYYY-MM-DD

  @Column({ name: 'address', type: 'text', nullable: true })
  address!: string | null;

  // photo columns hold PhotoStore keys, not bytes
  @Column({ name: 'photo', type: 'text', nullable: true })
  photo!: string | null;

  @Column({ name: 'aadhar_photo', type: 'text', nullable: true })
  aadharPhoto!: string | null;

  @Column({ name: 'signature_photo', type: 'text', nullable: true })
  signaturePhoto!: string | null;

  @Column({ name: 'role', type: 'text', default: 'Employee' })
  role!: EmployeeRole;

  @Column({ name: 'password', type: 'text' })
  password!: string;

  @Column({ name: 'assigned_client_id', type: 'text', nullable: true })
  assignedClientId!: string | null;

  @Column({ name: 'rate_per_hour', type: 'double precision', nullable: true })
  ratePerHour!: number | null;
}
