import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

/**
 * One work session. A null `checkOutTime` means the session is still open.
 * Timestamps are ISO-8601 UTC strings so that string order is time order.
 */
@Entity('attendance')
@Index('idx_attendance_employee_check_in', ['employeeId', 'checkInTime'])
export class Attendance {
  @PrimaryGeneratedColumn({ name: 'id', type: 'integer' })
  id!: number;

  @Column({ name: 'employee_id', type: 'text' })
  employeeId!: string;

  @Column({ name: 'check_in_time', type: 'text' })
  checkInTime!: string;

  @Column({ name: 'check_in_location', type: 'text', nullable: true })
  checkInLocation!: string | null;

  @Column({ name: 'check_in_selfie', type: 'text', nullable: true })
  checkInSelfie!: string | null;

  @Column({ name: 'check_out_time', type: 'text', nullable: true })
  checkOutTime!: string | null;

  @Column({ name: 'check_out_location', type: 'text', nullable: true })
  checkOutLocation!: string | null;

  @Column({ name: 'working_hours', type: 'double precision', nullable: true })
  workingHours!: number | null;
}
