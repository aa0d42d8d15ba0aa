import { Entity, PrimaryColumn, Column } from 'typeorm';

export type CompanyType = 'GEM' | 'NON-GEM';

@Entity('clients')
export class Client {
  @PrimaryColumn({ name: 'client_id', type: 'text' })
  clientId!: string;

  @Column({ name: 'org_name', type: 'text' })
  orgName!: string;

  @Column({ name: 'description', type: 'text', nullable: true })
  description!: string | null;

  @Column({ name: 'requirements', type: 'text', nullable: true })
  requirements!: string | null;

  @Column({ name: 'company_contact', type: 'text', nullable: true })
  companyContact!: string | null;

  @Column({ name: 'company_email', type: 'text', nullable: true })
  companyEmail!: string | null;

  @Column({ name: 'person_in_charge_name', type: 'text', nullable: true })
  personInChargeName!: string | null;

  @Column({ name: 'person_in_charge_phone', type: 'text', nullable: true })
  personInChargePhone!: string | null;

  @Column({ name: 'person_in_charge_email', type: 'text', nullable: true })
  personInChargeEmail!: string | null;

  @Column({ name: 'company_type', type: 'text', nullable: true })
  companyType!: CompanyType | null;

  // fixed at registration
  @Column({ name: 'total_bill', type: 'double precision' })
  totalBill!: number;

  @Column({ name: 'outstanding', type: 'double precision' })
  outstanding!: number;
}
