import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

@Entity('installments')
@Index('idx_installments_client', ['clientId'])
export class Installment {
  @PrimaryGeneratedColumn({ name: 'id', type: 'integer' })
  id!: number;

  @Column({ name: 'client_id', type: 'text' })
  clientId!: string;

  @Column({ name: 'amount_paid', type: 'double precision' })
  amountPaid!: number;

  @Column({ name: 'timestamp', type: 'text' })
  timestamp!: string;
}
