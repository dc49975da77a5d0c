import { Column, Entity, PrimaryColumn } from 'typeorm';

/** Last sequence number handed out for one calendar day (YYYYMMDD). */
@Entity('complaint_sequences')
export class ComplaintSequence {
  @PrimaryColumn({ type: 'varchar', length: 8 })
  date_key!: string;

  @Column({ type: 'int', default: 0 })
  last_value!: number;
}
