import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import {
  ComplaintHistoryAction,
  ComplaintStatus,
} from '../../common/enums/complaint.enum';
import { User } from '../../users/entity/user.entity';
import { Complaint } from './complaints.entity';

/** Append-only audit record; see ComplaintHistorySubscriber. */
@Entity('complaint_history')
export class ComplaintHistory {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'int' })
  complaint_id!: number;

  @ManyToOne(() => Complaint, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'complaint_id' })
  complaint!: Complaint;

  @Column({ type: 'int' })
  changed_by_id!: number;

  @ManyToOne(() => User)
  @JoinColumn({ name: 'changed_by_id' })
  changed_by!: User;

  @Column({ type: 'simple-enum', enum: ComplaintHistoryAction })
  action!: ComplaintHistoryAction;

  @Column({ type: 'varchar', length: 50, nullable: true })
  field!: string | null;

  @Column({ type: 'text', nullable: true })
  old_value!: string | null;

  @Column({ type: 'text', nullable: true })
  new_value!: string | null;

  @Column({ type: 'simple-enum', enum: ComplaintStatus, nullable: true })
  from_status!: ComplaintStatus | null;

  @Column({ type: 'simple-enum', enum: ComplaintStatus, nullable: true })
  to_status!: ComplaintStatus | null;

  @Column({ type: 'text', default: '' })
  remarks!: string;

  @CreateDateColumn({ name: 'created_at' })
  created_at!: Date;
}
