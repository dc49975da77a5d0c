import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { User } from '../../users/entity/user.entity';
import { Complaint } from './complaints.entity';

@Entity('complaint_attachments')
export class ComplaintAttachment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'int' })
  complaint_id!: number;

  @ManyToOne(() => Complaint, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'complaint_id' })
  complaint!: Complaint;

  @Column({ type: 'varchar', length: 255 })
  file_path!: string;

  @Column({ type: 'varchar', length: 255 })
  original_name!: string;

  @Column({ type: 'varchar', length: 100 })
  mime_type!: string;

  @Column({ type: 'int' })
  size!: number;

  @Column({ type: 'int' })
  uploaded_by_id!: number;

  @ManyToOne(() => User)
  @JoinColumn({ name: 'uploaded_by_id' })
  uploaded_by!: User;

  @CreateDateColumn({ name: 'created_at' })
  created_at!: Date;
}
