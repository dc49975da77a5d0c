import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
  VersionColumn,
} from 'typeorm';
import { Category } from '../../categories/entity/category.entity';
import { Subcategory } from '../../categories/entity/subcategory.entity';
import {
  ComplaintPriority,
  ComplaintStatus,
} from '../../common/enums/complaint.enum';
import { User } from '../../users/entity/user.entity';

@Entity('complaints')
export class Complaint {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 20, unique: true, update: false })
  complaint_no!: string;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  @Column({ type: 'text' })
  description!: string;

  @Column({ type: 'int' })
  category_id!: number;

  @ManyToOne(() => Category, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'category_id' })
  category!: Category;

  @Column({ type: 'int', nullable: true })
  subcategory_id!: number | null;

  @ManyToOne(() => Subcategory, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'subcategory_id' })
  subcategory!: Subcategory | null;

  @Index()
  @Column({
    type: 'simple-enum',
    enum: ComplaintStatus,
    default: ComplaintStatus.PENDING,
  })
  status!: ComplaintStatus;

  @Column({
    type: 'simple-enum',
    enum: ComplaintPriority,
    default: ComplaintPriority.MEDIUM,
  })
  priority!: ComplaintPriority;

  @Index()
  @Column({ type: 'int', update: false })
  created_by_id!: number;

  @ManyToOne(() => User)
  @JoinColumn({ name: 'created_by_id' })
  creator!: User;

  @Index()
  @Column({ type: 'int', nullable: true })
  assigned_to_id!: number | null;

  @ManyToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'assigned_to_id' })
  assignee!: User | null;

  @Column({ type: 'text', default: '' })
  remarks!: string;

  @Column({ type: 'text', default: '' })
  admin_remarks!: string;

  @Column({ type: Date, nullable: true })
  resolved_at!: Date | null;

  @Column({ type: Date, nullable: true })
  closed_at!: Date | null;

  @VersionColumn()
  version!: number;

  @Index()
  @CreateDateColumn({ name: 'created_at' })
  created_at!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updated_at!: Date;
}
