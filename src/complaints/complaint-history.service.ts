import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import {
  ComplaintHistoryAction,
  ComplaintStatus,
} from '../common/enums/complaint.enum';
import { Actor } from '../common/interfaces/jwt-user.interface';
import { HistoryEntry, toHistoryEntry } from './complaints.mapper';
import { ComplaintHistory } from './entity/complaint-history.entity';

export interface HistoryRecord {
  action: ComplaintHistoryAction;
  field?: string | null;
  oldValue?: string | null;
  newValue?: string | null;
  fromStatus?: ComplaintStatus | null;
  toStatus?: ComplaintStatus | null;
  remarks?: string;
}

@Injectable()
export class ComplaintHistoryService {
  constructor(
    @InjectRepository(ComplaintHistory)
    private readonly historyRepo: Repository<ComplaintHistory>,
  ) {}

  /** Inserts entries through the caller's transaction, in the order given. */
  async append(
    manager: EntityManager,
    complaintId: number,
    actor: Actor,
    records: HistoryRecord[],
  ): Promise<ComplaintHistory[]> {
    const saved: ComplaintHistory[] = [];
    for (const record of records) {
      const entry = manager.create(ComplaintHistory, {
        complaint_id: complaintId,
        changed_by_id: actor.id,
        action: record.action,
        field: record.field ?? null,
        old_value: record.oldValue ?? null,
        new_value: record.newValue ?? null,
        from_status: record.fromStatus ?? null,
        to_status: record.toStatus ?? null,
        remarks: record.remarks ?? '',
      });
      saved.push(await manager.save(entry));
    }
    return saved;
  }

  async listFor(complaintId: number): Promise<readonly HistoryEntry[]> {
    const entries = await this.historyRepo.find({
      where: { complaint_id: complaintId },
      relations: ['changed_by'],
      order: { id: 'ASC' },
    });
    return Object.freeze(entries.map(toHistoryEntry));
  }

  countFor(complaintId: number): Promise<number> {
    return this.historyRepo.count({ where: { complaint_id: complaintId } });
  }
}
