import { Inject, Injectable } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import {
  COMPLAINT_NO_PREFIX,
  formatComplaintNo,
  parseComplaintNo,
  toDateKey,
} from '../common/utils/complaint-number.util';
import { complaintsConfig, ComplaintsConfig } from '../config/configuration';
import { ComplaintSequence } from './entity/complaint-sequence.entity';
import { Complaint } from './entity/complaints.entity';

/**
 * Hands out `CMP-YYYYMMDD-XXXXXX` numbers. Must be called inside the
 * transaction that inserts the complaint: the increment locks the day's
 * counter row until that transaction ends.
 */
@Injectable()
export class ComplaintNumberService {
  constructor(
    @Inject(complaintsConfig.KEY)
    private readonly config: ComplaintsConfig,
  ) {}

  dateKey(at: Date = new Date()): string {
    return toDateKey(at, this.config.idTimeZone);
  }

  async allocate(manager: EntityManager, at: Date = new Date()): Promise<string> {
    const dateKey = this.dateKey(at);

    await manager
      .createQueryBuilder()
      .insert()
      .into(ComplaintSequence)
      .values({ date_key: dateKey, last_value: 0 })
      .orIgnore()
      .execute();
    await manager.increment(ComplaintSequence, { date_key: dateKey }, 'last_value', 1);

    const counter = await manager.findOneByOrFail(ComplaintSequence, {
      date_key: dateKey,
    });

    // numbers may exist that the counter never saw (imports, manual fixes)
    const highest = await this.highestIssued(manager, dateKey);
    let sequence = counter.last_value;
    if (highest >= sequence) {
      sequence = highest + 1;
      await manager.update(
        ComplaintSequence,
        { date_key: dateKey },
        { last_value: sequence },
      );
    }

    return formatComplaintNo(dateKey, sequence);
  }

  private async highestIssued(
    manager: EntityManager,
    dateKey: string,
  ): Promise<number> {
    const latest = await manager
      .getRepository(Complaint)
      .createQueryBuilder('c')
      .select('c.complaint_no', 'complaint_no')
      .where('c.complaint_no LIKE :prefix', {
        prefix: `${COMPLAINT_NO_PREFIX}-${dateKey}-%`,
      })
      .orderBy('c.complaint_no', 'DESC')
      .limit(1)
      .getRawOne<{ complaint_no: string }>();

    if (!latest) return 0;
    return parseComplaintNo(latest.complaint_no)?.sequence ?? 0;
  }
}
