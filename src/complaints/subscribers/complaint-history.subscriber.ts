import { Injectable } from '@nestjs/common';
import {
  DataSource,
  EntitySubscriberInterface,
  RemoveEvent,
  UpdateEvent,
} from 'typeorm';
import { ComplaintHistory } from '../entity/complaint-history.entity';

@Injectable()
export class ComplaintHistorySubscriber
  implements EntitySubscriberInterface<ComplaintHistory>
{
  constructor(dataSource: DataSource) {
    dataSource.subscribers.push(this);
  }

  listenTo() {
    return ComplaintHistory;
  }

  beforeUpdate(event: UpdateEvent<ComplaintHistory>): void {
    throw new Error(
      `Complaint history is append-only (entry ${event.databaseEntity?.id ?? 'unknown'})`,
    );
  }

  beforeRemove(event: RemoveEvent<ComplaintHistory>): void {
    throw new Error(
      `Complaint history is append-only (entry ${event.entityId ?? 'unknown'})`,
    );
  }
}
