import { TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { ComplaintStatus } from '../common/enums/complaint.enum';
import { UserRoleType } from '../common/enums/user-role.enum';
import {
  ConflictError,
  NotFoundError,
  PermissionError,
  StateError,
  ValidationError,
} from '../common/exceptions/domain.exceptions';
import { Actor } from '../common/interfaces/jwt-user.interface';
import { ComplaintsService } from '../complaints/complaints.service';
import { NotificationService } from '../notification/notification.service';
import { createActor, createCategory } from '../test/fixtures';
import { createTestingModule } from '../test/testing-module';
import { FeedbackModule } from './feedback.module';
import { FeedbackService } from './feedback.service';

describe('FeedbackService', () => {
  let moduleRef: TestingModule;
  let complaints: ComplaintsService;
  let service: FeedbackService;
  let notifications: NotificationService;
  let admin: Actor;
  let alice: Actor;
  let carol: Actor;
  let bob: Actor;
  let categoryId: number;

  const file = async (actor: Actor = alice): Promise<string> => {
    const created = await complaints.create(actor, {
      title: 'Broken heater',
      description: 'Library reading room is freezing',
      category_id: categoryId,
    });
    return created.data.complaint_no;
  };

  const resolved = async (actor: Actor = alice): Promise<string> => {
    const no = await file(actor);
    await complaints.assign(admin, no, { assigned_to: bob.id });
    await complaints.updateStatus(bob, no, {
      status: ComplaintStatus.RESOLVED,
      remarks: 'Heater serviced',
    });
    return no;
  };

  beforeEach(async () => {
    moduleRef = await createTestingModule([FeedbackModule]);
    const dataSource = moduleRef.get(DataSource);
    complaints = moduleRef.get(ComplaintsService);
    service = moduleRef.get(FeedbackService);
    notifications = moduleRef.get(NotificationService);

    admin = await createActor(dataSource, UserRoleType.ADMIN, 'Admin');
    alice = await createActor(dataSource, UserRoleType.STUDENT, 'Alice');
    carol = await createActor(dataSource, UserRoleType.STUDENT, 'Carol');
    bob = await createActor(dataSource, UserRoleType.FACULTY, 'Bob');
    categoryId = (await createCategory(dataSource, 'Facilities')).category.id;
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('records feedback on a resolved complaint and tells the assignee', async () => {
    const no = await resolved();
    const result = await service.addFeedback(alice, no, {
      rating: 5,
      comments: '  Warm again  ',
    });

    expect(result.data).toMatchObject({
      complaint_no: no,
      rating: 5,
      comments: 'Warm again',
      user: { id: alice.id, name: 'Alice' },
    });
    const bobs = (await notifications.findAll(bob.id)).data;
    expect(bobs[0].message).toBe(`Feedback received for complaint ${no}: 5/5`);
  });

  it('accepts feedback on a closed complaint', async () => {
    const no = await resolved();
    await complaints.updateStatus(admin, no, { status: ComplaintStatus.CLOSED });
    const result = await service.addFeedback(alice, no, { rating: 3 });
    expect(result.data.comments).toBe('');
  });

  it('refuses feedback before the complaint is resolved', async () => {
    const no = await file();
    const promise = service.addFeedback(alice, no, { rating: 4 });
    await expect(promise).rejects.toBeInstanceOf(StateError);
    await expect(promise).rejects.toThrow(
      'Feedback can only be given on resolved or closed complaints',
    );
  });

  it('only takes feedback from the student who filed the complaint', async () => {
    const no = await resolved();
    await expect(service.addFeedback(carol, no, { rating: 4 })).rejects.toBeInstanceOf(
      PermissionError,
    );
    await expect(service.addFeedback(admin, no, { rating: 4 })).rejects.toBeInstanceOf(
      PermissionError,
    );
  });

  it('accepts a single submission per complaint', async () => {
    const no = await resolved();
    await service.addFeedback(alice, no, { rating: 4 });
    await expect(service.addFeedback(alice, no, { rating: 2 })).rejects.toBeInstanceOf(
      ConflictError,
    );
  });

  it('rejects ratings outside one to five', async () => {
    const no = await resolved();
    await expect(service.addFeedback(alice, no, { rating: 0 })).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(service.addFeedback(alice, no, { rating: 6 })).rejects.toMatchObject({
      errors: { rating: ['Rating must be between 1 and 5'] },
    });
  });

  it('reports an unknown complaint as missing', async () => {
    await expect(
      service.addFeedback(alice, 'CMP-20240101-000009', { rating: 4 }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('lists feedback within the caller scope', async () => {
    const aliceNo = await resolved(alice);
    const carolNo = await resolved(carol);
    await service.addFeedback(alice, aliceNo, { rating: 4 });
    await service.addFeedback(carol, carolNo, { rating: 2 });

    const own = await service.findAll(alice);
    expect(own.data.map((f) => f.complaint_no)).toEqual([aliceNo]);
    expect((await service.findAll(bob)).data).toHaveLength(2);
    expect((await service.findAll(admin)).data).toHaveLength(2);

    const single = await service.findForComplaint(alice, aliceNo);
    expect(single.data?.rating).toBe(4);
    await expect(service.findForComplaint(carol, aliceNo)).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});
