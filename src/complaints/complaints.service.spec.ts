import { InternalServerErrorException } from '@nestjs/common';
import { TestingModule } from '@nestjs/testing';
import { DataSource, EntityManager } from 'typeorm';
import { Category } from '../categories/entity/category.entity';
import { Subcategory } from '../categories/entity/subcategory.entity';
import {
  ComplaintHistoryAction,
  ComplaintPriority,
  ComplaintStatus,
  ReopenPolicy,
} from '../common/enums/complaint.enum';
import { UserRoleType } from '../common/enums/user-role.enum';
import {
  ConflictError,
  NotFoundError,
  PermissionError,
  StateError,
  ValidationError,
} from '../common/exceptions/domain.exceptions';
import { Actor } from '../common/interfaces/jwt-user.interface';
import { toDateKey } from '../common/utils/complaint-number.util';
import { complaintsConfig, ComplaintsConfig } from '../config/configuration';
import { FeedbackModule } from '../feedback/feedback.module';
import { FeedbackService } from '../feedback/feedback.service';
import { NotificationService } from '../notification/notification.service';
import { createActor, createCategory } from '../test/fixtures';
import { createTestingModule } from '../test/testing-module';
import { ComplaintHistoryService } from './complaint-history.service';
import { ComplaintsModule } from './complaints.module';
import { ComplaintsService } from './complaints.service';
import { CreateComplaintsDto } from './dto/complaints.dto';
import { ComplaintHistory } from './entity/complaint-history.entity';
import { Complaint } from './entity/complaints.entity';

const { PENDING, IN_PROGRESS, RESOLVED, CLOSED } = ComplaintStatus;

describe('ComplaintsService', () => {
  let moduleRef: TestingModule;
  let dataSource: DataSource;
  let service: ComplaintsService;
  let feedbackService: FeedbackService;
  let notifications: NotificationService;
  let config: ComplaintsConfig;

  let admin: Actor;
  let alice: Actor;
  let carol: Actor;
  let bob: Actor;
  let dave: Actor;
  let itSupport: Category;
  let network: Subcategory;
  let facilities: Category;

  const complaintInput = (
    overrides: Partial<CreateComplaintsDto> = {},
  ): CreateComplaintsDto => ({
    title: 'Network Issue',
    description: 'Wifi down in Block B',
    category_id: itSupport.id,
    ...overrides,
  });

  const fileComplaint = async (
    actor: Actor = alice,
    overrides: Partial<CreateComplaintsDto> = {},
  ): Promise<string> => {
    const created = await service.create(actor, complaintInput(overrides));
    return created.data.complaint_no;
  };

  const assignedComplaint = async (): Promise<string> => {
    const no = await fileComplaint();
    await service.assign(admin, no, { assigned_to: bob.id });
    return no;
  };

  const resolvedComplaint = async (): Promise<string> => {
    const no = await assignedComplaint();
    await service.updateStatus(bob, no, { status: RESOLVED, remarks: 'Router replaced' });
    return no;
  };

  const historyOf = async (no: string) => (await service.listHistory(admin, no)).data;

  const messagesFor = async (actor: Actor) =>
    (await notifications.findAll(actor.id)).data.map((n) => n.message);

  beforeEach(async () => {
    moduleRef = await createTestingModule([ComplaintsModule, FeedbackModule]);
    dataSource = moduleRef.get(DataSource);
    service = moduleRef.get(ComplaintsService);
    feedbackService = moduleRef.get(FeedbackService);
    notifications = moduleRef.get(NotificationService);
    config = moduleRef.get<ComplaintsConfig>(complaintsConfig.KEY);

    admin = await createActor(dataSource, UserRoleType.ADMIN, 'Admin');
    alice = await createActor(dataSource, UserRoleType.STUDENT, 'Alice');
    carol = await createActor(dataSource, UserRoleType.STUDENT, 'Carol');
    bob = await createActor(dataSource, UserRoleType.FACULTY, 'Bob');
    dave = await createActor(dataSource, UserRoleType.FACULTY, 'Dave');

    const itData = await createCategory(dataSource, 'IT Support', ['Network', 'Printers']);
    itSupport = itData.category;
    network = itData.subcategories[0];
    facilities = (await createCategory(dataSource, 'Facilities', ['Plumbing'])).category;
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await moduleRef.close();
  });

  describe('full lifecycle', () => {
    it('walks a complaint from creation to closure', async () => {
      const today = toDateKey(new Date(), 'UTC');

      const created = await service.create(
        alice,
        complaintInput({ priority: ComplaintPriority.HIGH }),
      );
      const no = created.data.complaint_no;
      expect(no).toBe(`CMP-${today}-000001`);
      expect(created.data.status).toBe(PENDING);
      expect(created.data.priority).toBe(ComplaintPriority.HIGH);
      expect(created.data.created_by?.id).toBe(alice.id);
      expect(created.data.version).toBe(1);
      expect(await historyOf(no)).toHaveLength(1);
      expect(await messagesFor(admin)).toEqual([`New complaint ${no} created by Alice`]);

      const assigned = await service.assign(admin, no, { assigned_to: bob.id });
      expect(assigned.data.status).toBe(IN_PROGRESS);
      expect(assigned.data.assigned_to?.id).toBe(bob.id);
      expect(assigned.data.version).toBe(2);
      expect(await historyOf(no)).toHaveLength(2);
      expect(await messagesFor(bob)).toEqual([`Complaint ${no} assigned to you`]);

      const resolved = await service.updateStatus(bob, no, {
        status: RESOLVED,
        remarks: 'Router replaced',
      });
      expect(resolved.message).toBe('Complaint status updated to Resolved.');
      expect(resolved.data.status).toBe(RESOLVED);
      expect(resolved.data.remarks).toBe('Router replaced');
      expect(resolved.data.resolved_at).not.toBeNull();
      expect(await historyOf(no)).toHaveLength(3);
      expect((await messagesFor(alice))[0]).toBe(
        `Complaint ${no} status updated to Resolved. Please share your feedback.`,
      );

      const feedback = await feedbackService.addFeedback(alice, no, {
        rating: 4,
        comments: 'Quick fix',
      });
      expect(feedback.data.rating).toBe(4);
      expect(await historyOf(no)).toHaveLength(3);

      await expect(
        service.updateStatus(bob, no, { status: CLOSED }),
      ).rejects.toBeInstanceOf(PermissionError);

      const closed = await service.updateStatus(admin, no, { status: CLOSED });
      expect(closed.data.status).toBe(CLOSED);
      expect(closed.data.closed_at).not.toBeNull();

      const history = await historyOf(no);
      expect(history.map((entry) => entry.action)).toEqual([
        ComplaintHistoryAction.CREATED,
        ComplaintHistoryAction.ASSIGNED,
        ComplaintHistoryAction.STATUS_CHANGED,
        ComplaintHistoryAction.STATUS_CHANGED,
      ]);
      expect(history.map((entry) => entry.to_status)).toEqual([
        PENDING,
        IN_PROGRESS,
        RESOLVED,
        CLOSED,
      ]);
      expect(history[3].changed_by?.id).toBe(admin.id);
    });
  });

  describe('create', () => {
    it('only accepts complaints from students', async () => {
      await expect(service.create(bob, complaintInput())).rejects.toBeInstanceOf(
        PermissionError,
      );
      await expect(service.create(admin, complaintInput())).rejects.toBeInstanceOf(
        PermissionError,
      );
    });

    it('rejects blank text fields', async () => {
      await expect(
        service.create(alice, complaintInput({ title: '   ', description: '' })),
      ).rejects.toMatchObject({
        errors: {
          title: ['Title cannot be empty'],
          description: ['Description cannot be empty'],
        },
      });
    });

    it('rejects an unknown category', async () => {
      await expect(
        service.create(alice, complaintInput({ category_id: 999 })),
      ).rejects.toMatchObject({
        errors: { category_id: ['Category with ID 999 does not exist'] },
      });
    });

    it('rejects a subcategory from another category', async () => {
      const promise = service.create(
        alice,
        complaintInput({ category_id: facilities.id, subcategory_id: network.id }),
      );
      await expect(promise).rejects.toBeInstanceOf(ValidationError);
      await expect(promise).rejects.toMatchObject({
        errors: { subcategory_id: ['Subcategory does not belong to the selected category'] },
      });
    });

    it('defaults to medium priority and trims text', async () => {
      const created = await service.create(
        alice,
        complaintInput({ title: '  Broken chair  ', subcategory_id: network.id }),
      );
      expect(created.data.title).toBe('Broken chair');
      expect(created.data.priority).toBe(ComplaintPriority.MEDIUM);
      expect(created.data.subcategory).toEqual({ id: network.id, name: 'Network' });
    });

    it('stores an initial attachment with the complaint', async () => {
      const created = await service.create(alice, complaintInput(), {
        path: 'tmp-test-uploads/complaints/a.pdf',
        originalName: 'receipt.pdf',
        mimeType: 'application/pdf',
        size: 2048,
      });
      const view = await service.findOne(alice, created.data.complaint_no);
      expect(view.data.attachments.map((a) => a.original_name)).toEqual(['receipt.pdf']);
    });

    it('rejects an attachment of a disallowed type before writing anything', async () => {
      await expect(
        service.create(alice, complaintInput(), {
          path: 'tmp-test-uploads/complaints/a.exe',
          originalName: 'setup.exe',
          mimeType: 'application/octet-stream',
          size: 10,
        }),
      ).rejects.toBeInstanceOf(ValidationError);
      expect(await dataSource.getRepository(Complaint).count()).toBe(0);
    });
  });

  describe('assign', () => {
    it('is reserved for admins', async () => {
      const no = await fileComplaint();
      await expect(
        service.assign(bob, no, { assigned_to: bob.id }),
      ).rejects.toBeInstanceOf(PermissionError);
    });

    it('only assigns to faculty', async () => {
      const no = await fileComplaint();
      await expect(
        service.assign(admin, no, { assigned_to: carol.id }),
      ).rejects.toMatchObject({
        errors: { assigned_to: ['Complaints can only be assigned to active faculty members'] },
      });
    });

    it('reports an unknown assignee as missing', async () => {
      const no = await fileComplaint();
      await expect(
        service.assign(admin, no, { assigned_to: 999 }),
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('reports an unknown complaint as missing', async () => {
      await expect(
        service.assign(admin, 'CMP-20240101-000001', { assigned_to: bob.id }),
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('reassigns without changing the status and tells the previous assignee', async () => {
      const no = await assignedComplaint();
      const reassigned = await service.assign(admin, no, { assigned_to: dave.id });

      expect(reassigned.data.status).toBe(IN_PROGRESS);
      expect(reassigned.data.assigned_to?.id).toBe(dave.id);
      const last = (await historyOf(no))[2];
      expect(last).toMatchObject({
        action: ComplaintHistoryAction.ASSIGNED,
        field: 'assigned_to',
        old_value: String(bob.id),
        new_value: String(dave.id),
        from_status: IN_PROGRESS,
        to_status: IN_PROGRESS,
      });
      expect((await messagesFor(bob))[0]).toBe(`Complaint ${no} has been reassigned`);
    });

    it('leaves a complaint alone when it already has that assignee', async () => {
      const no = await assignedComplaint();
      const again = await service.assign(admin, no, { assigned_to: bob.id });

      expect(again.data.version).toBe(2);
      expect(again.data.assigned_to?.id).toBe(bob.id);
      expect((await historyOf(no)).map((entry) => entry.action)).toEqual([
        ComplaintHistoryAction.CREATED,
        ComplaintHistoryAction.ASSIGNED,
      ]);
      expect(await messagesFor(bob)).toEqual([`Complaint ${no} assigned to you`]);
    });

    it('records a remark on a repeat assignment', async () => {
      const no = await assignedComplaint();
      await service.assign(admin, no, { assigned_to: bob.id, remarks: 'Please prioritise' });

      const last = (await historyOf(no))[2];
      expect(last).toMatchObject({
        action: ComplaintHistoryAction.ASSIGNED,
        old_value: String(bob.id),
        new_value: String(bob.id),
        remarks: 'Please prioritise',
      });
    });

    it('refuses to reassign a closed complaint', async () => {
      const no = await resolvedComplaint();
      await service.updateStatus(admin, no, { status: CLOSED });
      await expect(
        service.assign(admin, no, { assigned_to: dave.id }),
      ).rejects.toBeInstanceOf(StateError);
    });
  });

  describe('updateStatus', () => {
    it('refuses to skip from pending to resolved', async () => {
      const no = await fileComplaint();
      const promise = service.updateStatus(admin, no, {
        status: RESOLVED,
        remarks: 'Done',
      });
      await expect(promise).rejects.toBeInstanceOf(StateError);
      await expect(promise).rejects.toMatchObject({
        currentStatus: PENDING,
        allowedStatuses: [IN_PROGRESS],
      });
    });

    it('requires a remark to resolve', async () => {
      const no = await assignedComplaint();
      await expect(
        service.updateStatus(bob, no, { status: RESOLVED, remarks: '  ' }),
      ).rejects.toMatchObject({
        errors: { remarks: ['This field is required when resolving a complaint'] },
      });
    });

    it('keeps students and unrelated faculty out', async () => {
      const no = await assignedComplaint();
      await expect(
        service.updateStatus(alice, no, { status: RESOLVED, remarks: 'Done' }),
      ).rejects.toBeInstanceOf(PermissionError);
      await expect(
        service.updateStatus(dave, no, { status: RESOLVED, remarks: 'Done' }),
      ).rejects.toBeInstanceOf(PermissionError);
    });

    it('stores an admin remark separately from faculty remarks', async () => {
      const no = await resolvedComplaint();
      const closed = await service.updateStatus(admin, no, {
        status: CLOSED,
        remarks: 'Confirmed with student',
      });
      expect(closed.data.remarks).toBe('Router replaced');
      expect(closed.data.admin_remarks).toBe('Confirmed with student');
    });
  });

  describe('optimistic concurrency', () => {
    it('rejects a stale expected version', async () => {
      const no = await assignedComplaint();
      await expect(
        service.updateStatus(bob, no, {
          status: RESOLVED,
          remarks: 'Done',
          expected_version: 1,
        }),
      ).rejects.toBeInstanceOf(ConflictError);

      const view = await service.findOne(admin, no);
      expect(view.data.status).toBe(IN_PROGRESS);
      expect(view.data.version).toBe(2);
    });

    it('rejects a stale expected status', async () => {
      const no = await assignedComplaint();
      await expect(
        service.updateStatus(bob, no, {
          status: RESOLVED,
          remarks: 'Done',
          expected_status: PENDING,
        }),
      ).rejects.toBeInstanceOf(ConflictError);
    });

    it('reports a conflict before an invalid transition', async () => {
      const no = await assignedComplaint();
      await expect(
        service.updateStatus(admin, no, { status: CLOSED, expected_version: 1 }),
      ).rejects.toBeInstanceOf(ConflictError);
    });

    it('reports a missing permission before a conflict', async () => {
      const no = await assignedComplaint();
      await expect(
        service.updateStatus(bob, no, { status: CLOSED, expected_version: 1 }),
      ).rejects.toBeInstanceOf(PermissionError);
    });

    it('refuses to write over a change made after the complaint was read', async () => {
      const no = await assignedComplaint();
      const stale = await dataSource
        .getRepository(Complaint)
        .findOneByOrFail({ complaint_no: no });
      await service.updatePriority(admin, no, { priority: ComplaintPriority.LOW });

      jest.spyOn(EntityManager.prototype, 'findOne').mockResolvedValueOnce(stale);
      await expect(
        service.updateStatus(bob, no, { status: RESOLVED, remarks: 'Done' }),
      ).rejects.toBeInstanceOf(ConflictError);

      const view = await service.findOne(admin, no);
      expect(view.data.status).toBe(IN_PROGRESS);
      expect(view.data.priority).toBe(ComplaintPriority.LOW);
      expect(view.data.version).toBe(3);
    });
  });

  describe('atomicity', () => {
    it('rolls the status change back when the history write fails', async () => {
      const no = await assignedComplaint();
      const before = await messagesFor(alice);
      jest
        .spyOn(moduleRef.get(ComplaintHistoryService), 'append')
        .mockRejectedValueOnce(new Error('disk full'));

      await expect(
        service.updateStatus(bob, no, { status: RESOLVED, remarks: 'Done' }),
      ).rejects.toBeInstanceOf(InternalServerErrorException);

      const view = await service.findOne(admin, no);
      expect(view.data.status).toBe(IN_PROGRESS);
      expect(view.data.resolved_at).toBeNull();
      expect(view.data.version).toBe(2);
      expect(view.data.history).toHaveLength(2);
      expect(await messagesFor(alice)).toEqual(before);
    });

    it('rolls the assignment back when the notification write fails', async () => {
      const no = await fileComplaint();
      jest
        .spyOn(notifications, 'recordWithin')
        .mockRejectedValueOnce(new Error('insert failed'));

      await expect(
        service.assign(admin, no, { assigned_to: bob.id }),
      ).rejects.toBeInstanceOf(InternalServerErrorException);

      const view = await service.findOne(admin, no);
      expect(view.data.status).toBe(PENDING);
      expect(view.data.assigned_to).toBeNull();
      expect(view.data.history).toHaveLength(1);
    });

    it('leaves no complaint and no used number when creation fails', async () => {
      jest
        .spyOn(moduleRef.get(ComplaintHistoryService), 'append')
        .mockRejectedValueOnce(new Error('disk full'));
      await expect(service.create(alice, complaintInput())).rejects.toBeInstanceOf(
        InternalServerErrorException,
      );
      expect(await dataSource.getRepository(Complaint).count()).toBe(0);

      const no = await fileComplaint();
      expect(no.endsWith('-000001')).toBe(true);
    });
  });

  describe('reopen', () => {
    it('is refused while reopening is disabled', async () => {
      const no = await resolvedComplaint();
      await expect(
        service.reopen(admin, no, { remarks: 'Still broken' }),
      ).rejects.toThrow('Reopening complaints is disabled');
    });

    it('moves a resolved complaint back to in progress', async () => {
      config.reopenPolicy = ReopenPolicy.RESOLVED;
      const no = await resolvedComplaint();

      const reopened = await service.reopen(admin, no, { remarks: 'Still broken' });
      expect(reopened.data.status).toBe(IN_PROGRESS);
      expect(reopened.data.resolved_at).toBeNull();
      expect(reopened.data.admin_remarks).toBe('Still broken');

      const last = (await historyOf(no))[3];
      expect(last).toMatchObject({
        action: ComplaintHistoryAction.REOPENED,
        from_status: RESOLVED,
        to_status: IN_PROGRESS,
        remarks: 'Still broken',
      });
      expect((await messagesFor(alice))[0]).toBe(`Complaint ${no} has been reopened`);
      expect((await messagesFor(bob))[0]).toBe(`Complaint ${no} has been reopened`);
    });

    it('keeps closed complaints closed under the resolved policy', async () => {
      config.reopenPolicy = ReopenPolicy.RESOLVED;
      const no = await resolvedComplaint();
      await service.updateStatus(admin, no, { status: CLOSED });
      await expect(
        service.reopen(admin, no, { remarks: 'Still broken' }),
      ).rejects.toBeInstanceOf(StateError);
    });

    it('reopens closed complaints under the wider policy', async () => {
      config.reopenPolicy = ReopenPolicy.RESOLVED_OR_CLOSED;
      const no = await resolvedComplaint();
      await service.updateStatus(admin, no, { status: CLOSED });

      const reopened = await service.reopen(admin, no, { remarks: 'Leak is back' });
      expect(reopened.data.status).toBe(IN_PROGRESS);
      expect(reopened.data.closed_at).toBeNull();
    });

    it('is reserved for admins and needs a reason', async () => {
      config.reopenPolicy = ReopenPolicy.RESOLVED;
      const no = await resolvedComplaint();
      await expect(
        service.reopen(alice, no, { remarks: 'Still broken' }),
      ).rejects.toBeInstanceOf(PermissionError);
      await expect(service.reopen(admin, no, { remarks: ' ' })).rejects.toBeInstanceOf(
        ValidationError,
      );
    });
  });

  describe('updateDetails', () => {
    it('records one history entry per changed field', async () => {
      const no = await fileComplaint();
      const updated = await service.updateDetails(alice, no, {
        title: 'Wifi outage',
        description: 'Wifi down in Block B',
        subcategory_id: network.id,
      });

      expect(updated.data.title).toBe('Wifi outage');
      expect(updated.data.subcategory?.id).toBe(network.id);
      expect(updated.data.version).toBe(2);
      const changes = (await historyOf(no)).slice(1);
      expect(changes.map((entry) => [entry.field, entry.old_value, entry.new_value])).toEqual([
        ['title', 'Network Issue', 'Wifi outage'],
        ['subcategory_id', null, String(network.id)],
      ]);
    });

    it('drops the subcategory when the category changes', async () => {
      const no = await fileComplaint(alice, { subcategory_id: network.id });
      const updated = await service.updateDetails(alice, no, { category_id: facilities.id });
      expect(updated.data.category?.id).toBe(facilities.id);
      expect(updated.data.subcategory).toBeNull();
    });

    it('leaves the complaint untouched when nothing changes', async () => {
      const no = await fileComplaint();
      const updated = await service.updateDetails(alice, no, { title: 'Network Issue' });
      expect(updated.data.version).toBe(1);
      expect(await historyOf(no)).toHaveLength(1);
    });

    it('only edits pending complaints of their own creator', async () => {
      const no = await fileComplaint();
      await expect(
        service.updateDetails(carol, no, { title: 'Hijacked' }),
      ).rejects.toBeInstanceOf(PermissionError);

      await service.assign(admin, no, { assigned_to: bob.id });
      await expect(
        service.updateDetails(alice, no, { title: 'Too late' }),
      ).rejects.toThrow('Only pending complaints can be edited');
    });
  });

  describe('updatePriority', () => {
    it('records the change and tells the assignee', async () => {
      const no = await fileComplaint(alice, { priority: ComplaintPriority.HIGH });
      await service.assign(admin, no, { assigned_to: bob.id });

      const updated = await service.updatePriority(admin, no, {
        priority: ComplaintPriority.LOW,
      });
      expect(updated.data.priority).toBe(ComplaintPriority.LOW);
      expect((await historyOf(no))[2]).toMatchObject({
        action: ComplaintHistoryAction.PRIORITY_CHANGED,
        old_value: ComplaintPriority.HIGH,
        new_value: ComplaintPriority.LOW,
      });
      expect((await messagesFor(bob))[0]).toBe(`Complaint ${no} priority changed to Low`);
    });

    it('is reserved for admins', async () => {
      const no = await fileComplaint();
      await expect(
        service.updatePriority(alice, no, { priority: ComplaintPriority.HIGH }),
      ).rejects.toBeInstanceOf(PermissionError);
    });
  });

  describe('addAttachment', () => {
    const file = {
      path: 'tmp-test-uploads/complaints/b.png',
      originalName: 'leak.png',
      mimeType: 'image/png',
      size: 4096,
    };

    it('stores the file and records it without bumping the version', async () => {
      const no = await fileComplaint();
      const attached = await service.addAttachment(alice, no, file);
      expect(attached.data).toMatchObject({
        original_name: 'leak.png',
        mime_type: 'image/png',
        size: 4096,
        uploaded_by_id: alice.id,
      });

      const view = await service.findOne(alice, no);
      expect(view.data.version).toBe(1);
      expect(view.data.attachments).toHaveLength(1);
      expect(view.data.history[1]).toMatchObject({
        action: ComplaintHistoryAction.ATTACHMENT_ADDED,
        new_value: 'leak.png',
      });
    });

    it('rejects oversized files and other students', async () => {
      const no = await fileComplaint();
      await expect(
        service.addAttachment(alice, no, { ...file, size: 2 * 1024 * 1024 }),
      ).rejects.toMatchObject({ errors: { attachment: ['File size cannot exceed 1MB'] } });
      await expect(service.addAttachment(carol, no, file)).rejects.toBeInstanceOf(
        PermissionError,
      );
    });
  });

  describe('visibility', () => {
    it('hides complaints from unrelated students and faculty', async () => {
      const no = await assignedComplaint();
      await expect(service.findOne(carol, no)).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.findOne(dave, no)).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.listHistory(carol, no)).rejects.toBeInstanceOf(NotFoundError);
      expect((await service.findOne(bob, no)).data.complaint_no).toBe(no);
    });

    it('returns a frozen history', async () => {
      const no = await fileComplaint();
      const history = (await service.listHistory(alice, no)).data;
      expect(Object.isFrozen(history)).toBe(true);
      expect(Object.isFrozen(history[0])).toBe(true);
    });
  });

  describe('findAll', () => {
    let wifi: string;

    beforeEach(async () => {
      wifi = await fileComplaint(alice, { priority: ComplaintPriority.LOW });
      await fileComplaint(alice, {
        title: 'Projector broken',
        description: 'Room 101 projector shows no image',
        priority: ComplaintPriority.HIGH,
      });
      await fileComplaint(carol, {
        title: 'Leaking tap',
        description: 'Second floor washroom',
        category_id: facilities.id,
      });
      await service.assign(admin, wifi, { assigned_to: bob.id });
    });

    it('scopes the list to the caller', async () => {
      expect((await service.findAll(alice)).data.meta.total).toBe(2);
      expect((await service.findAll(carol)).data.meta.total).toBe(1);
      expect((await service.findAll(dave)).data.meta.total).toBe(0);
      expect((await service.findAll(admin)).data.meta.total).toBe(3);

      const assigned = await service.findAll(bob);
      expect(assigned.data.items.map((c) => c.complaint_no)).toEqual([wifi]);
    });

    it('filters by status, category and search text', async () => {
      const inProgress = await service.findAll(admin, { status: IN_PROGRESS });
      expect(inProgress.data.items.map((c) => c.complaint_no)).toEqual([wifi]);

      const plumbing = await service.findAll(admin, { category: facilities.id });
      expect(plumbing.data.items.map((c) => c.title)).toEqual(['Leaking tap']);

      const search = await service.findAll(admin, { search: 'PROJECTOR' });
      expect(search.data.items.map((c) => c.title)).toEqual(['Projector broken']);
    });

    it('matches wildcard characters in search text literally', async () => {
      expect((await service.findAll(admin, { search: '%' })).data.meta.total).toBe(0);
      expect((await service.findAll(admin, { search: '_' })).data.meta.total).toBe(0);

      await fileComplaint(alice, {
        title: 'Fan runs at 50% speed',
        description: 'Ceiling fan in the reading room',
      });
      const found = await service.findAll(admin, { search: '50%' });
      expect(found.data.items.map((c) => c.title)).toEqual(['Fan runs at 50% speed']);
    });

    it('orders by priority rank', async () => {
      const ordered = await service.findAll(admin, { ordering: '-priority' });
      expect(ordered.data.items.map((c) => c.priority)).toEqual([
        ComplaintPriority.HIGH,
        ComplaintPriority.MEDIUM,
        ComplaintPriority.LOW,
      ]);
    });

    it('paginates', async () => {
      const page = await service.findAll(admin, { page: 2, limit: 2, ordering: 'created_at' });
      expect(page.data.meta).toEqual({ page: 2, limit: 2, total: 3, total_pages: 2 });
      expect(page.data.items.map((c) => c.title)).toEqual(['Leaking tap']);
    });
  });

  describe('history records', () => {
    it('cannot be rewritten or deleted', async () => {
      await fileComplaint();
      const repo = dataSource.getRepository(ComplaintHistory);
      const [entry] = await repo.find();

      entry.remarks = 'rewritten';
      await expect(repo.save(entry)).rejects.toThrow('Complaint history is append-only');
      await expect(repo.remove(entry)).rejects.toThrow('Complaint history is append-only');
      expect(await repo.count()).toBe(1);
    });
  });
});
