import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, EntityManager, Repository, SelectQueryBuilder } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { CategoriesService } from '../categories/categories.service';
import {
  COMPLAINT_PRIORITY_LABELS,
  COMPLAINT_STATUS_LABELS,
  ComplaintHistoryAction,
  ComplaintPriority,
  ComplaintStatus,
} from '../common/enums/complaint.enum';
import { UserRoleType } from '../common/enums/user-role.enum';
import {
  ConflictError,
  FieldErrors,
  NotFoundError,
  StateError,
  ValidationError,
} from '../common/exceptions/domain.exceptions';
import {
  ApiResponse,
  Paginated,
} from '../common/interfaces/api-response.interface';
import { Actor } from '../common/interfaces/jwt-user.interface';
import { attachmentProblems } from '../common/utils/attachment.util';
import { isUniqueViolation } from '../common/utils/db-errors.util';
import { escapeLike } from '../common/utils/escape-like.util';
import { handleUnknown } from '../common/utils/handle-unknown.util';
import { complaintsConfig, ComplaintsConfig } from '../config/configuration';
import { UnitOfWork } from '../database/unit-of-work.service';
import { Feedback } from '../feedback/entity/feedback.entity';
import { FeedbackDetails, toFeedbackDetails } from '../feedback/feedback.mapper';
import {
  NotificationDraft,
  NotificationService,
} from '../notification/notification.service';
import { User } from '../users/entity/user.entity';
import { ComplaintHistoryService, HistoryRecord } from './complaint-history.service';
import { ComplaintNumberService } from './complaint-number.service';
import { applyActorScope } from './complaint-scope';
import {
  AttachmentDetails,
  ComplaintDetails,
  HistoryEntry,
  toAttachmentDetails,
  toComplaintDetails,
} from './complaints.mapper';
import {
  AssignComplaintDto,
  AttachmentRef,
  ComplaintOrdering,
  CreateComplaintsDto,
  ListComplaintsQueryDto,
  ReopenComplaintDto,
  UpdateComplaintDetailsDto,
  UpdateComplaintPriorityDto,
  UpdateComplaintStatusDto,
} from './dto/complaints.dto';
import { ComplaintAttachment } from './entity/complaint-attachment.entity';
import { Complaint } from './entity/complaints.entity';
import {
  allowedTargets,
  assertReopen,
  assertTransition,
  REOPEN_TARGET,
} from './lifecycle/complaint-state-machine';
import {
  actionForTargetStatus,
  authorize,
  can,
  ComplaintAction,
} from './policy/complaint-policy';

type ComplaintChanges = QueryDeepPartialEntity<Complaint>;

type Mutation = (
  complaint: Complaint,
  manager: EntityManager,
) => Promise<NotificationDraft[]>;

export interface ComplaintView extends ComplaintDetails {
  attachments: AttachmentDetails[];
  feedback: FeedbackDetails | null;
  history: readonly HistoryEntry[];
}

const DETAIL_RELATIONS = ['category', 'subcategory', 'creator', 'assignee'];

const PRIORITY_RANK = `CASE c.priority WHEN '${ComplaintPriority.LOW}' THEN 1 WHEN '${ComplaintPriority.MEDIUM}' THEN 2 ELSE 3 END`;

@Injectable()
export class ComplaintsService {
  private readonly logger = new Logger(ComplaintsService.name);

  constructor(
    @InjectRepository(Complaint)
    private readonly complaintsRepo: Repository<Complaint>,
    @InjectRepository(ComplaintAttachment)
    private readonly attachmentRepo: Repository<ComplaintAttachment>,
    @InjectRepository(Feedback)
    private readonly feedbackRepo: Repository<Feedback>,
    private readonly categoriesService: CategoriesService,
    private readonly complaintNumbers: ComplaintNumberService,
    private readonly history: ComplaintHistoryService,
    private readonly notificationService: NotificationService,
    private readonly unitOfWork: UnitOfWork,
    @Inject(complaintsConfig.KEY)
    private readonly config: ComplaintsConfig,
  ) {}

  async create(
    actor: Actor,
    dto: CreateComplaintsDto,
    attachment?: AttachmentRef,
  ): Promise<ApiResponse<ComplaintDetails>> {
    authorize(actor, ComplaintAction.CREATE);
    this.assertContent({ title: dto.title, description: dto.description });
    const { category, subcategory } =
      await this.categoriesService.resolveClassification(
        dto.category_id,
        dto.subcategory_id ?? null,
      );
    if (attachment) this.assertAttachment(attachment);

    for (let attempt = 1; ; attempt += 1) {
      try {
        const { complaintNo, notifications } = await this.unitOfWork.run(
          async (manager) => {
            const complaintNo = await this.complaintNumbers.allocate(manager);
            const complaint = await manager.save(
              manager.create(Complaint, {
                complaint_no: complaintNo,
                title: dto.title.trim(),
                description: dto.description.trim(),
                category_id: category.id,
                subcategory_id: subcategory ? subcategory.id : null,
                priority: dto.priority ?? ComplaintPriority.MEDIUM,
                status: ComplaintStatus.PENDING,
                created_by_id: actor.id,
                remarks: dto.remarks?.trim() ?? '',
              }),
            );

            await this.history.append(manager, complaint.id, actor, [
              {
                action: ComplaintHistoryAction.CREATED,
                toStatus: ComplaintStatus.PENDING,
                remarks: 'Complaint created',
              },
            ]);
            if (attachment) {
              await this.storeAttachment(manager, complaint.id, actor, attachment);
            }

            const admins = await manager.find(User, {
              where: { role: UserRoleType.ADMIN, is_active: true },
            });
            const notifications = await this.notificationService.recordWithin(
              manager,
              admins.map((admin) => ({
                userId: admin.id,
                title: 'New complaint',
                message: `New complaint ${complaintNo} created by ${actor.name}`,
                complaintNo,
                metadata: { event: ComplaintHistoryAction.CREATED },
              })),
            );
            return { complaintNo, notifications };
          },
        );

        await this.notificationService.dispatch(notifications);
        this.logger.log(`Complaint ${complaintNo} created by user ${actor.id}`);

        return {
          success: true,
          message: 'Complaint created successfully.',
          data: toComplaintDetails(await this.loadByNumber(complaintNo)),
        };
      } catch (err) {
        if (isUniqueViolation(err)) {
          if (attempt < this.config.idMaxRetries) {
            this.logger.warn(
              `Complaint number collision on attempt ${attempt}, retrying`,
            );
            continue;
          }
          throw new ConflictError(
            'Could not allocate a unique complaint number. Please try again.',
          );
        }
        handleUnknown(err, 'Failed to create complaint.');
      }
    }
  }

  async assign(
    actor: Actor,
    complaintNo: string,
    dto: AssignComplaintDto,
  ): Promise<ApiResponse<ComplaintDetails>> {
    const complaint = await this.mutate(
      complaintNo,
      'Failed to assign complaint.',
      async (current, manager) => {
        authorize(actor, ComplaintAction.ASSIGN, current);
        this.assertFresh(current, dto.expected_version);
        if (current.status === ComplaintStatus.CLOSED) {
          throw new StateError(
            'A closed complaint cannot be reassigned',
            current.status,
            allowedTargets(current.status),
          );
        }

        const assignee = await manager.findOne(User, {
          where: { id: dto.assigned_to },
        });
        if (!assignee) {
          throw new NotFoundError(`User with ID ${dto.assigned_to} not found`);
        }
        if (assignee.role !== UserRoleType.FACULTY || !assignee.is_active) {
          throw new ValidationError('Invalid assignee', {
            assigned_to: ['Complaints can only be assigned to active faculty members'],
          });
        }

        const remarks = dto.remarks?.trim() ?? '';
        // same assignee and nothing to record
        if (current.assigned_to_id === assignee.id && !remarks) return [];

        const toStatus =
          current.status === ComplaintStatus.PENDING
            ? ComplaintStatus.IN_PROGRESS
            : current.status;
        const changes: ComplaintChanges = {
          assigned_to_id: assignee.id,
          status: toStatus,
        };
        if (remarks) changes.admin_remarks = remarks;

        await this.applyUpdate(manager, current, changes);
        await this.history.append(manager, current.id, actor, [
          {
            action: ComplaintHistoryAction.ASSIGNED,
            field: 'assigned_to',
            oldValue:
              current.assigned_to_id === null ? null : String(current.assigned_to_id),
            newValue: String(assignee.id),
            fromStatus: current.status,
            toStatus,
            remarks: remarks || `Assigned to ${assignee.name}`,
          },
        ]);

        const drafts: NotificationDraft[] = [
          {
            userId: assignee.id,
            title: 'Complaint assigned',
            message: `Complaint ${complaintNo} assigned to you`,
            complaintNo,
            metadata: { event: ComplaintHistoryAction.ASSIGNED },
          },
          {
            userId: current.created_by_id,
            title: 'Complaint assigned',
            message: `Complaint ${complaintNo} assigned to faculty`,
            complaintNo,
            metadata: { event: ComplaintHistoryAction.ASSIGNED },
          },
        ];
        if (current.assigned_to_id !== null && current.assigned_to_id !== assignee.id) {
          drafts.push({
            userId: current.assigned_to_id,
            title: 'Complaint reassigned',
            message: `Complaint ${complaintNo} has been reassigned`,
            complaintNo,
            metadata: { event: ComplaintHistoryAction.ASSIGNED },
          });
        }
        return drafts;
      },
    );

    return {
      success: true,
      message: `Complaint ${complaintNo} assigned successfully.`,
      data: toComplaintDetails(complaint),
    };
  }

  async updateStatus(
    actor: Actor,
    complaintNo: string,
    dto: UpdateComplaintStatusDto,
  ): Promise<ApiResponse<ComplaintDetails>> {
    const complaint = await this.mutate(
      complaintNo,
      'Failed to update complaint status.',
      async (current, manager) => {
        authorize(actor, actionForTargetStatus(dto.status), current);
        this.assertFresh(current, dto.expected_version, dto.expected_status);
        assertTransition(current.status, dto.status);

        const remarks = dto.remarks?.trim() ?? '';
        if (dto.status === ComplaintStatus.RESOLVED && !remarks) {
          throw new ValidationError('A remark is required to resolve a complaint', {
            remarks: ['This field is required when resolving a complaint'],
          });
        }

        const now = new Date();
        const changes: ComplaintChanges = { status: dto.status };
        if (dto.status === ComplaintStatus.RESOLVED) changes.resolved_at = now;
        if (dto.status === ComplaintStatus.CLOSED) changes.closed_at = now;
        if (remarks) {
          if (actor.role === UserRoleType.ADMIN) changes.admin_remarks = remarks;
          else changes.remarks = remarks;
        }

        await this.applyUpdate(manager, current, changes);
        await this.history.append(manager, current.id, actor, [
          {
            action: ComplaintHistoryAction.STATUS_CHANGED,
            field: 'status',
            oldValue: current.status,
            newValue: dto.status,
            fromStatus: current.status,
            toStatus: dto.status,
            remarks,
          },
        ]);

        const label = COMPLAINT_STATUS_LABELS[dto.status];
        const message =
          dto.status === ComplaintStatus.RESOLVED
            ? `Complaint ${complaintNo} status updated to ${label}. Please share your feedback.`
            : `Complaint ${complaintNo} status updated to ${label}`;
        return [
          {
            userId: current.created_by_id,
            title: 'Complaint status updated',
            message,
            complaintNo,
            metadata: {
              event: ComplaintHistoryAction.STATUS_CHANGED,
              status: dto.status,
            },
          },
        ];
      },
    );

    return {
      success: true,
      message: `Complaint status updated to ${COMPLAINT_STATUS_LABELS[complaint.status]}.`,
      data: toComplaintDetails(complaint),
    };
  }

  async reopen(
    actor: Actor,
    complaintNo: string,
    dto: ReopenComplaintDto,
  ): Promise<ApiResponse<ComplaintDetails>> {
    const complaint = await this.mutate(
      complaintNo,
      'Failed to reopen complaint.',
      async (current, manager) => {
        authorize(actor, ComplaintAction.REOPEN, current);
        this.assertFresh(current, dto.expected_version);
        assertReopen(current.status, this.config.reopenPolicy);

        const remarks = dto.remarks?.trim() ?? '';
        if (!remarks) {
          throw new ValidationError('A reason is required to reopen a complaint', {
            remarks: ['This field is required when reopening a complaint'],
          });
        }

        await this.applyUpdate(manager, current, {
          status: REOPEN_TARGET,
          resolved_at: null,
          closed_at: null,
          admin_remarks: remarks,
        });
        await this.history.append(manager, current.id, actor, [
          {
            action: ComplaintHistoryAction.REOPENED,
            field: 'status',
            oldValue: current.status,
            newValue: REOPEN_TARGET,
            fromStatus: current.status,
            toStatus: REOPEN_TARGET,
            remarks,
          },
        ]);

        const recipients = [current.created_by_id];
        if (current.assigned_to_id !== null) recipients.push(current.assigned_to_id);
        return recipients.map((userId) => ({
          userId,
          title: 'Complaint reopened',
          message: `Complaint ${complaintNo} has been reopened`,
          complaintNo,
          metadata: { event: ComplaintHistoryAction.REOPENED },
        }));
      },
    );

    return {
      success: true,
      message: `Complaint ${complaintNo} reopened.`,
      data: toComplaintDetails(complaint),
    };
  }

  async updateDetails(
    actor: Actor,
    complaintNo: string,
    dto: UpdateComplaintDetailsDto,
  ): Promise<ApiResponse<ComplaintDetails>> {
    const complaint = await this.mutate(
      complaintNo,
      'Failed to update complaint.',
      async (current, manager) => {
        authorize(actor, ComplaintAction.EDIT_DETAILS, current);
        this.assertFresh(current, dto.expected_version);
        if (current.status !== ComplaintStatus.PENDING) {
          throw new StateError(
            'Only pending complaints can be edited',
            current.status,
            allowedTargets(current.status),
          );
        }
        this.assertContent({ title: dto.title, description: dto.description });

        const categoryId = dto.category_id ?? current.category_id;
        let subcategoryId = current.subcategory_id;
        if (dto.subcategory_id !== undefined) subcategoryId = dto.subcategory_id;
        else if (categoryId !== current.category_id) subcategoryId = null;
        if (dto.category_id !== undefined || dto.subcategory_id !== undefined) {
          await this.categoriesService.resolveClassification(
            categoryId,
            subcategoryId,
            manager,
          );
        }

        const changes: ComplaintChanges = {};
        const records: HistoryRecord[] = [];
        const note = (
          field: string,
          before: string | number | null,
          after: string | number | null,
        ) =>
          records.push({
            action: ComplaintHistoryAction.DETAILS_UPDATED,
            field,
            oldValue: before === null ? null : String(before),
            newValue: after === null ? null : String(after),
            fromStatus: current.status,
            toStatus: current.status,
          });

        const title = dto.title?.trim();
        if (title !== undefined && title !== current.title) {
          changes.title = title;
          note('title', current.title, title);
        }
        const description = dto.description?.trim();
        if (description !== undefined && description !== current.description) {
          changes.description = description;
          note('description', current.description, description);
        }
        if (categoryId !== current.category_id) {
          changes.category_id = categoryId;
          note('category_id', current.category_id, categoryId);
        }
        if (subcategoryId !== current.subcategory_id) {
          changes.subcategory_id = subcategoryId;
          note('subcategory_id', current.subcategory_id, subcategoryId);
        }

        if (records.length === 0) return [];
        await this.applyUpdate(manager, current, changes);
        await this.history.append(manager, current.id, actor, records);
        return [];
      },
    );

    return {
      success: true,
      message: `Complaint ${complaintNo} updated successfully.`,
      data: toComplaintDetails(complaint),
    };
  }

  async updatePriority(
    actor: Actor,
    complaintNo: string,
    dto: UpdateComplaintPriorityDto,
  ): Promise<ApiResponse<ComplaintDetails>> {
    const complaint = await this.mutate(
      complaintNo,
      'Failed to update complaint priority.',
      async (current, manager) => {
        authorize(actor, ComplaintAction.SET_PRIORITY, current);
        this.assertFresh(current, dto.expected_version);
        if (current.status === ComplaintStatus.CLOSED) {
          throw new StateError(
            'The priority of a closed complaint cannot change',
            current.status,
            allowedTargets(current.status),
          );
        }

        const remarks = dto.admin_remarks?.trim() ?? '';
        if (dto.priority === current.priority && !remarks) return [];

        const changes: ComplaintChanges = { priority: dto.priority };
        if (remarks) changes.admin_remarks = remarks;
        await this.applyUpdate(manager, current, changes);
        await this.history.append(manager, current.id, actor, [
          {
            action: ComplaintHistoryAction.PRIORITY_CHANGED,
            field: 'priority',
            oldValue: current.priority,
            newValue: dto.priority,
            fromStatus: current.status,
            toStatus: current.status,
            remarks,
          },
        ]);

        if (current.assigned_to_id === null || dto.priority === current.priority) {
          return [];
        }
        return [
          {
            userId: current.assigned_to_id,
            title: 'Complaint priority changed',
            message: `Complaint ${complaintNo} priority changed to ${COMPLAINT_PRIORITY_LABELS[dto.priority]}`,
            complaintNo,
            metadata: {
              event: ComplaintHistoryAction.PRIORITY_CHANGED,
              priority: dto.priority,
            },
          },
        ];
      },
    );

    return {
      success: true,
      message: `Complaint priority set to ${COMPLAINT_PRIORITY_LABELS[complaint.priority]}.`,
      data: toComplaintDetails(complaint),
    };
  }

  async addAttachment(
    actor: Actor,
    complaintNo: string,
    file: AttachmentRef,
  ): Promise<ApiResponse<AttachmentDetails>> {
    const outcome: { attachment?: ComplaintAttachment } = {};
    await this.mutate(
      complaintNo,
      'Failed to attach file.',
      async (current, manager) => {
        authorize(actor, ComplaintAction.ATTACH, current);
        if (current.status === ComplaintStatus.CLOSED) {
          throw new StateError(
            'Files cannot be attached to a closed complaint',
            current.status,
            allowedTargets(current.status),
          );
        }
        this.assertAttachment(file);

        outcome.attachment = await this.storeAttachment(manager, current.id, actor, file);
        await this.history.append(manager, current.id, actor, [
          {
            action: ComplaintHistoryAction.ATTACHMENT_ADDED,
            field: 'attachment',
            newValue: file.originalName,
            fromStatus: current.status,
            toStatus: current.status,
          },
        ]);

        const recipient =
          actor.role === UserRoleType.ADMIN
            ? current.created_by_id
            : current.assigned_to_id;
        if (recipient === null || recipient === actor.id) return [];
        return [
          {
            userId: recipient,
            title: 'New attachment',
            message: `A file was attached to complaint ${complaintNo}`,
            complaintNo,
            metadata: { event: ComplaintHistoryAction.ATTACHMENT_ADDED },
          },
        ];
      },
    );

    if (!outcome.attachment) {
      throw new NotFoundError(`Attachment for complaint ${complaintNo} was not stored`);
    }
    return {
      success: true,
      message: 'File attached successfully.',
      data: toAttachmentDetails(outcome.attachment),
    };
  }

  async listHistory(
    actor: Actor,
    complaintNo: string,
  ): Promise<ApiResponse<readonly HistoryEntry[]>> {
    const complaint = await this.findVisible(actor, complaintNo);
    return {
      success: true,
      message: `History of complaint ${complaintNo} fetched successfully.`,
      data: await this.history.listFor(complaint.id),
    };
  }

  async findOne(
    actor: Actor,
    complaintNo: string,
  ): Promise<ApiResponse<ComplaintView>> {
    const complaint = await this.findVisible(actor, complaintNo);
    const [attachments, feedback, history] = await Promise.all([
      this.attachmentRepo.find({
        where: { complaint_id: complaint.id },
        order: { id: 'ASC' },
      }),
      this.feedbackRepo.findOne({
        where: { complaint_id: complaint.id },
        relations: ['user'],
      }),
      this.history.listFor(complaint.id),
    ]);

    return {
      success: true,
      message: `Complaint ${complaintNo} fetched successfully.`,
      data: {
        ...toComplaintDetails(complaint),
        attachments: attachments.map(toAttachmentDetails),
        feedback: feedback ? toFeedbackDetails(feedback) : null,
        history,
      },
    };
  }

  async findAll(
    actor: Actor,
    query: ListComplaintsQueryDto = {},
  ): Promise<ApiResponse<Paginated<ComplaintDetails>>> {
    try {
      const page = query.page ?? 1;
      const limit = Math.min(
        query.limit ?? this.config.defaultPageSize,
        this.config.maxPageSize,
      );

      const qb = this.scopedQuery(actor);
      this.applyFilters(qb, query);
      const total = await qb.getCount();

      this.applyOrdering(qb, query.ordering ?? '-created_at');
      const complaints = await qb
        .offset((page - 1) * limit)
        .limit(limit)
        .getMany();

      return {
        success: true,
        message: 'Complaints fetched successfully.',
        data: {
          items: complaints.map(toComplaintDetails),
          meta: {
            page,
            limit,
            total,
            total_pages: Math.ceil(total / limit),
          },
        },
      };
    } catch (err) {
      handleUnknown(err, 'Failed to fetch complaints.');
    }
  }

  private scopedQuery(actor: Actor): SelectQueryBuilder<Complaint> {
    const qb = this.complaintsRepo
      .createQueryBuilder('c')
      .leftJoinAndSelect('c.category', 'category')
      .leftJoinAndSelect('c.subcategory', 'subcategory')
      .leftJoinAndSelect('c.creator', 'creator')
      .leftJoinAndSelect('c.assignee', 'assignee');
    return applyActorScope(qb, actor);
  }

  /** Loads a complaint the actor may view; anything else reads as missing. */
  async findVisible(actor: Actor, complaintNo: string): Promise<Complaint> {
    const complaint = await this.complaintsRepo.findOne({
      where: { complaint_no: complaintNo },
      relations: DETAIL_RELATIONS,
    });
    if (!complaint || !can(actor, ComplaintAction.VIEW, complaint)) {
      throw new NotFoundError(`Complaint ${complaintNo} not found`);
    }
    return complaint;
  }

  private applyFilters(
    qb: SelectQueryBuilder<Complaint>,
    query: ListComplaintsQueryDto,
  ): void {
    if (query.status) qb.andWhere('c.status = :status', { status: query.status });
    if (query.priority) {
      qb.andWhere('c.priority = :priority', { priority: query.priority });
    }
    if (query.category !== undefined) {
      qb.andWhere('c.category_id = :category', { category: query.category });
    }
    if (query.subcategory !== undefined) {
      qb.andWhere('c.subcategory_id = :subcategory', { subcategory: query.subcategory });
    }
    if (query.assigned_to !== undefined) {
      qb.andWhere('c.assigned_to_id = :assignedTo', { assignedTo: query.assigned_to });
    }
    if (query.created_by !== undefined) {
      qb.andWhere('c.created_by_id = :createdBy', { createdBy: query.created_by });
    }

    const search = query.search?.trim().toLowerCase();
    if (search) {
      qb.andWhere(
        new Brackets((where) => {
          where
            .where(`LOWER(c.title) LIKE :search ESCAPE '\\'`)
            .orWhere(`LOWER(c.description) LIKE :search ESCAPE '\\'`)
            .orWhere(`LOWER(c.complaint_no) LIKE :search ESCAPE '\\'`);
        }),
        { search: `%${escapeLike(search)}%` },
      );
    }
  }

  private applyOrdering(
    qb: SelectQueryBuilder<Complaint>,
    ordering: ComplaintOrdering,
  ): void {
    const direction = ordering.startsWith('-') ? 'DESC' : 'ASC';
    const field = ordering.replace(/^-/, '');
    if (field === 'priority') {
      qb.orderBy(PRIORITY_RANK, direction);
    } else {
      qb.orderBy(`c.${field}`, direction);
    }
    qb.addOrderBy('c.id', direction);
  }

  /**
   * Runs one change to an existing complaint as a unit of work. The callback
   * checks and writes; its notification drafts commit with it and are
   * delivered afterwards.
   */
  private async mutate(
    complaintNo: string,
    failureMessage: string,
    apply: Mutation,
  ): Promise<Complaint> {
    try {
      const notifications = await this.unitOfWork.run(async (manager) => {
        const complaint = await manager.findOne(Complaint, {
          where: { complaint_no: complaintNo },
        });
        if (!complaint) {
          throw new NotFoundError(`Complaint ${complaintNo} not found`);
        }
        const drafts = await apply(complaint, manager);
        return this.notificationService.recordWithin(manager, drafts);
      });

      await this.notificationService.dispatch(notifications);
      return await this.loadByNumber(complaintNo);
    } catch (err) {
      handleUnknown(err, failureMessage);
    }
  }

  // UPDATE ... WHERE id = ? AND version = ?; the version column bumps itself
  private async applyUpdate(
    manager: EntityManager,
    complaint: Complaint,
    changes: ComplaintChanges,
  ): Promise<void> {
    const result = await manager.update(
      Complaint,
      { id: complaint.id, version: complaint.version },
      changes,
    );
    if (result.affected === 0) {
      throw new ConflictError(
        `Complaint ${complaint.complaint_no} was changed by someone else. Reload it and try again.`,
      );
    }
  }

  private assertFresh(
    complaint: Complaint,
    expectedVersion?: number,
    expectedStatus?: ComplaintStatus,
  ): void {
    if (expectedVersion !== undefined && expectedVersion !== complaint.version) {
      throw new ConflictError(
        `Complaint ${complaint.complaint_no} is at version ${complaint.version}, not ${expectedVersion}. Reload it and try again.`,
      );
    }
    if (expectedStatus !== undefined && expectedStatus !== complaint.status) {
      throw new ConflictError(
        `Complaint ${complaint.complaint_no} is ${COMPLAINT_STATUS_LABELS[complaint.status]}, not ${COMPLAINT_STATUS_LABELS[expectedStatus]}. Reload it and try again.`,
      );
    }
  }

  private assertContent(fields: { title?: string; description?: string }): void {
    const errors: FieldErrors = {};
    if (fields.title !== undefined && !fields.title.trim()) {
      errors.title = ['Title cannot be empty'];
    }
    if (fields.description !== undefined && !fields.description.trim()) {
      errors.description = ['Description cannot be empty'];
    }
    if (Object.keys(errors).length > 0) {
      throw new ValidationError('Invalid complaint', errors);
    }
  }

  private assertAttachment(file: AttachmentRef): void {
    const problems = attachmentProblems(
      { originalname: file.originalName, size: file.size },
      {
        maxBytes: this.config.attachmentMaxBytes,
        allowedExtensions: this.config.attachmentAllowedExtensions,
      },
    );
    if (problems.length > 0) {
      throw new ValidationError('Invalid attachment', { attachment: problems });
    }
  }

  private storeAttachment(
    manager: EntityManager,
    complaintId: number,
    actor: Actor,
    file: AttachmentRef,
  ): Promise<ComplaintAttachment> {
    return manager.save(
      manager.create(ComplaintAttachment, {
        complaint_id: complaintId,
        file_path: file.path,
        original_name: file.originalName,
        mime_type: file.mimeType,
        size: file.size,
        uploaded_by_id: actor.id,
      }),
    );
  }

  private async loadByNumber(complaintNo: string): Promise<Complaint> {
    const complaint = await this.complaintsRepo.findOne({
      where: { complaint_no: complaintNo },
      relations: DETAIL_RELATIONS,
    });
    if (!complaint) {
      throw new NotFoundError(`Complaint ${complaintNo} not found`);
    }
    return complaint;
  }
}
