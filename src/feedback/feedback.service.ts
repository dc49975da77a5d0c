import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ComplaintStatus } from '../common/enums/complaint.enum';
import {
  ConflictError,
  NotFoundError,
  StateError,
  ValidationError,
} from '../common/exceptions/domain.exceptions';
import { ApiResponse } from '../common/interfaces/api-response.interface';
import { Actor } from '../common/interfaces/jwt-user.interface';
import { isUniqueViolation } from '../common/utils/db-errors.util';
import { handleUnknown } from '../common/utils/handle-unknown.util';
import { applyActorScope } from '../complaints/complaint-scope';
import { ComplaintsService } from '../complaints/complaints.service';
import { Complaint } from '../complaints/entity/complaints.entity';
import { allowedTargets } from '../complaints/lifecycle/complaint-state-machine';
import { authorize, ComplaintAction } from '../complaints/policy/complaint-policy';
import { UnitOfWork } from '../database/unit-of-work.service';
import { NotificationService } from '../notification/notification.service';
import { CreateFeedbackDto } from './dto/feedback.dto';
import { Feedback } from './entity/feedback.entity';
import { FeedbackDetails, toFeedbackDetails } from './feedback.mapper';

const FEEDBACK_STATUSES: readonly ComplaintStatus[] = [
  ComplaintStatus.RESOLVED,
  ComplaintStatus.CLOSED,
];

export const MIN_RATING = 1;
export const MAX_RATING = 5;

@Injectable()
export class FeedbackService {
  private readonly logger = new Logger(FeedbackService.name);

  constructor(
    @InjectRepository(Feedback)
    private readonly feedbackRepo: Repository<Feedback>,
    private readonly complaintsService: ComplaintsService,
    private readonly notificationService: NotificationService,
    private readonly unitOfWork: UnitOfWork,
  ) {}

  async addFeedback(
    actor: Actor,
    complaintNo: string,
    dto: CreateFeedbackDto,
  ): Promise<ApiResponse<FeedbackDetails>> {
    try {
      const { feedbackId, notifications } = await this.unitOfWork.run(
        async (manager) => {
          const complaint = await manager.findOne(Complaint, {
            where: { complaint_no: complaintNo },
          });
          if (!complaint) {
            throw new NotFoundError(`Complaint ${complaintNo} not found`);
          }

          authorize(actor, ComplaintAction.FEEDBACK, complaint);
          if (!FEEDBACK_STATUSES.includes(complaint.status)) {
            throw new StateError(
              'Feedback can only be given on resolved or closed complaints',
              complaint.status,
              allowedTargets(complaint.status),
            );
          }
          const existing = await manager.findOne(Feedback, {
            where: { complaint_id: complaint.id },
          });
          if (existing) {
            throw new ConflictError('Feedback already submitted for this complaint');
          }
          if (
            !Number.isInteger(dto.rating) ||
            dto.rating < MIN_RATING ||
            dto.rating > MAX_RATING
          ) {
            throw new ValidationError('Invalid feedback', {
              rating: [`Rating must be between ${MIN_RATING} and ${MAX_RATING}`],
            });
          }

          const feedback = await manager.save(
            manager.create(Feedback, {
              complaint_id: complaint.id,
              user_id: actor.id,
              rating: dto.rating,
              comments: dto.comments?.trim() ?? '',
            }),
          );

          const notifications =
            complaint.assigned_to_id === null
              ? []
              : await this.notificationService.recordWithin(manager, [
                  {
                    userId: complaint.assigned_to_id,
                    title: 'Feedback received',
                    message: `Feedback received for complaint ${complaintNo}: ${dto.rating}/5`,
                    complaintNo,
                    metadata: { event: 'feedback', rating: dto.rating },
                  },
                ]);
          return { feedbackId: feedback.id, notifications };
        },
      );

      await this.notificationService.dispatch(notifications);
      this.logger.log(`Feedback ${feedbackId} recorded for complaint ${complaintNo}`);

      const saved = await this.feedbackRepo.findOneOrFail({
        where: { id: feedbackId },
        relations: ['user', 'complaint'],
      });
      return {
        success: true,
        message: 'Feedback submitted successfully.',
        data: toFeedbackDetails(saved),
      };
    } catch (err) {
      // two submissions racing past the existence check
      if (isUniqueViolation(err)) {
        throw new ConflictError('Feedback already submitted for this complaint');
      }
      handleUnknown(err, 'Failed to submit feedback.');
    }
  }

  async findForComplaint(
    actor: Actor,
    complaintNo: string,
  ): Promise<ApiResponse<FeedbackDetails | null>> {
    const complaint = await this.complaintsService.findVisible(actor, complaintNo);
    const feedback = await this.feedbackRepo.findOne({
      where: { complaint_id: complaint.id },
      relations: ['user', 'complaint'],
    });
    return {
      success: true,
      message: feedback ? 'Feedback fetched successfully.' : 'No feedback yet.',
      data: feedback ? toFeedbackDetails(feedback) : null,
    };
  }

  async findAll(actor: Actor): Promise<ApiResponse<FeedbackDetails[]>> {
    const qb = this.feedbackRepo
      .createQueryBuilder('f')
      .innerJoinAndSelect('f.complaint', 'c')
      .leftJoinAndSelect('f.user', 'user')
      .orderBy('f.created_at', 'DESC')
      .addOrderBy('f.id', 'DESC');

    const feedback = await applyActorScope(qb, actor).getMany();
    return {
      success: true,
      message: 'Feedback fetched successfully.',
      data: feedback.map(toFeedbackDetails),
    };
  }
}
