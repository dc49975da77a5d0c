import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, FindOptionsWhere, In, Repository } from 'typeorm';
import { NotFoundError } from '../common/exceptions/domain.exceptions';
import { ApiResponse } from '../common/interfaces/api-response.interface';
import { MailService } from '../mail/mail.service';
import { User } from '../users/entity/user.entity';
import { ListNotificationsQueryDto } from './dto/notification.dto';
import { Notification } from './entity/notification.entity';
import { NotificationGateway } from './notification.gateway';

export type NotificationMetadata = Record<string, string | number | boolean | null>;

/** A notification waiting to be written by the transition that caused it. */
export interface NotificationDraft {
  userId: number;
  title: string;
  message: string;
  complaintNo?: string | null;
  metadata?: NotificationMetadata;
}

export interface NotificationDetails {
  id: number;
  title: string;
  message: string;
  complaint_no: string | null;
  is_read: boolean;
  metadata: NotificationMetadata | null;
  generated_at: string;
}

@Injectable()
export class NotificationService {
  private readonly logger = new Logger(NotificationService.name);

  constructor(
    @InjectRepository(Notification)
    private readonly notificationRepository: Repository<Notification>,
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly gateway: NotificationGateway,
    private readonly mailService: MailService,
  ) {}

  toNotificationDetails(notification: Notification): NotificationDetails {
    return {
      id: notification.id,
      title: notification.title,
      message: notification.message,
      complaint_no: notification.complaint_no,
      is_read: notification.is_read,
      metadata: notification.metadata,
      generated_at: new Date(notification.created_at).toISOString(),
    };
  }

  /**
   * Writes notification rows through the caller's transaction so they
   * commit or roll back with the change that produced them.
   */
  async recordWithin(
    manager: EntityManager,
    drafts: NotificationDraft[],
  ): Promise<Notification[]> {
    if (drafts.length === 0) return [];
    const rows = drafts.map((draft) =>
      manager.create(Notification, {
        user_id: draft.userId,
        title: draft.title,
        message: draft.message,
        complaint_no: draft.complaintNo ?? null,
        metadata: draft.metadata ?? null,
      }),
    );
    return manager.save(rows);
  }

  /**
   * Pushes committed notifications to their recipients' sockets and mailboxes.
   * Delivery problems are logged; the rows stay readable either way.
   */
  async dispatch(notifications: Notification[]): Promise<void> {
    if (notifications.length === 0) return;

    for (const notification of notifications) {
      this.gateway.pushToUser(
        notification.user_id,
        this.toNotificationDetails(notification),
      );
    }

    if (!this.mailService.enabled) return;

    try {
      const recipientIds = [...new Set(notifications.map((n) => n.user_id))];
      const recipients = await this.userRepository.find({
        where: { id: In(recipientIds) },
      });
      const emails = new Map(recipients.map((user) => [user.id, user.email]));

      for (const notification of notifications) {
        const to = emails.get(notification.user_id);
        if (!to) continue;
        try {
          await this.mailService.send({
            to,
            subject: notification.title,
            text: notification.message,
          });
        } catch (err) {
          this.logger.error(
            `Mail to user ${notification.user_id} failed: ${err instanceof Error ? err.message : String(err)}`,
          );
        }
      }
    } catch (err) {
      this.logger.error(
        `Notification delivery failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  async findAll(
    userId: number,
    query: ListNotificationsQueryDto = {},
  ): Promise<ApiResponse<NotificationDetails[]>> {
    const where: FindOptionsWhere<Notification> = { user_id: userId };
    if (query.unread_only) where.is_read = false;

    const notifications = await this.notificationRepository.find({
      where,
      order: { id: 'DESC' },
      take: query.limit,
    });

    return {
      success: true,
      message: 'Notifications retrieved successfully',
      data: notifications.map((notification) =>
        this.toNotificationDetails(notification),
      ),
    };
  }

  async getUnreadCount(userId: number): Promise<ApiResponse<{ unread_count: number }>> {
    const count = await this.notificationRepository.count({
      where: { user_id: userId, is_read: false },
    });

    return {
      success: true,
      message: 'Unread count retrieved successfully',
      data: { unread_count: count },
    };
  }

  async markAsRead(
    userId: number,
    id: number,
  ): Promise<ApiResponse<NotificationDetails>> {
    const notification = await this.findOwned(userId, id);
    notification.is_read = true;
    const updated = await this.notificationRepository.save(notification);
    await this.publishUnreadCount(userId);

    return {
      success: true,
      message: 'Notification marked as read successfully',
      data: this.toNotificationDetails(updated),
    };
  }

  async markAllAsRead(userId: number): Promise<ApiResponse<{ updated: number }>> {
    const result = await this.notificationRepository.update(
      { user_id: userId, is_read: false },
      { is_read: true },
    );
    await this.publishUnreadCount(userId);

    return {
      success: true,
      message: 'All notifications marked as read successfully',
      data: { updated: result.affected ?? 0 },
    };
  }

  async remove(userId: number, id: number): Promise<ApiResponse<null>> {
    const notification = await this.findOwned(userId, id);
    await this.notificationRepository.remove(notification);

    return {
      success: true,
      message: 'Notification deleted successfully',
      data: null,
    };
  }

  // someone else's notification reads as missing
  private async findOwned(userId: number, id: number): Promise<Notification> {
    const notification = await this.notificationRepository.findOne({
      where: { id, user_id: userId },
    });
    if (!notification) {
      throw new NotFoundError(`Notification with ID ${id} not found`);
    }
    return notification;
  }

  private async publishUnreadCount(userId: number): Promise<void> {
    const count = await this.notificationRepository.count({
      where: { user_id: userId, is_read: false },
    });
    this.gateway.pushUnreadCount(userId, count);
  }
}
