export const NOTIFICATION_NAMESPACE = 'notifications';

export const NOTIFICATION_EVENTS = {
  NOTIFICATION: 'notification',
  UNREAD_COUNT: 'unread-count',
} as const;

export const userRoom = (userId: number): string => `user:${userId}`;
