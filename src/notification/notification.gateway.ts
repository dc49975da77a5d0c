import { Inject, Logger } from '@nestjs/common';
import {
  OnGatewayConnection,
  OnGatewayDisconnect,
  WebSocketGateway,
  WebSocketServer,
} from '@nestjs/websockets';
import { Namespace, Socket } from 'socket.io';
import { appConfig, AppConfig } from '../config/configuration';
import {
  NOTIFICATION_EVENTS,
  NOTIFICATION_NAMESPACE,
  userRoom,
} from './notification.constants';
import { authenticateSocket } from './utils/socket-auth.util';

@WebSocketGateway({ namespace: NOTIFICATION_NAMESPACE, cors: { origin: '*' } })
export class NotificationGateway implements OnGatewayConnection, OnGatewayDisconnect {
  // unset until the platform adapter starts listening
  @WebSocketServer() server?: Namespace;
  private readonly logger = new Logger(NotificationGateway.name);

  constructor(
    @Inject(appConfig.KEY)
    private readonly config: AppConfig,
  ) {}

  async handleConnection(client: Socket): Promise<void> {
    try {
      const user = authenticateSocket(client, this.config.jwtSecret);
      await client.join(userRoom(user.sub));
      this.logger.log(`Client ${client.id} joined ${userRoom(user.sub)}`);
    } catch (err) {
      this.logger.warn(
        `Rejected socket ${client.id}: ${err instanceof Error ? err.message : String(err)}`,
      );
      client.disconnect();
    }
  }

  handleDisconnect(client: Socket): void {
    this.logger.debug(`Client ${client.id} disconnected`);
  }

  /** Returns false when no socket server is running. */
  pushToUser(userId: number, payload: object): boolean {
    if (!this.server) return false;
    this.server.to(userRoom(userId)).emit(NOTIFICATION_EVENTS.NOTIFICATION, payload);
    return true;
  }

  pushUnreadCount(userId: number, unreadCount: number): boolean {
    if (!this.server) return false;
    this.server
      .to(userRoom(userId))
      .emit(NOTIFICATION_EVENTS.UNREAD_COUNT, { unread_count: unreadCount });
    return true;
  }
}
