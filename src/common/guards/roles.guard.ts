import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { ROLES_KEY } from '../decorators/roles.decorator';
import { UserRoleType } from '../enums/user-role.enum';
import { Actor } from '../interfaces/jwt-user.interface';

@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const required = this.reflector.getAllAndOverride<UserRoleType[] | undefined>(
      ROLES_KEY,
      [context.getHandler(), context.getClass()],
    );
    if (!required || required.length === 0) return true;

    const { user } = context
      .switchToHttp()
      .getRequest<Request & { user?: Actor }>();
    if (!user || !required.includes(user.role)) {
      throw new ForbiddenException({
        success: false,
        message: `Requires one of the roles: ${required.join(', ')}`,
        error: 'PERMISSION_ERROR',
      });
    }
    return true;
  }
}
