import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';
import { Actor } from '../interfaces/jwt-user.interface';

export const CurrentUser = createParamDecorator(
  (field: keyof Actor | undefined, ctx: ExecutionContext) => {
    const request = ctx.switchToHttp().getRequest<Request & { user?: Actor }>();
    const user = request.user;
    return field && user ? user[field] : user;
  },
);
