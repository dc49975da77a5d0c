import { Injectable, UnauthorizedException } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  handleRequest<TUser>(err: unknown, user: TUser | false | null): TUser {
    if (err) {
      throw err;
    }
    if (!user) {
      throw new UnauthorizedException({
        success: false,
        message: 'Not authenticated',
        error: 'UNAUTHORIZED',
      });
    }
    return user;
  }
}
