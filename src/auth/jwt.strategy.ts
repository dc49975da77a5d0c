import { Inject, Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { Actor, JwtPayload } from '../common/interfaces/jwt-user.interface';
import { appConfig, AppConfig } from '../config/configuration';
import { UsersService } from '../users/users.service';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  constructor(
    @Inject(appConfig.KEY) config: AppConfig,
    private readonly usersService: UsersService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: config.jwtSecret,
    });
  }

  // role comes from the database, not the token
  async validate(payload: JwtPayload): Promise<Actor> {
    const actor = await this.usersService.findActor(payload.sub);
    if (!actor) {
      throw new UnauthorizedException({
        success: false,
        message: 'Account not found or disabled',
        error: 'UNAUTHORIZED',
      });
    }
    return actor;
  }
}
