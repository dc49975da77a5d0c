import { UserRoleType } from '../enums/user-role.enum';

export interface JwtPayload {
  sub: number;
  email: string;
  role: UserRoleType;
}

/** The authenticated caller as resolved from the users table. */
export interface Actor {
  id: number;
  name: string;
  email: string;
  role: UserRoleType;
}
