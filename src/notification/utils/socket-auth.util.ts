import * as jwt from 'jsonwebtoken';
import { Socket } from 'socket.io';
import { UserRoleType } from '../../common/enums/user-role.enum';
import { JwtPayload } from '../../common/interfaces/jwt-user.interface';
import { parseBearerToken } from '../../common/utils/parse-bearer-token.util';

const ROLES: readonly string[] = Object.values(UserRoleType);

function isRole(value: unknown): value is UserRoleType {
  return typeof value === 'string' && ROLES.includes(value);
}

function handshakeToken(client: Socket): string {
  const auth: unknown = client.handshake.auth;
  if (typeof auth === 'object' && auth !== null && 'token' in auth) {
    const { token } = auth;
    if (typeof token === 'string') return token;
  }
  return client.handshake.headers.authorization ?? '';
}

export function authenticateSocket(client: Socket, secret: string): JwtPayload {
  const token = parseBearerToken(handshakeToken(client));
  if (!token) {
    throw new Error('Missing auth token');
  }

  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret);
  } catch (err) {
    throw new Error(
      `Invalid or expired token: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (typeof decoded === 'string') {
    throw new Error('Invalid token payload');
  }

  const { sub, email, role } = decoded;
  const userId = typeof sub === 'string' ? Number(sub) : sub;
  if (
    typeof userId !== 'number' ||
    Number.isNaN(userId) ||
    typeof email !== 'string' ||
    !isRole(role)
  ) {
    throw new Error('Malformed token payload');
  }

  const payload: JwtPayload = { sub: userId, email, role };
  client.data.user = payload;
  return payload;
}
