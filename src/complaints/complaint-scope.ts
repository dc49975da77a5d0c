import { ObjectLiteral, SelectQueryBuilder } from 'typeorm';
import { UserRoleType } from '../common/enums/user-role.enum';
import { Actor } from '../common/interfaces/jwt-user.interface';

/**
 * Narrows a query joined on complaints (as `alias`) to the rows the actor
 * may see: admins everything, faculty their assignments, students their own.
 */
export function applyActorScope<T extends ObjectLiteral>(
  qb: SelectQueryBuilder<T>,
  actor: Actor,
  alias = 'c',
): SelectQueryBuilder<T> {
  if (actor.role === UserRoleType.FACULTY) {
    qb.andWhere(`${alias}.assigned_to_id = :scopeActorId`, { scopeActorId: actor.id });
  } else if (actor.role === UserRoleType.STUDENT) {
    qb.andWhere(`${alias}.created_by_id = :scopeActorId`, { scopeActorId: actor.id });
  }
  return qb;
}
