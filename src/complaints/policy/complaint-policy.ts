import { ComplaintStatus } from '../../common/enums/complaint.enum';
import { UserRoleType } from '../../common/enums/user-role.enum';
import { PermissionError } from '../../common/exceptions/domain.exceptions';
import { Actor } from '../../common/interfaces/jwt-user.interface';

export enum ComplaintAction {
  CREATE = 'create',
  VIEW = 'view',
  ASSIGN = 'assign',
  START = 'start',
  RESOLVE = 'resolve',
  CLOSE = 'close',
  CHANGE_STATUS = 'change_status',
  REOPEN = 'reopen',
  EDIT_DETAILS = 'edit_details',
  SET_PRIORITY = 'set_priority',
  ATTACH = 'attach',
  FEEDBACK = 'feedback',
  EXPORT = 'export',
}

/** How the actor stands towards the complaint being acted on. */
export type ActorRelation = 'creator' | 'assignee' | 'none';

type Grants = Partial<Record<ComplaintAction, readonly ActorRelation[]>>;

const ANY: readonly ActorRelation[] = ['creator', 'assignee', 'none'];
const CREATOR: readonly ActorRelation[] = ['creator'];
const ASSIGNEE: readonly ActorRelation[] = ['assignee'];

export const COMPLAINT_POLICY: Readonly<Record<UserRoleType, Grants>> = {
  [UserRoleType.ADMIN]: {
    [ComplaintAction.VIEW]: ANY,
    [ComplaintAction.ASSIGN]: ANY,
    [ComplaintAction.START]: ANY,
    [ComplaintAction.RESOLVE]: ANY,
    [ComplaintAction.CLOSE]: ANY,
    [ComplaintAction.CHANGE_STATUS]: ANY,
    [ComplaintAction.REOPEN]: ANY,
    [ComplaintAction.SET_PRIORITY]: ANY,
    [ComplaintAction.ATTACH]: ANY,
    [ComplaintAction.EXPORT]: ANY,
  },
  [UserRoleType.FACULTY]: {
    [ComplaintAction.VIEW]: ASSIGNEE,
    [ComplaintAction.START]: ASSIGNEE,
    [ComplaintAction.RESOLVE]: ASSIGNEE,
    [ComplaintAction.CHANGE_STATUS]: ASSIGNEE,
  },
  [UserRoleType.STUDENT]: {
    [ComplaintAction.CREATE]: ['none'],
    [ComplaintAction.VIEW]: CREATOR,
    [ComplaintAction.EDIT_DETAILS]: CREATOR,
    [ComplaintAction.ATTACH]: CREATOR,
    [ComplaintAction.FEEDBACK]: CREATOR,
  },
};

const DENIAL_MESSAGES: Record<ComplaintAction, string> = {
  [ComplaintAction.CREATE]: 'Only students can create complaints',
  [ComplaintAction.VIEW]: 'You are not allowed to view this complaint',
  [ComplaintAction.ASSIGN]: 'Only administrators can assign complaints',
  [ComplaintAction.START]: 'Only the assigned faculty or an administrator can start work',
  [ComplaintAction.RESOLVE]:
    'Only the assigned faculty or an administrator can resolve complaints',
  [ComplaintAction.CLOSE]: 'Only administrators can close complaints',
  [ComplaintAction.CHANGE_STATUS]:
    'Only assigned faculty or admin can change status',
  [ComplaintAction.REOPEN]: 'Only administrators can reopen complaints',
  [ComplaintAction.EDIT_DETAILS]: 'Only the student who filed the complaint can edit it',
  [ComplaintAction.SET_PRIORITY]: 'Only administrators can change priority',
  [ComplaintAction.ATTACH]:
    'Only the student who filed the complaint or an administrator can attach files',
  [ComplaintAction.FEEDBACK]:
    'Only the student who filed the complaint can leave feedback',
  [ComplaintAction.EXPORT]: 'Only administrators can export complaints',
};

interface ComplaintParties {
  created_by_id: number;
  assigned_to_id: number | null;
}

export function relationOf(
  actor: Actor,
  complaint: ComplaintParties | null,
): ActorRelation {
  if (!complaint) return 'none';
  if (complaint.created_by_id === actor.id) return 'creator';
  if (complaint.assigned_to_id !== null && complaint.assigned_to_id === actor.id) {
    return 'assignee';
  }
  return 'none';
}

export function isAllowed(
  role: UserRoleType,
  action: ComplaintAction,
  relation: ActorRelation,
): boolean {
  const allowed = COMPLAINT_POLICY[role][action];
  return allowed !== undefined && allowed.includes(relation);
}

export function can(
  actor: Actor,
  action: ComplaintAction,
  complaint: ComplaintParties | null = null,
): boolean {
  return isAllowed(actor.role, action, relationOf(actor, complaint));
}

export function authorize(
  actor: Actor,
  action: ComplaintAction,
  complaint: ComplaintParties | null = null,
): void {
  if (!can(actor, action, complaint)) {
    throw new PermissionError(DENIAL_MESSAGES[action]);
  }
}

/** The permission a status change needs, keyed by the target status. */
export function actionForTargetStatus(target: ComplaintStatus): ComplaintAction {
  switch (target) {
    case ComplaintStatus.IN_PROGRESS:
      return ComplaintAction.START;
    case ComplaintStatus.RESOLVED:
      return ComplaintAction.RESOLVE;
    case ComplaintStatus.CLOSED:
      return ComplaintAction.CLOSE;
    default:
      return ComplaintAction.CHANGE_STATUS;
  }
}
