import {
  COMPLAINT_STATUS_LABELS,
  ComplaintStatus,
  ReopenPolicy,
} from '../../common/enums/complaint.enum';
import { StateError } from '../../common/exceptions/domain.exceptions';

export const STATUS_ORDER: readonly ComplaintStatus[] = [
  ComplaintStatus.PENDING,
  ComplaintStatus.IN_PROGRESS,
  ComplaintStatus.RESOLVED,
  ComplaintStatus.CLOSED,
];

const FORWARD: Readonly<Record<ComplaintStatus, ComplaintStatus | null>> = {
  [ComplaintStatus.PENDING]: ComplaintStatus.IN_PROGRESS,
  [ComplaintStatus.IN_PROGRESS]: ComplaintStatus.RESOLVED,
  [ComplaintStatus.RESOLVED]: ComplaintStatus.CLOSED,
  [ComplaintStatus.CLOSED]: null,
};

const REOPENABLE: Readonly<Record<ReopenPolicy, readonly ComplaintStatus[]>> = {
  [ReopenPolicy.DISABLED]: [],
  [ReopenPolicy.RESOLVED]: [ComplaintStatus.RESOLVED],
  [ReopenPolicy.RESOLVED_OR_CLOSED]: [
    ComplaintStatus.RESOLVED,
    ComplaintStatus.CLOSED,
  ],
};

export const REOPEN_TARGET = ComplaintStatus.IN_PROGRESS;

export function nextStatus(current: ComplaintStatus): ComplaintStatus | null {
  return FORWARD[current];
}

export function allowedTargets(current: ComplaintStatus): ComplaintStatus[] {
  const next = FORWARD[current];
  return next ? [next] : [];
}

export function isTerminal(status: ComplaintStatus): boolean {
  return FORWARD[status] === null;
}

export function canTransition(
  from: ComplaintStatus,
  to: ComplaintStatus,
): boolean {
  return FORWARD[from] === to;
}

export function assertTransition(
  from: ComplaintStatus,
  to: ComplaintStatus,
): void {
  if (canTransition(from, to)) return;

  const reason =
    from === to
      ? `Complaint is already ${COMPLAINT_STATUS_LABELS[from]}`
      : `Cannot move a complaint from ${COMPLAINT_STATUS_LABELS[from]} to ${COMPLAINT_STATUS_LABELS[to]}`;
  throw new StateError(reason, from, allowedTargets(from));
}

export function reopenableFrom(policy: ReopenPolicy): readonly ComplaintStatus[] {
  return REOPENABLE[policy];
}

export function assertReopen(
  from: ComplaintStatus,
  policy: ReopenPolicy,
): void {
  if (policy === ReopenPolicy.DISABLED) {
    throw new StateError('Reopening complaints is disabled', from, allowedTargets(from));
  }
  if (!REOPENABLE[policy].includes(from)) {
    throw new StateError(
      `A ${COMPLAINT_STATUS_LABELS[from]} complaint cannot be reopened`,
      from,
      allowedTargets(from),
    );
  }
}

/** Whether an ordered list of statuses only ever moves one step forward. */
export function isForwardSequence(statuses: readonly ComplaintStatus[]): boolean {
  return statuses.every(
    (status, i) => i === 0 || canTransition(statuses[i - 1], status),
  );
}
