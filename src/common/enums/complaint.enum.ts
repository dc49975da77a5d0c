export enum ComplaintStatus {
  PENDING = 'PENDING',
  IN_PROGRESS = 'IN_PROGRESS',
  RESOLVED = 'RESOLVED',
  CLOSED = 'CLOSED',
}

export enum ComplaintPriority {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
}

export enum ComplaintHistoryAction {
  CREATED = 'created',
  ASSIGNED = 'assigned',
  STATUS_CHANGED = 'status_changed',
  REOPENED = 'reopened',
  DETAILS_UPDATED = 'details_updated',
  PRIORITY_CHANGED = 'priority_changed',
  ATTACHMENT_ADDED = 'attachment_added',
}

export enum ReopenPolicy {
  DISABLED = 'disabled',
  RESOLVED = 'resolved',
  RESOLVED_OR_CLOSED = 'resolved_or_closed',
}

export const COMPLAINT_STATUS_LABELS: Record<ComplaintStatus, string> = {
  [ComplaintStatus.PENDING]: 'Pending',
  [ComplaintStatus.IN_PROGRESS]: 'In Progress',
  [ComplaintStatus.RESOLVED]: 'Resolved',
  [ComplaintStatus.CLOSED]: 'Closed',
};

export const COMPLAINT_PRIORITY_LABELS: Record<ComplaintPriority, string> = {
  [ComplaintPriority.LOW]: 'Low',
  [ComplaintPriority.MEDIUM]: 'Medium',
  [ComplaintPriority.HIGH]: 'High',
};
