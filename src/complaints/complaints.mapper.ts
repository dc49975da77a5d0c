import {
  ComplaintHistoryAction,
  ComplaintPriority,
  ComplaintStatus,
} from '../common/enums/complaint.enum';
import { UserRoleType } from '../common/enums/user-role.enum';
import { User } from '../users/entity/user.entity';
import { ComplaintAttachment } from './entity/complaint-attachment.entity';
import { ComplaintHistory } from './entity/complaint-history.entity';
import { Complaint } from './entity/complaints.entity';

export interface PersonSummary {
  id: number;
  name: string;
  email: string;
  role: UserRoleType;
}

export interface ComplaintDetails {
  id: number;
  complaint_no: string;
  title: string;
  description: string;
  status: ComplaintStatus;
  priority: ComplaintPriority;
  category: { id: number; name: string } | null;
  subcategory: { id: number; name: string } | null;
  created_by: PersonSummary | null;
  assigned_to: PersonSummary | null;
  remarks: string;
  admin_remarks: string;
  version: number;
  created_at: string;
  updated_at: string;
  resolved_at: string | null;
  closed_at: string | null;
}

export interface HistoryEntry {
  id: number;
  action: ComplaintHistoryAction;
  field: string | null;
  old_value: string | null;
  new_value: string | null;
  from_status: ComplaintStatus | null;
  to_status: ComplaintStatus | null;
  remarks: string;
  changed_by: PersonSummary | null;
  timestamp: string;
}

export interface AttachmentDetails {
  id: number;
  file_path: string;
  original_name: string;
  mime_type: string;
  size: number;
  uploaded_by_id: number;
  created_at: string;
}

const iso = (value: Date | string | null | undefined): string | null => {
  if (value === null || value === undefined) return null;
  return (value instanceof Date ? value : new Date(value)).toISOString();
};

// relations are only present when the query joined them
export function toPersonSummary(user: User | null | undefined): PersonSummary | null {
  if (!user) return null;
  return { id: user.id, name: user.name, email: user.email, role: user.role };
}

export function toComplaintDetails(complaint: Complaint): ComplaintDetails {
  return {
    id: complaint.id,
    complaint_no: complaint.complaint_no,
    title: complaint.title,
    description: complaint.description,
    status: complaint.status,
    priority: complaint.priority,
    category: complaint.category
      ? { id: complaint.category.id, name: complaint.category.name }
      : null,
    subcategory: complaint.subcategory
      ? { id: complaint.subcategory.id, name: complaint.subcategory.name }
      : null,
    created_by: toPersonSummary(complaint.creator),
    assigned_to: toPersonSummary(complaint.assignee),
    remarks: complaint.remarks,
    admin_remarks: complaint.admin_remarks,
    version: complaint.version,
    created_at: iso(complaint.created_at) ?? '',
    updated_at: iso(complaint.updated_at) ?? '',
    resolved_at: iso(complaint.resolved_at),
    closed_at: iso(complaint.closed_at),
  };
}

export function toHistoryEntry(entry: ComplaintHistory): HistoryEntry {
  return Object.freeze({
    id: entry.id,
    action: entry.action,
    field: entry.field,
    old_value: entry.old_value,
    new_value: entry.new_value,
    from_status: entry.from_status,
    to_status: entry.to_status,
    remarks: entry.remarks,
    changed_by: toPersonSummary(entry.changed_by),
    timestamp: iso(entry.created_at) ?? '',
  });
}

export function toAttachmentDetails(
  attachment: ComplaintAttachment,
): AttachmentDetails {
  return {
    id: attachment.id,
    file_path: attachment.file_path,
    original_name: attachment.original_name,
    mime_type: attachment.mime_type,
    size: attachment.size,
    uploaded_by_id: attachment.uploaded_by_id,
    created_at: iso(attachment.created_at) ?? '',
  };
}
