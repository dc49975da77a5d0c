import { Category } from '../categories/entity/category.entity';
import { Subcategory } from '../categories/entity/subcategory.entity';
import { ComplaintAttachment } from '../complaints/entity/complaint-attachment.entity';
import { ComplaintHistory } from '../complaints/entity/complaint-history.entity';
import { ComplaintSequence } from '../complaints/entity/complaint-sequence.entity';
import { Complaint } from '../complaints/entity/complaints.entity';
import { Feedback } from '../feedback/entity/feedback.entity';
import { Notification } from '../notification/entity/notification.entity';
import { User } from '../users/entity/user.entity';

export const ENTITIES = [
  User,
  Category,
  Subcategory,
  Complaint,
  ComplaintSequence,
  ComplaintHistory,
  ComplaintAttachment,
  Feedback,
  Notification,
];
