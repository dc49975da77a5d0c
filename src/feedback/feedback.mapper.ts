import { PersonSummary, toPersonSummary } from '../complaints/complaints.mapper';
import { Feedback } from './entity/feedback.entity';

export interface FeedbackDetails {
  id: number;
  complaint_id: number;
  complaint_no: string | null;
  rating: number;
  comments: string;
  user: PersonSummary | null;
  created_at: string;
}

export function toFeedbackDetails(feedback: Feedback): FeedbackDetails {
  return {
    id: feedback.id,
    complaint_id: feedback.complaint_id,
    // only present when the query joined the complaint
    complaint_no: feedback.complaint ? feedback.complaint.complaint_no : null,
    rating: feedback.rating,
    comments: feedback.comments,
    user: toPersonSummary(feedback.user),
    created_at: new Date(feedback.created_at).toISOString(),
  };
}
