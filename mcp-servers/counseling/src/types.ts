import type { ObjectId } from "mongodb";

// --- Users ---

export type Role =
  | { type: "superuser" }
  | { type: "admin" }
  | { type: "counselor" }
  | { type: "student" }
  | { type: "parent"; student_emails: string[] };

export interface UserDocument {
  _id?: ObjectId;
  email: string;
  roles: Role[];
  created_at: Date;
  updated_at: Date;
}

// --- People ---

export interface StudentDocument {
  _id?: ObjectId;
  email: string;
  name: string;
  graduation_year: number | null;
  counselor_email: string | null;
  parent_email: string | null;
  applied_roadmap_ids: ObjectId[];
  created_at: Date;
  updated_at: Date;
}

export interface CounselorDocument {
  _id?: ObjectId;
  email: string;
  name: string;
  cc_on_meeting_notes: boolean;
  created_at: Date;
  updated_at: Date;
}

// --- Templates (administrative configuration) ---

export interface RoadmapDocument {
  _id: ObjectId;
  title: string;
  description: string;
  active: boolean;
  // Re-applying a repeatable roadmap is allowed by default
  repeatable: boolean;
  counselor_meeting_template_ids: ObjectId[];
  created_at: Date;
  updated_at: Date;
}

export interface CounselorMeetingTemplateDocument {
  _id: ObjectId;
  key: string;
  title: string;
  order: number;
  description: string;
  counselor_instructions: string;
  student_instructions: string;
  duration_minutes: number | null;
  agenda_item_template_ids: ObjectId[];
  created_at: Date;
  updated_at: Date;
}

export interface AgendaItemTemplateDocument {
  _id: ObjectId;
  key: string;
  title: string;
  description: string;
  order: number;
  active: boolean;
  pre_meeting_task_template_ids: ObjectId[];
  post_meeting_task_template_ids: ObjectId[];
  created_at: Date;
  updated_at: Date;
}

export type TaskType =
  | "essay"
  | "rec"
  | "school_research"
  | "survey"
  | "testing"
  | "transcripts"
  | "other";

export type TaskTiming = "pre_meeting" | "post_meeting";

export interface TaskTemplateDocument {
  _id: ObjectId;
  key: string;
  title: string;
  description: string;
  task_type: TaskType;
  timing: TaskTiming;
  // Stored as written by an administrator. Parsed (and rejected when malformed) at the
  // moment a task transition needs them, see tracker/config.ts.
  include_school_sud_values?: Record<string, unknown>;
  on_assign_sud_update?: Record<string, unknown>;
  on_complete_sud_update?: Record<string, unknown>;
  only_alter_tracker_values: string[];
  archived: Date | null;
  created_at: Date;
  updated_at: Date;
}

// --- Instances (per-student records) ---

export interface CounselorMeetingDocument {
  _id: ObjectId;
  student_email: string;
  counselor_email: string;
  counselor_meeting_template_id: ObjectId | null;
  title: string;
  description: string;
  start: Date | null;
  end: Date | null;
  duration_minutes: number | null;
  cancelled: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface AgendaItemDocument {
  _id: ObjectId;
  counselor_meeting_id: ObjectId;
  agenda_item_template_id: ObjectId | null;
  student_email: string;
  title: string;
  description: string;
  order: number;
  pre_meeting_task_ids: ObjectId[];
  post_meeting_task_ids: ObjectId[];
  created_at: Date;
  updated_at: Date;
}

export type TaskStatus = "open" | "assigned" | "completed";

export interface TaskDocument {
  _id: ObjectId;
  student_email: string;
  task_template_id: ObjectId | null;
  // First agenda item that produced this task; others reference it through their task id lists
  agenda_item_id: ObjectId | null;
  counselor_meeting_ids: ObjectId[];
  title: string;
  description: string;
  timing: TaskTiming | null;
  status: TaskStatus;
  school_ids: number[];
  due: Date | null;
  assigned_at: Date | null;
  completed_at: Date | null;
  // Set by the reminder job; absent until the first reminder goes out
  last_reminder_sent?: Date | null;
  created_by: string;
  created_at: Date;
  updated_at: Date;
}

// --- Application tracker ---

export type RequirementTrackerStatus =
  | ""
  | "n_a"
  | "required"
  | "optional"
  | "assigned"
  | "in_progress"
  | "requested"
  | "received";

export type ApplicationStatus = "n_a" | "in_progress" | "ready" | "on_deck" | "submitted";

export type IsApplying = "YES" | "NO" | "MAYBE";

export type ApplicationPlatform =
  | ""
  | "common_app"
  | "uc"
  | "coalition"
  | "apply_texas"
  | "questbridge"
  | "ucas"
  | "school_specific";

export interface StudentUniversityDecisionDocument {
  _id: ObjectId;
  student_email: string;
  school_id: number;
  school_name: string;
  is_applying: IsApplying;
  application: ApplicationPlatform;
  application_status: ApplicationStatus;
  transcript_status: RequirementTrackerStatus;
  test_scores_status: RequirementTrackerStatus;
  recommendation_one_status: RequirementTrackerStatus;
  recommendation_two_status: RequirementTrackerStatus;
  recommendation_three_status: RequirementTrackerStatus;
  recommendation_four_status: RequirementTrackerStatus;
  created_at: Date;
  updated_at: Date;
}

// --- Notifications ---

export type MeetingNotificationKind = "meeting_scheduled" | "meeting_rescheduled" | "meeting_cancelled";

export interface MeetingNotificationContext {
  student_email: string;
  counselor_meeting_id: string;
  task_ids: string[];
  start: string | null;
}

export interface TaskReminderContext {
  student_email: string;
  overdue_task_ids: string[];
  coming_due_task_ids: string[];
}

export type NotificationPayload =
  | { recipient: string; subject: string; kind: MeetingNotificationKind; context: MeetingNotificationContext }
  | { recipient: string; subject: string; kind: "task_reminder"; context: TaskReminderContext };

export type MeetingNotification = Extract<NotificationPayload, { kind: MeetingNotificationKind }>;

export type NotificationRecord = NotificationPayload & {
  _id?: ObjectId;
  delivered: boolean;
  created_at: Date;
};
