import { students, users } from "./db.js";
import { AccessDeniedError } from "./errors.js";
import type { Role } from "./types.js";

const ADMIN_WRITE_ACTIONS = [
  "create_task_template", "create_agenda_item_template", "create_meeting_template",
  "create_roadmap", "create_student", "create_counselor", "add_tracker_school",
];

const COUNSELOR_ACTIONS = [
  "apply_roadmap", "unapply_roadmap", "update_task_status", "schedule_meeting",
  "reschedule_meeting", "cancel_meeting", "create_meeting", "create_agenda_item",
  "create_task",
];

const STUDENT_ACTIONS = ["update_task_status"];

const READ_ACTIONS = ["view_student", "view_meetings", "view_tasks", "view_tracker", "view_roadmaps"];

export interface AccessContext {
  student_email?: string;
  // Counselor on file for that student
  student_counselor_email?: string | null;
  user_email?: string;
}

export async function getUserRoles(email: string): Promise<Role[]> {
  const col = await users();
  const user = await col.findOne({ email });
  return user?.roles ?? [];
}

export function canAccess(roles: Role[], action: string, context: AccessContext): boolean {
  for (const role of roles) {
    if (role.type === "superuser") return true;

    if (role.type === "admin") {
      if (ADMIN_WRITE_ACTIONS.includes(action) || READ_ACTIONS.includes(action)) return true;
    }

    if (role.type === "counselor") {
      if (COUNSELOR_ACTIONS.includes(action) || READ_ACTIONS.includes(action)) {
        if (!context.student_email && READ_ACTIONS.includes(action)) return true;
        if (context.user_email && context.student_counselor_email === context.user_email) return true;
      }
    }

    if (role.type === "student") {
      if (STUDENT_ACTIONS.includes(action) || READ_ACTIONS.includes(action)) {
        if (context.student_email && context.student_email === context.user_email) return true;
      }
    }

    if (role.type === "parent") {
      if (READ_ACTIONS.includes(action)) {
        if (context.student_email && role.student_emails.includes(context.student_email)) return true;
      }
    }
  }
  return false;
}

/** Throws AccessDeniedError unless `userEmail` may perform `action` (on `studentEmail`, when given). */
export async function authorize(userEmail: string, action: string, studentEmail?: string): Promise<void> {
  const roles = await getUserRoles(userEmail);
  const student = studentEmail ? await (await students()).findOne({ email: studentEmail }) : null;
  const context: AccessContext = {
    student_email: studentEmail,
    student_counselor_email: student?.counselor_email ?? null,
    user_email: userEmail,
  };
  if (!canAccess(roles, action, context)) throw new AccessDeniedError(userEmail, action);
}
