import type { ObjectId } from "mongodb";
import type { CounselingConfig } from "./config.js";
import { notificationsSent } from "./db.js";
import type {
  CounselorMeetingDocument, MeetingNotification, MeetingNotificationKind, NotificationPayload, NotificationRecord,
  StudentDocument, TaskDocument,
} from "./types.js";

export interface NotificationSender {
  send(notification: NotificationPayload): Promise<void>;
}

const SUBJECT_PREFIX: Record<MeetingNotificationKind, string> = {
  meeting_scheduled: "Meeting scheduled",
  meeting_rescheduled: "Meeting rescheduled",
  meeting_cancelled: "Meeting cancelled",
};

/** One payload for the student, plus one for the parent when the student has one on file. */
export function renderMeetingNotifications(
  kind: MeetingNotificationKind,
  meeting: CounselorMeetingDocument,
  taskIds: ObjectId[],
  student: StudentDocument | null,
): MeetingNotification[] {
  const recipients = [meeting.student_email];
  if (student?.parent_email) recipients.push(student.parent_email);

  return recipients.map(recipient => ({
    recipient,
    subject: `${SUBJECT_PREFIX[kind]}: ${meeting.title}`,
    kind,
    context: {
      student_email: meeting.student_email,
      counselor_meeting_id: meeting._id.toHexString(),
      task_ids: taskIds.map(id => id.toHexString()),
      start: meeting.start ? meeting.start.toISOString() : null,
    },
  }));
}

/** Reminder to a student about their overdue tasks and those coming due. */
export function renderTaskReminder(studentEmail: string, overdue: TaskDocument[], comingDue: TaskDocument[]): NotificationPayload {
  const count = overdue.length + comingDue.length;
  return {
    recipient: studentEmail,
    subject: overdue.length > 0
      ? `${overdue.length} overdue task${overdue.length === 1 ? "" : "s"}`
      : `${count} task${count === 1 ? "" : "s"} due soon`,
    kind: "task_reminder",
    context: {
      student_email: studentEmail,
      overdue_task_ids: overdue.map(t => t._id.toHexString()),
      coming_due_task_ids: comingDue.map(t => t._id.toHexString()),
    },
  };
}

export function notificationBody(notification: NotificationPayload): string {
  if (notification.kind === "task_reminder") {
    const { context } = notification;
    return [
      `For ${context.student_email}`,
      `Overdue: ${context.overdue_task_ids.length}`,
      `Due within two days: ${context.coming_due_task_ids.length}`,
    ].join("\n");
  }

  const { context } = notification;
  const lines = [`For ${context.student_email}`];
  if (notification.kind !== "meeting_cancelled" && context.start) lines.push(`Starts ${context.start}`);
  if (context.task_ids.length > 0) lines.push(`${context.task_ids.length} task(s) linked to this meeting`);
  return lines.join("\n");
}

async function recordNotification(record: NotificationRecord): Promise<void> {
  await (await notificationsSent()).insertOne(record);
}

/**
 * Posts to an ntfy topic and records every attempt in notifications_sent. Rejects when the
 * payload was not delivered, including when no topic is configured.
 */
export class NtfyNotificationSender implements NotificationSender {
  constructor(
    private readonly config: Pick<CounselingConfig, "ntfyBaseUrl" | "ntfyTopic">,
    private readonly record: (record: NotificationRecord) => Promise<void> = recordNotification,
  ) {}

  async send(notification: NotificationPayload): Promise<void> {
    const { ntfyTopic, ntfyBaseUrl } = this.config;
    if (!ntfyTopic) {
      await this.record({ ...notification, delivered: false, created_at: new Date() });
      throw new Error("NTFY_TOPIC not set");
    }

    let delivered = false;
    try {
      const response = await fetch(`${ntfyBaseUrl}/${ntfyTopic}`, {
        method: "POST",
        headers: { "Title": notification.subject, "X-Recipient": notification.recipient },
        body: notificationBody(notification),
      });
      if (!response.ok) {
        throw new Error(`ntfy responded with ${response.status}`);
      }
      delivered = true;
    } finally {
      await this.record({ ...notification, delivered, created_at: new Date() });
    }
  }
}

/** Delivery failures are logged; they never undo or fail the change that caused them. */
export async function deliverNotifications(
  sender: NotificationSender,
  notifications: NotificationPayload[],
): Promise<number> {
  let delivered = 0;
  for (const notification of notifications) {
    try {
      await sender.send(notification);
      delivered++;
    } catch (err) {
      console.error(`[notify] Failed to send "${notification.subject}" to ${notification.recipient}:`, err);
    }
  }
  return delivered;
}
