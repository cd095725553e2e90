import type { ObjectId } from "mongodb";
import { NotFoundError, ValidationError } from "../errors.js";
import { deliverNotifications, renderMeetingNotifications } from "../notifications.js";
import type { NotificationSender } from "../notifications.js";
import type { Changes, CounselingStore, CounselingTransaction } from "../store.js";
import type { CounselorMeetingDocument, MeetingNotification, MeetingNotificationKind, StudentDocument } from "../types.js";
import { durationMinutes, validateSchedule } from "../validation.js";

export interface ScheduleMeetingInput {
  meetingId: ObjectId;
  start: Date;
  end: Date;
  now?: Date;
}

export interface CancelMeetingInput {
  meetingId: ObjectId;
  now?: Date;
}

export interface MeetingChange {
  meeting: CounselorMeetingDocument;
  // Tasks whose due date moved with the meeting
  rescheduledTaskIds: ObjectId[];
  notifications: MeetingNotification[];
}

interface CommittedChange {
  meeting: CounselorMeetingDocument;
  taskIds: ObjectId[];
  rescheduledTaskIds: ObjectId[];
  student: StudentDocument | null;
}

async function loadOpenMeeting(tx: CounselingTransaction, meetingId: ObjectId): Promise<CounselorMeetingDocument> {
  const meeting = await tx.getMeeting(meetingId);
  if (!meeting) throw new NotFoundError("Counselor meeting", meetingId.toHexString());
  if (meeting.cancelled) throw new ValidationError(`Meeting "${meeting.title}" has been cancelled.`);
  return meeting;
}

async function setSchedule(
  tx: CounselingTransaction,
  meeting: CounselorMeetingDocument,
  input: ScheduleMeetingInput,
  now: Date,
): Promise<CommittedChange> {
  const previousStart = meeting.start;
  const changes: Changes<CounselorMeetingDocument> = {
    start: input.start,
    end: input.end,
    duration_minutes: durationMinutes(input.start, input.end),
    updated_at: now,
  };
  await tx.updateMeeting(meeting._id, changes);

  const tasks = await tx.findTasks({ counselor_meeting_id: meeting._id });
  const moved = tasks.filter(task =>
    task.due === null || (previousStart !== null && task.due.getTime() === previousStart.getTime()));
  for (const task of moved) {
    await tx.updateTask(task._id, { due: input.start, updated_at: now });
  }

  return {
    meeting: { ...meeting, ...changes },
    taskIds: tasks.map(t => t._id),
    rescheduledTaskIds: moved.map(t => t._id),
    student: await tx.getStudent(meeting.student_email),
  };
}

async function notify(
  sender: NotificationSender,
  kind: MeetingNotificationKind,
  change: CommittedChange,
): Promise<MeetingChange> {
  const notifications = renderMeetingNotifications(kind, change.meeting, change.taskIds, change.student);
  await deliverNotifications(sender, notifications);
  return { meeting: change.meeting, rescheduledTaskIds: change.rescheduledTaskIds, notifications };
}

/** First scheduling of a meeting. Linked tasks without a due date become due at the start. */
export async function scheduleMeeting(
  store: CounselingStore,
  sender: NotificationSender,
  input: ScheduleMeetingInput,
): Promise<MeetingChange> {
  validateSchedule(input.start, input.end);
  const now = input.now ?? new Date();

  const change = await store.withTransaction(async (tx) => {
    const meeting = await loadOpenMeeting(tx, input.meetingId);
    if (meeting.start) {
      throw new ValidationError(`Meeting "${meeting.title}" is already scheduled; reschedule it instead.`);
    }
    return setSchedule(tx, meeting, input, now);
  });

  console.error(`[meetings] Scheduled "${change.meeting.title}" for ${change.meeting.student_email} at ${input.start.toISOString()}`);
  return notify(sender, "meeting_scheduled", change);
}

/**
 * Moves a scheduled meeting. Tasks still due at the old start (or with no due date)
 * follow it; due dates set by hand stay put.
 */
export async function rescheduleMeeting(
  store: CounselingStore,
  sender: NotificationSender,
  input: ScheduleMeetingInput,
): Promise<MeetingChange> {
  validateSchedule(input.start, input.end);
  const now = input.now ?? new Date();

  const change = await store.withTransaction(async (tx) => {
    const meeting = await loadOpenMeeting(tx, input.meetingId);
    if (!meeting.start) {
      throw new ValidationError(`Meeting "${meeting.title}" has not been scheduled yet.`);
    }
    return setSchedule(tx, meeting, input, now);
  });

  console.error(`[meetings] Rescheduled "${change.meeting.title}" for ${change.meeting.student_email} to ${input.start.toISOString()}`);
  return notify(sender, "meeting_rescheduled", change);
}

export async function cancelMeeting(
  store: CounselingStore,
  sender: NotificationSender,
  input: CancelMeetingInput,
): Promise<MeetingChange> {
  const now = input.now ?? new Date();

  const change = await store.withTransaction(async (tx): Promise<CommittedChange> => {
    const meeting = await loadOpenMeeting(tx, input.meetingId);
    await tx.updateMeeting(meeting._id, { cancelled: now, updated_at: now });
    const tasks = await tx.findTasks({ counselor_meeting_id: meeting._id });
    return {
      meeting: { ...meeting, cancelled: now, updated_at: now },
      taskIds: tasks.map(t => t._id),
      rescheduledTaskIds: [],
      student: await tx.getStudent(meeting.student_email),
    };
  });

  console.error(`[meetings] Cancelled "${change.meeting.title}" for ${change.meeting.student_email}`);
  return notify(sender, "meeting_cancelled", change);
}
