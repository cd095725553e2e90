import { ObjectId } from "mongodb";
import { NotFoundError, ValidationError } from "../errors.js";
import type { CounselingStore } from "../store.js";
import type { AgendaItemDocument, CounselorMeetingDocument, TaskDocument, TaskTiming } from "../types.js";

export interface CustomMeetingInput {
  studentEmail: string;
  counselorEmail: string;
  title: string;
  description?: string;
  now?: Date;
}

export interface CustomAgendaItemInput {
  meetingId: ObjectId;
  title: string;
  description?: string;
  now?: Date;
}

export interface CustomTaskInput {
  studentEmail: string;
  createdBy: string;
  title: string;
  description?: string;
  agendaItemId?: ObjectId;
  // Which of the agenda item's task lists it joins; ignored without an agenda item
  timing?: TaskTiming;
  schoolIds?: number[];
  due?: Date;
  now?: Date;
}

/** A meeting outside any roadmap, left unscheduled. */
export async function createCustomMeeting(
  store: CounselingStore,
  input: CustomMeetingInput,
): Promise<CounselorMeetingDocument> {
  const now = input.now ?? new Date();

  return store.withTransaction(async (tx) => {
    const student = await tx.getStudent(input.studentEmail);
    if (!student) throw new NotFoundError("Student", input.studentEmail);
    const counselor = await tx.getCounselor(input.counselorEmail);
    if (!counselor) throw new NotFoundError("Counselor", input.counselorEmail);

    const meeting: CounselorMeetingDocument = {
      _id: new ObjectId(),
      student_email: student.email,
      counselor_email: counselor.email,
      counselor_meeting_template_id: null,
      title: input.title,
      description: input.description ?? "",
      start: null,
      end: null,
      duration_minutes: null,
      cancelled: null,
      created_at: now,
      updated_at: now,
    };
    await tx.insertMeetings([meeting]);
    return meeting;
  });
}

/** Appends an agenda item after the meeting's existing ones. */
export async function createCustomAgendaItem(
  store: CounselingStore,
  input: CustomAgendaItemInput,
): Promise<AgendaItemDocument> {
  const now = input.now ?? new Date();

  return store.withTransaction(async (tx) => {
    const meeting = await tx.getMeeting(input.meetingId);
    if (!meeting) throw new NotFoundError("Counselor meeting", input.meetingId.toHexString());
    if (meeting.cancelled) throw new ValidationError(`Meeting "${meeting.title}" has been cancelled.`);

    const existing = await tx.findAgendaItems([meeting._id]);
    const agendaItem: AgendaItemDocument = {
      _id: new ObjectId(),
      counselor_meeting_id: meeting._id,
      agenda_item_template_id: null,
      student_email: meeting.student_email,
      title: input.title,
      description: input.description ?? "",
      order: existing.reduce((max, item) => Math.max(max, item.order), 0) + 1,
      pre_meeting_task_ids: [],
      post_meeting_task_ids: [],
      created_at: now,
      updated_at: now,
    };
    await tx.insertAgendaItems([agendaItem]);
    return agendaItem;
  });
}

/** A task with no template behind it, so it never touches the tracker. */
export async function createCustomTask(store: CounselingStore, input: CustomTaskInput): Promise<TaskDocument> {
  const now = input.now ?? new Date();

  return store.withTransaction(async (tx) => {
    const student = await tx.getStudent(input.studentEmail);
    if (!student) throw new NotFoundError("Student", input.studentEmail);

    const agendaItem = input.agendaItemId ? await tx.getAgendaItem(input.agendaItemId) : null;
    if (input.agendaItemId && !agendaItem) {
      throw new NotFoundError("Agenda item", input.agendaItemId.toHexString());
    }
    if (agendaItem && agendaItem.student_email !== student.email) {
      throw new ValidationError(`Agenda item "${agendaItem.title}" belongs to another student.`);
    }

    const timing = agendaItem ? input.timing ?? "pre_meeting" : null;
    const task: TaskDocument = {
      _id: new ObjectId(),
      student_email: student.email,
      task_template_id: null,
      agenda_item_id: agendaItem?._id ?? null,
      counselor_meeting_ids: agendaItem ? [agendaItem.counselor_meeting_id] : [],
      title: input.title,
      description: input.description ?? "",
      timing,
      status: "open",
      school_ids: input.schoolIds ?? [],
      due: input.due ?? null,
      assigned_at: null,
      completed_at: null,
      created_by: input.createdBy,
      created_at: now,
      updated_at: now,
    };
    await tx.insertTasks([task]);

    if (agendaItem) {
      await tx.updateAgendaItem(
        agendaItem._id,
        timing === "post_meeting"
          ? { post_meeting_task_ids: [...agendaItem.post_meeting_task_ids, task._id], updated_at: now }
          : { pre_meeting_task_ids: [...agendaItem.pre_meeting_task_ids, task._id], updated_at: now },
      );
    }
    return task;
  });
}
