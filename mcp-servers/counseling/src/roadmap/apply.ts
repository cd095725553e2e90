import { ObjectId } from "mongodb";
import type { DuplicateApplicationPolicy } from "../constants.js";
import { NotFoundError, ValidationError } from "../errors.js";
import type { CounselingReader, CounselingStore } from "../store.js";
import type {
  AgendaItemDocument, AgendaItemTemplateDocument, CounselorMeetingDocument, CounselorMeetingTemplateDocument,
  RoadmapDocument, TaskDocument, TaskTemplateDocument,
} from "../types.js";
import { byOrder, includesId } from "../validation.js";
import { resolveSelection } from "./selection.js";
import type { MeetingPlan, RoadmapSelection } from "./selection.js";

export interface ApplyRoadmapInput {
  roadmapId: ObjectId;
  studentEmail: string;
  counselorEmail: string;
  selection?: RoadmapSelection;
  // Defaults to "allow" for repeatable roadmaps, otherwise "reject"
  policy?: DuplicateApplicationPolicy;
  now?: Date;
}

export interface RoadmapApplication {
  meetings: CounselorMeetingDocument[];
  agendaItems: AgendaItemDocument[];
  tasks: TaskDocument[];
  skippedMeetingTemplateIds: ObjectId[];
}

export interface BuildContext {
  studentEmail: string;
  counselorEmail: string;
  now: Date;
}

async function loadAll<T extends { _id: ObjectId }>(
  ids: ObjectId[],
  load: (ids: ObjectId[]) => Promise<T[]>,
  entity: string,
): Promise<Map<string, T>> {
  const docs = ids.length > 0 ? await load(ids) : [];
  const byId = new Map(docs.map(doc => [doc._id.toHexString(), doc]));
  for (const id of ids) {
    if (!byId.has(id.toHexString())) throw new NotFoundError(entity, id.toHexString());
  }
  return byId;
}

async function loadMeetingTemplates(
  reader: CounselingReader,
  roadmap: RoadmapDocument,
): Promise<CounselorMeetingTemplateDocument[]> {
  const byId = await loadAll(
    roadmap.counselor_meeting_template_ids,
    ids => reader.getMeetingTemplates(ids),
    "Counselor meeting template",
  );
  return byOrder([...byId.values()], roadmap.counselor_meeting_template_ids);
}

function uniqueIds(ids: ObjectId[]): ObjectId[] {
  const seen = new Map(ids.map(id => [id.toHexString(), id]));
  return [...seen.values()];
}

function applyDuplicatePolicy(
  plans: MeetingPlan[],
  existing: CounselorMeetingDocument[],
  policy: DuplicateApplicationPolicy,
): { plans: MeetingPlan[]; skipped: ObjectId[] } {
  if (policy === "allow") return { plans, skipped: [] };

  const instantiated = existing.flatMap(m => (m.counselor_meeting_template_id && !m.cancelled ? [m.counselor_meeting_template_id] : []));
  const duplicates = plans.filter(plan => includesId(instantiated, plan.template._id));
  if (duplicates.length === 0) return { plans, skipped: [] };

  if (policy === "reject") {
    throw new ValidationError(
      `Student already has meetings from ${duplicates.map(p => `"${p.template.title}"`).join(", ")}.`,
      { counselor_meeting_template_ids: duplicates.map(p => p.template._id.toHexString()) },
    );
  }
  return {
    plans: plans.filter(plan => !duplicates.includes(plan)),
    skipped: duplicates.map(plan => plan.template._id),
  };
}

function newAgendaItem(
  meeting: CounselorMeetingDocument,
  template: AgendaItemTemplateDocument | null,
  title: string,
  description: string,
  order: number,
  ctx: BuildContext,
): AgendaItemDocument {
  return {
    _id: new ObjectId(),
    counselor_meeting_id: meeting._id,
    agenda_item_template_id: template?._id ?? null,
    student_email: ctx.studentEmail,
    title,
    description,
    order,
    pre_meeting_task_ids: [],
    post_meeting_task_ids: [],
    created_at: ctx.now,
    updated_at: ctx.now,
  };
}

function newTask(
  template: TaskTemplateDocument,
  agendaItem: AgendaItemDocument,
  ctx: BuildContext,
): TaskDocument {
  return {
    _id: new ObjectId(),
    student_email: ctx.studentEmail,
    task_template_id: template._id,
    agenda_item_id: agendaItem._id,
    counselor_meeting_ids: [agendaItem.counselor_meeting_id],
    title: template.title,
    description: template.description,
    timing: template.timing,
    status: "open",
    school_ids: [],
    due: null,
    assigned_at: null,
    completed_at: null,
    created_by: ctx.counselorEmail,
    created_at: ctx.now,
    updated_at: ctx.now,
  };
}

/**
 * Builds the meeting → agenda item → task records for the resolved plans. A task template
 * reached from several agenda items yields one task: the first agenda item to reach it
 * owns it, and every agenda item that reaches it lists it.
 */
export function buildRoadmapRecords(
  plans: MeetingPlan[],
  taskTemplates: Map<string, TaskTemplateDocument>,
  ctx: BuildContext,
): Omit<RoadmapApplication, "skippedMeetingTemplateIds"> {
  const meetings: CounselorMeetingDocument[] = [];
  const agendaItems: AgendaItemDocument[] = [];
  const tasksByTemplate = new Map<string, TaskDocument>();

  for (const plan of plans) {
    const meeting: CounselorMeetingDocument = {
      _id: new ObjectId(),
      student_email: ctx.studentEmail,
      counselor_email: ctx.counselorEmail,
      counselor_meeting_template_id: plan.template._id,
      title: plan.title,
      description: plan.template.description,
      start: null,
      end: null,
      duration_minutes: plan.template.duration_minutes,
      cancelled: null,
      created_at: ctx.now,
      updated_at: ctx.now,
    };
    meetings.push(meeting);

    let order = 1;
    for (const item of plan.agendaItems) {
      const agendaItem = newAgendaItem(meeting, item.template, item.title, item.description, order++, ctx);
      agendaItems.push(agendaItem);

      const lists: [ObjectId[], ObjectId[]][] = [
        [item.template.pre_meeting_task_template_ids, agendaItem.pre_meeting_task_ids],
        [item.template.post_meeting_task_template_ids, agendaItem.post_meeting_task_ids],
      ];
      for (const [templateIds, taskIds] of lists) {
        for (const templateId of templateIds) {
          const template = taskTemplates.get(templateId.toHexString());
          if (!template || template.archived) continue;

          let task = tasksByTemplate.get(templateId.toHexString());
          if (!task) {
            task = newTask(template, agendaItem, ctx);
            tasksByTemplate.set(templateId.toHexString(), task);
          } else if (!includesId(task.counselor_meeting_ids, meeting._id)) {
            task.counselor_meeting_ids.push(meeting._id);
          }
          if (!includesId(taskIds, task._id)) taskIds.push(task._id);
        }
      }
    }

    for (const title of plan.customAgendaItems) {
      agendaItems.push(newAgendaItem(meeting, null, title, "", order++, ctx));
    }
  }

  return { meetings, agendaItems, tasks: [...tasksByTemplate.values()] };
}

/**
 * Instantiates a roadmap for one student. Everything is validated before the first write,
 * and all records are written in a single transaction.
 */
export async function applyRoadmap(store: CounselingStore, input: ApplyRoadmapInput): Promise<RoadmapApplication> {
  const now = input.now ?? new Date();

  const { application, roadmapTitle } = await store.withTransaction(async (tx) => {
    const roadmap = await tx.getRoadmap(input.roadmapId);
    if (!roadmap) throw new NotFoundError("Roadmap", input.roadmapId.toHexString());
    if (!roadmap.active) throw new ValidationError(`Roadmap "${roadmap.title}" is not active.`);

    const student = await tx.getStudent(input.studentEmail);
    if (!student) throw new NotFoundError("Student", input.studentEmail);
    const counselor = await tx.getCounselor(input.counselorEmail);
    if (!counselor) throw new NotFoundError("Counselor", input.counselorEmail);

    const meetingTemplates = await loadMeetingTemplates(tx, roadmap);
    const agendaItemTemplates = await loadAll(
      uniqueIds(meetingTemplates.flatMap(t => t.agenda_item_template_ids)),
      ids => tx.getAgendaItemTemplates(ids),
      "Agenda item template",
    );

    const resolved = resolveSelection(input.selection, meetingTemplates, agendaItemTemplates);
    const existing = await tx.findMeetings({
      student_email: student.email,
      counselor_meeting_template_ids: resolved.map(plan => plan.template._id),
    });
    const { plans, skipped } = applyDuplicatePolicy(
      resolved,
      existing,
      input.policy ?? (roadmap.repeatable ? "allow" : "reject"),
    );

    const taskTemplates = await loadAll(
      uniqueIds(plans.flatMap(plan => plan.agendaItems.flatMap(item => [
        ...item.template.pre_meeting_task_template_ids,
        ...item.template.post_meeting_task_template_ids,
      ]))),
      ids => tx.getTaskTemplates(ids),
      "Task template",
    );

    const records = buildRoadmapRecords(plans, taskTemplates, {
      studentEmail: student.email,
      counselorEmail: counselor.email,
      now,
    });

    await tx.insertMeetings(records.meetings);
    await tx.insertAgendaItems(records.agendaItems);
    await tx.insertTasks(records.tasks);
    await tx.addAppliedRoadmap(student.email, roadmap._id);

    return {
      application: { ...records, skippedMeetingTemplateIds: skipped },
      roadmapTitle: roadmap.title,
    };
  });

  console.error(
    `[roadmap] Applied "${roadmapTitle}" to ${input.studentEmail}: `
    + `${application.meetings.length} meetings, ${application.agendaItems.length} agenda items, ${application.tasks.length} tasks.`,
  );
  return application;
}
