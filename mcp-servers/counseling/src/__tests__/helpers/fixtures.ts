import { ObjectId } from "mongodb";
import type {
  AgendaItemTemplateDocument, CounselorDocument, CounselorMeetingTemplateDocument, RoadmapDocument,
  StudentDocument, StudentUniversityDecisionDocument, TaskTemplateDocument,
} from "../../types.js";
import type { MemoryCounselingStore } from "./memoryStore.js";

export const NOW = new Date("2026-09-01T15:00:00.000Z");
export const STUDENT_EMAIL = "student@test.edu";
export const COUNSELOR_EMAIL = "counselor@test.edu";
export const PARENT_EMAIL = "parent@test.edu";

const CREATED = new Date("2026-01-01T00:00:00.000Z");

export function makeStudent(overrides: Partial<StudentDocument> = {}): StudentDocument {
  return {
    email: STUDENT_EMAIL,
    name: "Test Student",
    graduation_year: 2027,
    counselor_email: COUNSELOR_EMAIL,
    parent_email: PARENT_EMAIL,
    applied_roadmap_ids: [],
    created_at: CREATED,
    updated_at: CREATED,
    ...overrides,
  };
}

export function makeCounselor(overrides: Partial<CounselorDocument> = {}): CounselorDocument {
  return {
    email: COUNSELOR_EMAIL,
    name: "Test Counselor",
    cc_on_meeting_notes: false,
    created_at: CREATED,
    updated_at: CREATED,
    ...overrides,
  };
}

export function makeTaskTemplate(overrides: Partial<TaskTemplateDocument> = {}): TaskTemplateDocument {
  return {
    _id: new ObjectId(),
    key: "task",
    title: "Task",
    description: "",
    task_type: "other",
    timing: "pre_meeting",
    only_alter_tracker_values: [],
    archived: null,
    created_at: CREATED,
    updated_at: CREATED,
    ...overrides,
  };
}

export function makeAgendaItemTemplate(overrides: Partial<AgendaItemTemplateDocument> = {}): AgendaItemTemplateDocument {
  return {
    _id: new ObjectId(),
    key: "agenda_item",
    title: "Agenda item",
    description: "",
    order: 0,
    active: true,
    pre_meeting_task_template_ids: [],
    post_meeting_task_template_ids: [],
    created_at: CREATED,
    updated_at: CREATED,
    ...overrides,
  };
}

export function makeMeetingTemplate(
  overrides: Partial<CounselorMeetingTemplateDocument> = {},
): CounselorMeetingTemplateDocument {
  return {
    _id: new ObjectId(),
    key: "meeting",
    title: "Meeting",
    order: 0,
    description: "",
    counselor_instructions: "",
    student_instructions: "",
    duration_minutes: 45,
    agenda_item_template_ids: [],
    created_at: CREATED,
    updated_at: CREATED,
    ...overrides,
  };
}

export function makeRoadmap(overrides: Partial<RoadmapDocument> = {}): RoadmapDocument {
  return {
    _id: new ObjectId(),
    title: "Junior Year",
    description: "",
    active: true,
    repeatable: false,
    counselor_meeting_template_ids: [],
    created_at: CREATED,
    updated_at: CREATED,
    ...overrides,
  };
}

export function makeDecision(
  overrides: Partial<StudentUniversityDecisionDocument> = {},
): StudentUniversityDecisionDocument {
  return {
    _id: new ObjectId(),
    student_email: STUDENT_EMAIL,
    school_id: 1,
    school_name: "Test University",
    is_applying: "YES",
    application: "common_app",
    application_status: "in_progress",
    transcript_status: "required",
    test_scores_status: "optional",
    recommendation_one_status: "required",
    recommendation_two_status: "",
    recommendation_three_status: "",
    recommendation_four_status: "",
    created_at: CREATED,
    updated_at: CREATED,
    ...overrides,
  };
}

export interface SeededRoadmap {
  roadmap: RoadmapDocument;
  meetingTemplates: CounselorMeetingTemplateDocument[];
  // agendaItemTemplates[i] belong to meetingTemplates[i]
  agendaItemTemplates: AgendaItemTemplateDocument[][];
  taskTemplates: TaskTemplateDocument[];
}

/**
 * A roadmap of `meetings` meeting templates, each with `agendaItems` agenda item templates,
 * each with `tasks` pre-meeting task templates of its own. Titles are "Meeting 1",
 * "Agenda 1.2", "Task 1.2.3" and so on.
 */
export function seedRoadmap(
  store: MemoryCounselingStore,
  shape: { meetings: number; agendaItems: number; tasks: number },
  roadmapOverrides: Partial<RoadmapDocument> = {},
): SeededRoadmap {
  const meetingTemplates: CounselorMeetingTemplateDocument[] = [];
  const agendaItemTemplates: AgendaItemTemplateDocument[][] = [];
  const taskTemplates: TaskTemplateDocument[] = [];

  for (let m = 1; m <= shape.meetings; m++) {
    const items: AgendaItemTemplateDocument[] = [];
    for (let a = 1; a <= shape.agendaItems; a++) {
      const itemTasks: TaskTemplateDocument[] = [];
      for (let t = 1; t <= shape.tasks; t++) {
        itemTasks.push(makeTaskTemplate({ key: `task_${m}_${a}_${t}`, title: `Task ${m}.${a}.${t}` }));
      }
      taskTemplates.push(...itemTasks);
      items.push(makeAgendaItemTemplate({
        key: `agenda_${m}_${a}`,
        title: `Agenda ${m}.${a}`,
        order: a,
        pre_meeting_task_template_ids: itemTasks.map(t => t._id),
      }));
    }
    agendaItemTemplates.push(items);
    meetingTemplates.push(makeMeetingTemplate({
      key: `meeting_${m}`,
      title: `Meeting ${m}`,
      order: m,
      agenda_item_template_ids: items.map(i => i._id),
    }));
  }

  const roadmap = makeRoadmap({
    counselor_meeting_template_ids: meetingTemplates.map(t => t._id),
    ...roadmapOverrides,
  });

  store.addRoadmap(roadmap);
  for (const t of meetingTemplates) store.addMeetingTemplate(t);
  for (const t of agendaItemTemplates.flat()) store.addAgendaItemTemplate(t);
  for (const t of taskTemplates) store.addTaskTemplate(t);

  return { roadmap, meetingTemplates, agendaItemTemplates, taskTemplates };
}

export function nth<T>(items: T[], index: number): T {
  const item = items[index];
  if (item === undefined) throw new Error(`No item at index ${index}`);
  return item;
}

export function hexIds(ids: ObjectId[]): string[] {
  return ids.map(id => id.toHexString());
}

export function seedPeople(store: MemoryCounselingStore): void {
  store.addStudent(makeStudent());
  store.addCounselor(makeCounselor());
}
