import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ObjectId } from "mongodb";
import { NotFoundError, ValidationError } from "../errors.js";
import { applyRoadmap } from "../roadmap/apply.js";
import { MemoryCounselingStore } from "./helpers/memoryStore.js";
import {
  COUNSELOR_EMAIL, NOW, STUDENT_EMAIL, hexIds, makeAgendaItemTemplate, makeMeetingTemplate, makeRoadmap,
  makeTaskTemplate, nth, seedPeople, seedRoadmap,
} from "./helpers/fixtures.js";

let store: MemoryCounselingStore;

const base = { studentEmail: STUDENT_EMAIL, counselorEmail: COUNSELOR_EMAIL, now: NOW };

beforeEach(() => {
  store = new MemoryCounselingStore();
  seedPeople(store);
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("applyRoadmap", () => {
  it("creates N meetings, N×M agenda items and N×M×K tasks", async () => {
    const { roadmap } = seedRoadmap(store, { meetings: 2, agendaItems: 3, tasks: 2 });

    const result = await applyRoadmap(store, { ...base, roadmapId: roadmap._id });

    expect(result.meetings).toHaveLength(2);
    expect(result.agendaItems).toHaveLength(6);
    expect(result.tasks).toHaveLength(12);
    expect(store.listMeetings()).toHaveLength(2);
    expect(store.listAgendaItems()).toHaveLength(6);
    expect(store.listTasks()).toHaveLength(12);
    expect(store.transactions).toBe(1);
  });

  it("keeps roadmap and template order and links every record", async () => {
    const { roadmap } = seedRoadmap(store, { meetings: 2, agendaItems: 3, tasks: 2 });

    const result = await applyRoadmap(store, { ...base, roadmapId: roadmap._id });

    const first = nth(result.meetings, 0);
    expect(result.meetings.map(m => m.title)).toEqual(["Meeting 1", "Meeting 2"]);
    expect(first.start).toBeNull();
    expect(first.duration_minutes).toBe(45);
    expect(first.counselor_email).toBe(COUNSELOR_EMAIL);

    const items = result.agendaItems.filter(item => item.counselor_meeting_id.equals(first._id));
    expect(items.map(i => [i.title, i.order])).toEqual([["Agenda 1.1", 1], ["Agenda 1.2", 2], ["Agenda 1.3", 3]]);

    const firstItem = nth(items, 0);
    expect(firstItem.pre_meeting_task_ids).toHaveLength(2);
    expect(firstItem.post_meeting_task_ids).toEqual([]);
    const firstTask = nth(result.tasks, 0);
    expect(firstTask.title).toBe("Task 1.1.1");
    expect(firstTask.status).toBe("open");
    expect(firstTask.timing).toBe("pre_meeting");
    expect(firstTask.created_by).toBe(COUNSELOR_EMAIL);
    expect(firstTask.agenda_item_id?.toHexString()).toBe(firstItem._id.toHexString());
    expect(hexIds(firstTask.counselor_meeting_ids)).toEqual([first._id.toHexString()]);

    const student = await store.getStudent(STUDENT_EMAIL);
    expect(hexIds(student?.applied_roadmap_ids ?? [])).toEqual([roadmap._id.toHexString()]);
  });

  it("creates one task for a task template reached from several agenda items", async () => {
    const shared = makeTaskTemplate({ title: "Request transcript" });
    const early = makeAgendaItemTemplate({ title: "Transcripts", pre_meeting_task_template_ids: [shared._id] });
    const late = makeAgendaItemTemplate({ title: "Transcript follow-up", post_meeting_task_template_ids: [shared._id] });
    const m1 = makeMeetingTemplate({ title: "Fall", order: 1, agenda_item_template_ids: [early._id] });
    const m2 = makeMeetingTemplate({ title: "Winter", order: 2, agenda_item_template_ids: [late._id] });
    const roadmap = makeRoadmap({ counselor_meeting_template_ids: [m1._id, m2._id] });
    store.addTaskTemplate(shared);
    store.addAgendaItemTemplate(early);
    store.addAgendaItemTemplate(late);
    store.addMeetingTemplate(m1);
    store.addMeetingTemplate(m2);
    store.addRoadmap(roadmap);

    const result = await applyRoadmap(store, { ...base, roadmapId: roadmap._id });

    expect(result.tasks).toHaveLength(1);
    const task = nth(result.tasks, 0);
    const [fall, winter] = result.agendaItems;
    expect(hexIds(task.counselor_meeting_ids)).toEqual(hexIds(result.meetings.map(m => m._id)));
    expect(task.agenda_item_id?.toHexString()).toBe(fall?._id.toHexString());
    expect(hexIds(fall?.pre_meeting_task_ids ?? [])).toEqual([task._id.toHexString()]);
    expect(hexIds(winter?.post_meeting_task_ids ?? [])).toEqual([task._id.toHexString()]);
  });

  it("orders meetings by template order before roadmap position", async () => {
    const second = makeMeetingTemplate({ title: "Second", order: 2 });
    const first = makeMeetingTemplate({ title: "First", order: 1 });
    const roadmap = makeRoadmap({ counselor_meeting_template_ids: [second._id, first._id] });
    store.addMeetingTemplate(second);
    store.addMeetingTemplate(first);
    store.addRoadmap(roadmap);

    const result = await applyRoadmap(store, { ...base, roadmapId: roadmap._id });

    expect(result.meetings.map(m => m.title)).toEqual(["First", "Second"]);
  });

  it("leaves out inactive agenda item templates and archived task templates", async () => {
    const seeded = seedRoadmap(store, { meetings: 1, agendaItems: 2, tasks: 2 });
    const items = nth(seeded.agendaItemTemplates, 0);
    store.addAgendaItemTemplate({ ...nth(items, 1), active: false });
    store.addTaskTemplate({ ...nth(seeded.taskTemplates, 1), archived: NOW });

    const result = await applyRoadmap(store, { ...base, roadmapId: seeded.roadmap._id });

    expect(result.agendaItems.map(i => i.title)).toEqual(["Agenda 1.1"]);
    expect(result.tasks.map(t => t.title)).toEqual(["Task 1.1.1"]);
    expect(nth(result.agendaItems, 0).pre_meeting_task_ids).toHaveLength(1);
  });

  it("applies a selection: deselected parts, overrides and custom agenda items", async () => {
    const seeded = seedRoadmap(store, { meetings: 2, agendaItems: 2, tasks: 1 });
    const [m1, m2] = seeded.meetingTemplates;
    const [a11, a12] = nth(seeded.agendaItemTemplates, 0);
    if (!m1 || !m2 || !a11 || !a12) throw new Error("seed failed");

    const result = await applyRoadmap(store, {
      ...base,
      roadmapId: seeded.roadmap._id,
      selection: {
        meetings: {
          [m2._id.toHexString()]: false,
          [m1._id.toHexString()]: {
            title: "Kickoff",
            agenda_items: {
              [a11._id.toHexString()]: { title: "Goals", description: "Talk about goals" },
              [a12._id.toHexString()]: false,
            },
            custom_agenda_items: ["Summer plans"],
          },
        },
      },
    });

    expect(result.meetings.map(m => m.title)).toEqual(["Kickoff"]);
    expect(result.agendaItems.map(i => [i.title, i.description, i.order])).toEqual([
      ["Goals", "Talk about goals", 1],
      ["Summer plans", "", 2],
    ]);
    expect(nth(result.agendaItems, 1).agenda_item_template_id).toBeNull();
    expect(result.tasks.map(t => t.title)).toEqual(["Task 1.1.1"]);
  });

  it("rejects a selection naming a meeting template outside the roadmap", async () => {
    const { roadmap } = seedRoadmap(store, { meetings: 1, agendaItems: 1, tasks: 1 });
    const stranger = new ObjectId();

    const applying = applyRoadmap(store, {
      ...base,
      roadmapId: roadmap._id,
      selection: { meetings: { [stranger.toHexString()]: true } },
    });

    await expect(applying).rejects.toBeInstanceOf(ValidationError);
    await expect(applying).rejects.toThrow(`Counselor meeting template ${stranger.toHexString()} is not part of this roadmap.`);
    expect(store.listMeetings()).toEqual([]);
  });

  it("rejects a selection naming another meeting's agenda item template", async () => {
    const seeded = seedRoadmap(store, { meetings: 2, agendaItems: 1, tasks: 1 });
    const m1 = nth(seeded.meetingTemplates, 0);
    const a21 = nth(nth(seeded.agendaItemTemplates, 1), 0);

    const applying = applyRoadmap(store, {
      ...base,
      roadmapId: seeded.roadmap._id,
      selection: { meetings: { [m1._id.toHexString()]: { agenda_items: { [a21._id.toHexString()]: false } } } },
    });

    await expect(applying).rejects.toThrow(
      `Agenda item template ${a21._id.toHexString()} does not belong to meeting template "Meeting 1".`,
    );
  });

  it("writes nothing when a later write fails", async () => {
    const { roadmap } = seedRoadmap(store, { meetings: 2, agendaItems: 2, tasks: 2 });
    vi.spyOn(store, "insertTasks").mockRejectedValueOnce(new Error("write conflict"));

    await expect(applyRoadmap(store, { ...base, roadmapId: roadmap._id })).rejects.toThrow("write conflict");

    expect(store.listMeetings()).toEqual([]);
    expect(store.listAgendaItems()).toEqual([]);
    expect(store.listTasks()).toEqual([]);
    expect((await store.getStudent(STUDENT_EMAIL))?.applied_roadmap_ids).toEqual([]);
  });

  it("rejects an inactive roadmap", async () => {
    const { roadmap } = seedRoadmap(store, { meetings: 1, agendaItems: 1, tasks: 1 }, { active: false });

    await expect(applyRoadmap(store, { ...base, roadmapId: roadmap._id }))
      .rejects.toThrow('Roadmap "Junior Year" is not active.');
  });

  it("rejects an unknown student, counselor or roadmap", async () => {
    const { roadmap } = seedRoadmap(store, { meetings: 1, agendaItems: 1, tasks: 1 });
    const missing = new ObjectId();

    await expect(applyRoadmap(store, { ...base, roadmapId: roadmap._id, studentEmail: "nobody@test.edu" }))
      .rejects.toThrow("Student nobody@test.edu not found.");
    await expect(applyRoadmap(store, { ...base, roadmapId: roadmap._id, counselorEmail: "nobody@test.edu" }))
      .rejects.toThrow("Counselor nobody@test.edu not found.");
    await expect(applyRoadmap(store, { ...base, roadmapId: missing }))
      .rejects.toBeInstanceOf(NotFoundError);
  });

  it("rejects a roadmap referencing a missing meeting template", async () => {
    const missing = new ObjectId();
    const roadmap = makeRoadmap({ counselor_meeting_template_ids: [missing] });
    store.addRoadmap(roadmap);

    await expect(applyRoadmap(store, { ...base, roadmapId: roadmap._id }))
      .rejects.toThrow(`Counselor meeting template ${missing.toHexString()} not found.`);
  });
});

describe("applyRoadmap duplicate handling", () => {
  it("rejects applying a non-repeatable roadmap twice by default", async () => {
    const { roadmap } = seedRoadmap(store, { meetings: 2, agendaItems: 1, tasks: 1 });
    await applyRoadmap(store, { ...base, roadmapId: roadmap._id });

    await expect(applyRoadmap(store, { ...base, roadmapId: roadmap._id }))
      .rejects.toThrow('Student already has meetings from "Meeting 1", "Meeting 2".');
    expect(store.listMeetings()).toHaveLength(2);
  });

  it("skips existing meetings, ignoring cancelled ones", async () => {
    const seeded = seedRoadmap(store, { meetings: 2, agendaItems: 1, tasks: 1 });
    const first = await applyRoadmap(store, { ...base, roadmapId: seeded.roadmap._id });
    await store.updateMeeting(nth(first.meetings, 0)._id, { cancelled: NOW });

    const second = await applyRoadmap(store, { ...base, roadmapId: seeded.roadmap._id, policy: "skip_existing" });

    expect(second.meetings.map(m => m.title)).toEqual(["Meeting 1"]);
    expect(second.tasks.map(t => t.title)).toEqual(["Task 1.1.1"]);
    expect(hexIds(second.skippedMeetingTemplateIds)).toEqual([nth(seeded.meetingTemplates, 1)._id.toHexString()]);
  });

  it("allows applying a repeatable roadmap again", async () => {
    const { roadmap } = seedRoadmap(store, { meetings: 2, agendaItems: 1, tasks: 1 }, { repeatable: true });
    await applyRoadmap(store, { ...base, roadmapId: roadmap._id });

    const second = await applyRoadmap(store, { ...base, roadmapId: roadmap._id });

    expect(second.meetings).toHaveLength(2);
    expect(store.listMeetings()).toHaveLength(4);
    expect((await store.getStudent(STUDENT_EMAIL))?.applied_roadmap_ids).toHaveLength(1);
  });
});
