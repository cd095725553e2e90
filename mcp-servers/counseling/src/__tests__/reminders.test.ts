import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ObjectId } from "mongodb";
import { NtfyNotificationSender } from "../notifications.js";
import type { NotificationSender } from "../notifications.js";
import { sendTaskReminders } from "../reminders/taskReminders.js";
import type { NotificationPayload, NotificationRecord, TaskDocument } from "../types.js";
import { MemoryCounselingStore } from "./helpers/memoryStore.js";
import { NOW, STUDENT_EMAIL, makeStudent, seedPeople } from "./helpers/fixtures.js";

const HOUR = 60 * 60 * 1000;

let store: MemoryCounselingStore;
let sent: NotificationPayload[];
let sender: NotificationSender;

function task(overrides: Partial<TaskDocument>): TaskDocument {
  return {
    _id: new ObjectId(),
    student_email: STUDENT_EMAIL,
    task_template_id: null,
    agenda_item_id: null,
    counselor_meeting_ids: [],
    title: "Task",
    description: "",
    timing: null,
    status: "open",
    school_ids: [],
    due: null,
    assigned_at: null,
    completed_at: null,
    created_by: "counselor@test.edu",
    created_at: NOW,
    updated_at: NOW,
    ...overrides,
  };
}

beforeEach(() => {
  store = new MemoryCounselingStore();
  seedPeople(store);
  sent = [];
  sender = { send: async (notification) => { sent.push(notification); } };
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("sendTaskReminders", () => {
  it("sends one reminder per student covering overdue and coming-due tasks", async () => {
    const overdue = task({ due: new Date(NOW.getTime() - 2 * HOUR) });
    const soon = task({ due: new Date(NOW.getTime() + 24 * HOUR) });
    const later = task({ due: new Date(NOW.getTime() + 72 * HOUR) });
    const undated = task({});
    const done = task({ due: new Date(NOW.getTime() - 2 * HOUR), status: "completed" });
    await store.insertTasks([overdue, soon, later, undated, done]);

    const run = await sendTaskReminders(store, sender, NOW);

    expect(run).toEqual({ students: 1, notified: 1, tasks: 2 });
    expect(sent).toEqual([{
      recipient: STUDENT_EMAIL,
      subject: "1 overdue task",
      kind: "task_reminder",
      context: {
        student_email: STUDENT_EMAIL,
        overdue_task_ids: [overdue._id.toHexString()],
        coming_due_task_ids: [soon._id.toHexString()],
      },
    }]);
    expect((await store.getTask(overdue._id))?.last_reminder_sent).toEqual(NOW);
    expect((await store.getTask(later._id))?.last_reminder_sent).toBeUndefined();
  });

  it("does not remind about a task again within the interval", async () => {
    const recent = task({ due: new Date(NOW.getTime() + 6 * HOUR), last_reminder_sent: new Date(NOW.getTime() - 12 * HOUR) });
    const stale = task({ due: new Date(NOW.getTime() + 6 * HOUR), last_reminder_sent: new Date(NOW.getTime() - 30 * HOUR) });
    await store.insertTasks([recent, stale]);

    await sendTaskReminders(store, sender, NOW);

    expect(sent.map(n => n.subject)).toEqual(["1 task due soon"]);
    expect((await store.getTask(recent._id))?.last_reminder_sent).toEqual(new Date(NOW.getTime() - 12 * HOUR));
  });

  it("leaves tasks unstamped when the reminder is not delivered", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    store.addStudent(makeStudent({ email: "other@test.edu" }));
    const failing = task({ due: new Date(NOW.getTime() + 6 * HOUR) });
    const delivered = task({ student_email: "other@test.edu", due: new Date(NOW.getTime() + 6 * HOUR) });
    await store.insertTasks([failing, delivered]);
    const flaky: NotificationSender = {
      send: async (notification) => {
        if (notification.recipient === STUDENT_EMAIL) throw new Error("unreachable");
      },
    };

    const run = await sendTaskReminders(store, flaky, NOW);

    expect(run).toEqual({ students: 2, notified: 1, tasks: 1 });
    expect((await store.getTask(failing._id))?.last_reminder_sent).toBeUndefined();
    expect((await store.getTask(delivered._id))?.last_reminder_sent).toEqual(NOW);
  });

  it("leaves tasks unstamped when no ntfy topic is configured", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const task1 = task({ due: new Date(NOW.getTime() - 2 * HOUR) });
    await store.insertTasks([task1]);
    const records: NotificationRecord[] = [];
    const unconfigured = new NtfyNotificationSender(
      { ntfyBaseUrl: "https://ntfy.test", ntfyTopic: null },
      async (record) => { records.push(record); },
    );

    const run = await sendTaskReminders(store, unconfigured, NOW);

    expect(run).toEqual({ students: 1, notified: 0, tasks: 0 });
    expect(records.map(r => r.delivered)).toEqual([false]);
    expect((await store.getTask(task1._id))?.last_reminder_sent).toBeUndefined();
  });
});
