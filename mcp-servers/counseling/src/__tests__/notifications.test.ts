import { describe, it, expect, afterEach, vi } from "vitest";
import { ObjectId } from "mongodb";
import { deliverNotifications, notificationBody, NtfyNotificationSender, renderMeetingNotifications } from "../notifications.js";
import type { CounselorMeetingDocument, NotificationPayload, NotificationRecord } from "../types.js";
import { COUNSELOR_EMAIL, NOW, PARENT_EMAIL, STUDENT_EMAIL, makeStudent } from "./helpers/fixtures.js";

const meeting: CounselorMeetingDocument = {
  _id: new ObjectId("65f000000000000000000001"),
  student_email: STUDENT_EMAIL,
  counselor_email: COUNSELOR_EMAIL,
  counselor_meeting_template_id: null,
  title: "College list review",
  description: "",
  start: new Date("2026-09-10T16:00:00.000Z"),
  end: new Date("2026-09-10T17:00:00.000Z"),
  duration_minutes: 60,
  cancelled: null,
  created_at: NOW,
  updated_at: NOW,
};

const payload: NotificationPayload = {
  recipient: STUDENT_EMAIL,
  subject: "Meeting scheduled: College list review",
  kind: "meeting_scheduled",
  context: {
    student_email: STUDENT_EMAIL,
    counselor_meeting_id: "65f000000000000000000001",
    task_ids: ["65f000000000000000000002"],
    start: "2026-09-10T16:00:00.000Z",
  },
};

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("renderMeetingNotifications", () => {
  it("addresses the student only when no parent is on file", () => {
    const rendered = renderMeetingNotifications("meeting_rescheduled", meeting, [], makeStudent({ parent_email: null }));

    expect(rendered).toEqual([{
      recipient: STUDENT_EMAIL,
      subject: "Meeting rescheduled: College list review",
      kind: "meeting_rescheduled",
      context: {
        student_email: STUDENT_EMAIL,
        counselor_meeting_id: "65f000000000000000000001",
        task_ids: [],
        start: "2026-09-10T16:00:00.000Z",
      },
    }]);
  });

  it("adds the parent when present", () => {
    const rendered = renderMeetingNotifications("meeting_cancelled", meeting, [], makeStudent());

    expect(rendered.map(n => [n.recipient, n.subject])).toEqual([
      [STUDENT_EMAIL, "Meeting cancelled: College list review"],
      [PARENT_EMAIL, "Meeting cancelled: College list review"],
    ]);
  });
});

describe("notificationBody", () => {
  it("lists the student, start and linked task count", () => {
    expect(notificationBody(payload)).toBe(
      `For ${STUDENT_EMAIL}\nStarts 2026-09-10T16:00:00.000Z\n1 task(s) linked to this meeting`,
    );
  });
});

describe("NtfyNotificationSender", () => {
  it("posts to the topic and records the delivery", async () => {
    const fetchMock = vi.fn(async () => new Response("ok", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);
    const records: NotificationRecord[] = [];
    const sender = new NtfyNotificationSender(
      { ntfyBaseUrl: "https://ntfy.test", ntfyTopic: "counseling-test" },
      async (record) => { records.push(record); },
    );

    await sender.send(payload);

    expect(fetchMock).toHaveBeenCalledWith("https://ntfy.test/counseling-test", {
      method: "POST",
      headers: { "Title": "Meeting scheduled: College list review", "X-Recipient": STUDENT_EMAIL },
      body: notificationBody(payload),
    });
    expect(records.map(r => [r.recipient, r.delivered])).toEqual([[STUDENT_EMAIL, true]]);
  });

  it("records a failed delivery and reports it", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("nope", { status: 500 })));
    const records: NotificationRecord[] = [];
    const sender = new NtfyNotificationSender(
      { ntfyBaseUrl: "https://ntfy.test", ntfyTopic: "counseling-test" },
      async (record) => { records.push(record); },
    );

    await expect(sender.send(payload)).rejects.toThrow("ntfy responded with 500");
    expect(records.map(r => r.delivered)).toEqual([false]);
  });

  it("records and reports an undelivered payload without a topic", async () => {
    const fetchMock = vi.fn(async () => new Response("ok", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);
    const records: NotificationRecord[] = [];
    const sender = new NtfyNotificationSender(
      { ntfyBaseUrl: "https://ntfy.test", ntfyTopic: null },
      async (record) => { records.push(record); },
    );

    await expect(sender.send(payload)).rejects.toThrow("NTFY_TOPIC not set");

    expect(fetchMock).not.toHaveBeenCalled();
    expect(records.map(r => r.delivered)).toEqual([false]);
  });
});

describe("deliverNotifications", () => {
  it("keeps going after a failed delivery", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const attempted: string[] = [];
    const sender = {
      async send(notification: NotificationPayload): Promise<void> {
        attempted.push(notification.recipient);
        if (notification.recipient === STUDENT_EMAIL) throw new Error("unreachable");
      },
    };

    const delivered = await deliverNotifications(sender, [payload, { ...payload, recipient: PARENT_EMAIL }]);

    expect(delivered).toBe(1);
    expect(attempted).toEqual([STUDENT_EMAIL, PARENT_EMAIL]);
  });
});
