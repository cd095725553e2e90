import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { errorResult } from "../../errors.js";
import { cancelMeeting, rescheduleMeeting, scheduleMeeting } from "../../meetings/schedule.js";
import type { MeetingChange } from "../../meetings/schedule.js";
import type { NotificationSender } from "../../notifications.js";
import { getStore } from "../../store.js";
import { objectIdString, toObjectId } from "../../validation.js";
import { authorizeForMeeting } from "./access.js";

const scheduleInput = {
  meeting_id: objectIdString.describe("Counselor meeting id"),
  start: z.string().datetime({ offset: true }).describe("Start time (ISO 8601)"),
  end: z.string().datetime({ offset: true }).describe("End time (ISO 8601)"),
};

function summarize(verb: string, change: MeetingChange): string {
  const { meeting } = change;
  const when = meeting.start && meeting.end
    ? ` ${meeting.start.toISOString()} to ${meeting.end.toISOString()}`
    : "";
  return [
    `Meeting "${meeting.title}" ${verb}${when}.`,
    `Tasks due with the meeting: ${change.rescheduledTaskIds.length}.`,
    `Notifications: ${change.notifications.map(n => n.recipient).join(", ") || "none"}.`,
  ].join("\n");
}

export function registerScheduleMeeting(server: McpServer, counselorEmail: string, sender: NotificationSender): void {
  server.registerTool(
    "schedule_meeting",
    {
      title: "Schedule Meeting",
      description: "Set the time of an unscheduled meeting. Its tasks without a due date become due at the start. The student and parent are notified.",
      inputSchema: scheduleInput,
    },
    async ({ meeting_id, start, end }) => {
      try {
        const meetingId = toObjectId(meeting_id, "Meeting id");
        await authorizeForMeeting(getStore(), counselorEmail, "schedule_meeting", meetingId);
        const change = await scheduleMeeting(getStore(), sender, { meetingId, start: new Date(start), end: new Date(end) });
        return { content: [{ type: "text", text: summarize("scheduled", change) }] };
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}

export function registerRescheduleMeeting(server: McpServer, counselorEmail: string, sender: NotificationSender): void {
  server.registerTool(
    "reschedule_meeting",
    {
      title: "Reschedule Meeting",
      description: "Move a scheduled meeting. Tasks due at the old start move with it. The student and parent are notified.",
      inputSchema: scheduleInput,
    },
    async ({ meeting_id, start, end }) => {
      try {
        const meetingId = toObjectId(meeting_id, "Meeting id");
        await authorizeForMeeting(getStore(), counselorEmail, "reschedule_meeting", meetingId);
        const change = await rescheduleMeeting(getStore(), sender, { meetingId, start: new Date(start), end: new Date(end) });
        return { content: [{ type: "text", text: summarize("rescheduled", change) }] };
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}

export function registerCancelMeeting(server: McpServer, counselorEmail: string, sender: NotificationSender): void {
  server.registerTool(
    "cancel_meeting",
    {
      title: "Cancel Meeting",
      description: "Cancel a meeting. Its agenda items and tasks are kept. The student and parent are notified.",
      inputSchema: {
        meeting_id: objectIdString.describe("Counselor meeting id"),
      },
    },
    async ({ meeting_id }) => {
      try {
        const meetingId = toObjectId(meeting_id, "Meeting id");
        await authorizeForMeeting(getStore(), counselorEmail, "cancel_meeting", meetingId);
        const change = await cancelMeeting(getStore(), sender, { meetingId });
        return { content: [{ type: "text", text: summarize("cancelled", change) }] };
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}
