import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { authorize } from "../auth.js";
import { students, tasks } from "../db.js";
import { getStore } from "../store.js";
import { errorContents, templateParam } from "./params.js";

async function denied(uri: URL, counselorEmail: string, action: string, studentEmail: string) {
  try {
    await authorize(counselorEmail, action, studentEmail);
    return null;
  } catch (err) {
    return errorContents(uri, err);
  }
}

export function registerCounselorStudents(server: McpServer, counselorEmail: string): void {
  // Students assigned to this counselor
  server.registerResource(
    "counselor_students_list",
    "counselor://students",
    {
      title: "My Students",
      description: "Students assigned to this counselor, with open task counts.",
      mimeType: "application/json",
    },
    async (uri) => {
      const studentDocs = await (await students()).find({ counselor_email: counselorEmail }).sort({ name: 1 }).toArray();
      const taskCol = await tasks();

      const summaries = await Promise.all(studentDocs.map(async s => ({
        email: s.email,
        name: s.name,
        graduation_year: s.graduation_year,
        parent_email: s.parent_email,
        applied_roadmap_ids: s.applied_roadmap_ids,
        open_tasks: await taskCol.countDocuments({ student_email: s.email, status: { $ne: "completed" } }),
      })));

      return { contents: [{ uri: uri.href, text: JSON.stringify(summaries) }] };
    },
  );

  server.registerResource(
    "counselor_student_meetings",
    new ResourceTemplate("counselor://students/{email}/meetings", { list: undefined }),
    {
      title: "Student Meetings",
      description: "A student's meetings with their agenda items, unscheduled meetings last.",
      mimeType: "application/json",
    },
    async (uri, params) => {
      let email: string;
      try {
        email = templateParam(params.email);
      } catch (err) {
        return errorContents(uri, err);
      }
      const refusal = await denied(uri, counselorEmail, "view_meetings", email);
      if (refusal) return refusal;

      const store = getStore();
      const meetings = await store.findMeetings({ student_email: email });
      const items = await store.findAgendaItems(meetings.map(m => m._id));
      const sorted = [...meetings].sort((a, b) =>
        (a.start?.getTime() ?? Number.MAX_SAFE_INTEGER) - (b.start?.getTime() ?? Number.MAX_SAFE_INTEGER));

      const detail = sorted.map(m => ({
        ...m,
        agenda_items: items.filter(item => item.counselor_meeting_id.equals(m._id)),
      }));
      return { contents: [{ uri: uri.href, text: JSON.stringify(detail) }] };
    },
  );

  server.registerResource(
    "counselor_student_tasks",
    new ResourceTemplate("counselor://students/{email}/tasks", { list: undefined }),
    {
      title: "Student Tasks",
      description: "All of a student's tasks with status and due dates.",
      mimeType: "application/json",
    },
    async (uri, params) => {
      let email: string;
      try {
        email = templateParam(params.email);
      } catch (err) {
        return errorContents(uri, err);
      }
      const refusal = await denied(uri, counselorEmail, "view_tasks", email);
      if (refusal) return refusal;

      const taskDocs = await (await tasks()).find({ student_email: email }).sort({ due: 1, created_at: 1 }).toArray();
      return { contents: [{ uri: uri.href, text: JSON.stringify(taskDocs) }] };
    },
  );

  server.registerResource(
    "counselor_student_tracker",
    new ResourceTemplate("counselor://students/{email}/tracker", { list: undefined }),
    {
      title: "Application Tracker",
      description: "A student's schools with application and requirement statuses.",
      mimeType: "application/json",
    },
    async (uri, params) => {
      let email: string;
      try {
        email = templateParam(params.email);
      } catch (err) {
        return errorContents(uri, err);
      }
      const refusal = await denied(uri, counselorEmail, "view_tracker", email);
      if (refusal) return refusal;

      const rows = await getStore().findStudentUniversityDecisions(email);
      const clean = rows.map(({ _id, student_email, ...row }) => row);
      return { contents: [{ uri: uri.href, text: JSON.stringify(clean) }] };
    },
  );
}
