import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { authorize } from "../../auth.js";
import { errorResult } from "../../errors.js";
import { createCustomTask } from "../../meetings/custom.js";
import { getStore } from "../../store.js";
import { objectIdString, toObjectId } from "../../validation.js";

export function registerCreateTask(server: McpServer, counselorEmail: string): void {
  server.registerTool(
    "create_task",
    {
      title: "Create Task",
      description: "Create a one-off task for a student, optionally on one of their agenda items.",
      inputSchema: {
        student_email: z.string().email().describe("Student the task is for"),
        title: z.string().min(1).describe("Task title"),
        description: z.string().optional().describe("Task details"),
        agenda_item_id: objectIdString.optional().describe("Agenda item to attach the task to"),
        timing: z.enum(["pre_meeting", "post_meeting"]).optional().describe("Before or after the meeting (default pre_meeting)"),
        school_ids: z.array(z.number().int()).optional().describe("Tracker schools this task concerns"),
        due: z.string().datetime({ offset: true }).optional().describe("Due date (ISO 8601)"),
      },
    },
    async ({ student_email, title, description, agenda_item_id, timing, school_ids, due }) => {
      try {
        await authorize(counselorEmail, "create_task", student_email);
        const task = await createCustomTask(getStore(), {
          studentEmail: student_email,
          createdBy: counselorEmail,
          title,
          description,
          agendaItemId: agenda_item_id ? toObjectId(agenda_item_id, "Agenda item id") : undefined,
          timing,
          schoolIds: school_ids,
          due: due ? new Date(due) : undefined,
        });
        return { content: [{ type: "text", text: `Task "${task.title}" created for ${student_email} (${task._id.toHexString()}).` }] };
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}
