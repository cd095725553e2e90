import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { authorize } from "../../auth.js";
import { errorResult, NotFoundError } from "../../errors.js";
import { getStore } from "../../store.js";
import { changeTaskStatus } from "../../tracker/taskStatus.js";
import { objectIdString, toObjectId } from "../../validation.js";

export function registerUpdateTaskStatus(server: McpServer, counselorEmail: string): void {
  server.registerTool(
    "update_task_status",
    {
      title: "Update Task Status",
      description: "Move one or more tasks to open, assigned or completed. Assigning or completing a task "
        + "updates the student's application tracker as its template declares. All tasks change or none do.",
      inputSchema: {
        task_ids: z.array(objectIdString).min(1).describe("Tasks to update"),
        status: z.enum(["open", "assigned", "completed"]).describe("New status"),
      },
    },
    async ({ task_ids, status }) => {
      try {
        const store = getStore();
        const taskIds = task_ids.map(id => toObjectId(id, "Task id"));
        for (const taskId of taskIds) {
          const task = await store.getTask(taskId);
          if (!task) throw new NotFoundError("Task", taskId.toHexString());
          await authorize(counselorEmail, "update_task_status", task.student_email);
        }

        const changes = await changeTaskStatus(store, { taskIds, status });
        const lines = changes.map(c =>
          `- ${c.task_id}: ${c.from} → ${c.to}${c.tracker_rows_updated > 0 ? ` (${c.tracker_rows_updated} tracker rows updated)` : ""}`);
        return { content: [{ type: "text", text: [`Updated ${changes.length} task(s):`, ...lines].join("\n") }] };
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}
