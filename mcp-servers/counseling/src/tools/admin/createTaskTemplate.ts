import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ObjectId } from "mongodb";
import { z } from "zod";
import { authorize } from "../../auth.js";
import { TASK_TYPES } from "../../constants.js";
import { taskTemplates } from "../../db.js";
import { errorResult } from "../../errors.js";
import { schoolTrackerFilterSchema, trackerUpdateSchema } from "../../tracker/config.js";

export function registerCreateTaskTemplate(server: McpServer, adminEmail: string): void {
  server.registerTool(
    "create_task_template",
    {
      title: "Create Task Template",
      description: "Define a reusable task, including how completing or assigning it updates the student's application tracker.",
      inputSchema: {
        key: z.string().min(1).describe("Unique key, e.g. request_transcript"),
        title: z.string().min(1).describe("Task title shown to the student"),
        description: z.string().optional().describe("Task instructions"),
        task_type: z.enum(TASK_TYPES).describe("Kind of task"),
        timing: z.enum(["pre_meeting", "post_meeting"]).describe("Done before or after its meeting"),
        include_school_sud_values: schoolTrackerFilterSchema.optional().describe(
          "Tracker rows this task concerns, e.g. { is_applying: \"YES\", transcript_status: \"required\" }",
        ),
        on_assign_sud_update: trackerUpdateSchema.optional().describe("Tracker fields to set when the task is assigned"),
        on_complete_sud_update: trackerUpdateSchema.optional().describe("Tracker fields to set when the task is completed"),
        only_alter_tracker_values: z.array(z.string()).optional().describe(
          "Only change tracker fields whose current value is one of these",
        ),
      },
    },
    async (input) => {
      try {
        await authorize(adminEmail, "create_task_template");
        const col = await taskTemplates();
        if (await col.findOne({ key: input.key })) {
          return { content: [{ type: "text", text: `Error: Task template with key ${input.key} already exists.` }] };
        }

        const now = new Date();
        const _id = new ObjectId();
        await col.insertOne({
          _id,
          key: input.key,
          title: input.title,
          description: input.description ?? "",
          task_type: input.task_type,
          timing: input.timing,
          include_school_sud_values: input.include_school_sud_values,
          on_assign_sud_update: input.on_assign_sud_update,
          on_complete_sud_update: input.on_complete_sud_update,
          only_alter_tracker_values: input.only_alter_tracker_values ?? [],
          archived: null,
          created_at: now,
          updated_at: now,
        });
        return { content: [{ type: "text", text: `Task template "${input.title}" created (${_id.toHexString()}).` }] };
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}
