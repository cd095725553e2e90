import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ObjectId } from "mongodb";
import { z } from "zod";
import { authorize } from "../../auth.js";
import { agendaItemTemplates } from "../../db.js";
import { errorResult } from "../../errors.js";
import { getStore } from "../../store.js";
import { objectIdString } from "../../validation.js";
import { resolveReferences } from "./references.js";

export function registerCreateAgendaItemTemplate(server: McpServer, adminEmail: string): void {
  server.registerTool(
    "create_agenda_item_template",
    {
      title: "Create Agenda Item Template",
      description: "Define a reusable agenda item and the task templates done before and after it.",
      inputSchema: {
        key: z.string().min(1).describe("Unique key"),
        title: z.string().min(1).describe("Agenda item title"),
        description: z.string().optional().describe("Agenda item details"),
        order: z.number().int().default(0).describe("Position within a meeting (lower first)"),
        active: z.boolean().default(true).describe("Inactive items are left out when roadmaps are applied"),
        pre_meeting_task_template_ids: z.array(objectIdString).default([]).describe("Tasks to do before the meeting"),
        post_meeting_task_template_ids: z.array(objectIdString).default([]).describe("Tasks to do after the meeting"),
      },
    },
    async (input) => {
      try {
        await authorize(adminEmail, "create_agenda_item_template");
        const col = await agendaItemTemplates();
        if (await col.findOne({ key: input.key })) {
          return { content: [{ type: "text", text: `Error: Agenda item template with key ${input.key} already exists.` }] };
        }

        const store = getStore();
        const loadTaskTemplates = (ids: ObjectId[]) => store.getTaskTemplates(ids);
        const pre = await resolveReferences(input.pre_meeting_task_template_ids, loadTaskTemplates, "Task template");
        const post = await resolveReferences(input.post_meeting_task_template_ids, loadTaskTemplates, "Task template");

        const now = new Date();
        const _id = new ObjectId();
        await col.insertOne({
          _id,
          key: input.key,
          title: input.title,
          description: input.description ?? "",
          order: input.order,
          active: input.active,
          pre_meeting_task_template_ids: pre,
          post_meeting_task_template_ids: post,
          created_at: now,
          updated_at: now,
        });
        return {
          content: [{
            type: "text",
            text: `Agenda item template "${input.title}" created (${_id.toHexString()}) with ${pre.length} pre-meeting and ${post.length} post-meeting tasks.`,
          }],
        };
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}
