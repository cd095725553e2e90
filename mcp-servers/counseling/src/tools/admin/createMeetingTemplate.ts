import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ObjectId } from "mongodb";
import { z } from "zod";
import { authorize } from "../../auth.js";
import { counselorMeetingTemplates } from "../../db.js";
import { errorResult } from "../../errors.js";
import { getStore } from "../../store.js";
import { objectIdString } from "../../validation.js";
import { resolveReferences } from "./references.js";

export function registerCreateMeetingTemplate(server: McpServer, adminEmail: string): void {
  server.registerTool(
    "create_meeting_template",
    {
      title: "Create Meeting Template",
      description: "Define a reusable counselor meeting and its agenda item templates.",
      inputSchema: {
        key: z.string().min(1).describe("Unique key"),
        title: z.string().min(1).describe("Meeting title"),
        order: z.number().int().default(0).describe("Position within a roadmap (lower first)"),
        description: z.string().optional().describe("Meeting description"),
        counselor_instructions: z.string().optional().describe("Notes for the counselor"),
        student_instructions: z.string().optional().describe("Notes for the student"),
        duration_minutes: z.number().int().positive().optional().describe("Planned length"),
        agenda_item_template_ids: z.array(objectIdString).default([]).describe("Agenda item templates, in order"),
      },
    },
    async (input) => {
      try {
        await authorize(adminEmail, "create_meeting_template");
        const col = await counselorMeetingTemplates();
        if (await col.findOne({ key: input.key })) {
          return { content: [{ type: "text", text: `Error: Meeting template with key ${input.key} already exists.` }] };
        }

        const store = getStore();
        const agendaItemTemplateIds = await resolveReferences(
          input.agenda_item_template_ids,
          ids => store.getAgendaItemTemplates(ids),
          "Agenda item template",
        );

        const now = new Date();
        const _id = new ObjectId();
        await col.insertOne({
          _id,
          key: input.key,
          title: input.title,
          order: input.order,
          description: input.description ?? "",
          counselor_instructions: input.counselor_instructions ?? "",
          student_instructions: input.student_instructions ?? "",
          duration_minutes: input.duration_minutes ?? null,
          agenda_item_template_ids: agendaItemTemplateIds,
          created_at: now,
          updated_at: now,
        });
        return { content: [{ type: "text", text: `Meeting template "${input.title}" created (${_id.toHexString()}).` }] };
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}
