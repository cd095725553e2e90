import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ObjectId } from "mongodb";
import { z } from "zod";
import { authorize } from "../../auth.js";
import { roadmaps } from "../../db.js";
import { errorResult } from "../../errors.js";
import { getStore } from "../../store.js";
import { objectIdString } from "../../validation.js";
import { resolveReferences } from "./references.js";

export function registerCreateRoadmap(server: McpServer, adminEmail: string): void {
  server.registerTool(
    "create_roadmap",
    {
      title: "Create Roadmap",
      description: "Bundle meeting templates into a roadmap counselors can apply to students.",
      inputSchema: {
        title: z.string().min(1).describe("Roadmap title"),
        description: z.string().optional().describe("Who the roadmap is for"),
        active: z.boolean().default(true).describe("Only active roadmaps can be applied"),
        repeatable: z.boolean().default(false).describe("Whether applying it twice to a student is allowed by default"),
        counselor_meeting_template_ids: z.array(objectIdString).min(1).describe("Meeting templates, in order"),
      },
    },
    async (input) => {
      try {
        await authorize(adminEmail, "create_roadmap");
        const store = getStore();
        const meetingTemplateIds = await resolveReferences(
          input.counselor_meeting_template_ids,
          ids => store.getMeetingTemplates(ids),
          "Counselor meeting template",
        );

        const now = new Date();
        const _id = new ObjectId();
        await (await roadmaps()).insertOne({
          _id,
          title: input.title,
          description: input.description ?? "",
          active: input.active,
          repeatable: input.repeatable,
          counselor_meeting_template_ids: meetingTemplateIds,
          created_at: now,
          updated_at: now,
        });
        return {
          content: [{
            type: "text",
            text: `Roadmap "${input.title}" created (${_id.toHexString()}) with ${meetingTemplateIds.length} meetings.`,
          }],
        };
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}
