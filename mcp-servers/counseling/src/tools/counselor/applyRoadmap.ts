import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { authorize } from "../../auth.js";
import { DUPLICATE_POLICIES } from "../../constants.js";
import { errorResult } from "../../errors.js";
import { applyRoadmap } from "../../roadmap/apply.js";
import { roadmapSelectionSchema } from "../../roadmap/selection.js";
import { getStore } from "../../store.js";
import { objectIdString, toObjectId } from "../../validation.js";

export function registerApplyRoadmap(server: McpServer, counselorEmail: string): void {
  server.registerTool(
    "apply_roadmap",
    {
      title: "Apply Roadmap",
      description: "Create a student's meetings, agenda items and tasks from a roadmap. Everything is created together or not at all.",
      inputSchema: {
        roadmap_id: objectIdString.describe("Roadmap to apply"),
        student_email: z.string().email().describe("Student the roadmap is for"),
        selection: roadmapSelectionSchema.optional().describe(
          "Per meeting template id: false to leave it out, or { include, title, agenda_items, custom_agenda_items }. "
          + "agenda_items is keyed by agenda item template id: false, or { include, title, description }.",
        ),
        policy: z.enum(DUPLICATE_POLICIES).optional().describe(
          "When the student already has meetings from these templates: reject, skip_existing or allow. "
          + "Defaults to allow for repeatable roadmaps, otherwise reject.",
        ),
      },
    },
    async ({ roadmap_id, student_email, selection, policy }) => {
      try {
        await authorize(counselorEmail, "apply_roadmap", student_email);
        const result = await applyRoadmap(getStore(), {
          roadmapId: toObjectId(roadmap_id, "Roadmap id"),
          studentEmail: student_email,
          counselorEmail,
          selection,
          policy,
        });

        const lines = [
          `Roadmap applied to ${student_email}: ${result.meetings.length} meetings, ${result.agendaItems.length} agenda items, ${result.tasks.length} tasks.`,
          ...result.meetings.map(m => `- ${m.title} (${m._id.toHexString()})`),
        ];
        if (result.skippedMeetingTemplateIds.length > 0) {
          lines.push(`Skipped ${result.skippedMeetingTemplateIds.length} meeting(s) the student already has.`);
        }
        return { content: [{ type: "text", text: lines.join("\n") }] };
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}
