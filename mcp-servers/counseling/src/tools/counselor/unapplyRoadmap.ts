import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { authorize } from "../../auth.js";
import { errorResult } from "../../errors.js";
import { unapplyRoadmap } from "../../roadmap/unapply.js";
import { getStore } from "../../store.js";
import { objectIdString, toObjectId } from "../../validation.js";

export function registerUnapplyRoadmap(server: McpServer, counselorEmail: string): void {
  server.registerTool(
    "unapply_roadmap",
    {
      title: "Unapply Roadmap",
      description: "Remove a roadmap from a student. Past meetings and completed tasks are kept.",
      inputSchema: {
        roadmap_id: objectIdString.describe("Roadmap to remove"),
        student_email: z.string().email().describe("Student the roadmap was applied to"),
      },
    },
    async ({ roadmap_id, student_email }) => {
      try {
        await authorize(counselorEmail, "unapply_roadmap", student_email);
        const removal = await unapplyRoadmap(getStore(), {
          roadmapId: toObjectId(roadmap_id, "Roadmap id"),
          studentEmail: student_email,
        });
        return {
          content: [{
            type: "text",
            text: `Roadmap removed from ${student_email}: deleted ${removal.deletedMeetings} meetings, ${removal.deletedAgendaItems} agenda items, ${removal.deletedTasks} tasks.`,
          }],
        };
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}
