import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { authorize } from "../../auth.js";
import { errorResult } from "../../errors.js";
import { createCustomMeeting } from "../../meetings/custom.js";
import { getStore } from "../../store.js";

export function registerCreateMeeting(server: McpServer, counselorEmail: string): void {
  server.registerTool(
    "create_meeting",
    {
      title: "Create Meeting",
      description: "Create a one-off meeting for a student, outside any roadmap. Schedule it afterwards with schedule_meeting.",
      inputSchema: {
        student_email: z.string().email().describe("Student the meeting is with"),
        title: z.string().min(1).describe("Meeting title"),
        description: z.string().optional().describe("What the meeting is for"),
      },
    },
    async ({ student_email, title, description }) => {
      try {
        await authorize(counselorEmail, "create_meeting", student_email);
        const meeting = await createCustomMeeting(getStore(), {
          studentEmail: student_email,
          counselorEmail,
          title,
          description,
        });
        return { content: [{ type: "text", text: `Meeting "${meeting.title}" created (${meeting._id.toHexString()}).` }] };
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}
