import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { errorResult } from "../../errors.js";
import { createCustomAgendaItem } from "../../meetings/custom.js";
import { getStore } from "../../store.js";
import { objectIdString, toObjectId } from "../../validation.js";
import { authorizeForMeeting } from "./access.js";

export function registerCreateAgendaItem(server: McpServer, counselorEmail: string): void {
  server.registerTool(
    "create_agenda_item",
    {
      title: "Create Agenda Item",
      description: "Add an agenda item to the end of a meeting's agenda.",
      inputSchema: {
        meeting_id: objectIdString.describe("Counselor meeting id"),
        title: z.string().min(1).describe("Agenda item title"),
        description: z.string().optional().describe("Agenda item details"),
      },
    },
    async ({ meeting_id, title, description }) => {
      try {
        const meetingId = toObjectId(meeting_id, "Meeting id");
        await authorizeForMeeting(getStore(), counselorEmail, "create_agenda_item", meetingId);
        const item = await createCustomAgendaItem(getStore(), { meetingId, title, description });
        return {
          content: [{ type: "text", text: `Agenda item "${item.title}" added at position ${item.order} (${item._id.toHexString()}).` }],
        };
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}
