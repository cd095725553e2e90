import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { authorize } from "../../auth.js";
import { users, counselors } from "../../db.js";
import { errorResult } from "../../errors.js";

export function registerCreateCounselor(server: McpServer, adminEmail: string): void {
  server.registerTool(
    "create_counselor",
    {
      title: "Create Counselor",
      description: "Create a counselor profile and user.",
      inputSchema: {
        email: z.string().email().describe("Counselor's email address"),
        name: z.string().min(1).describe("Counselor's full name"),
        cc_on_meeting_notes: z.boolean().default(false).describe("Copy the counselor on meeting notes"),
      },
    },
    async ({ email, name, cc_on_meeting_notes }) => {
      try {
        await authorize(adminEmail, "create_counselor");
        const col = await counselors();
        if (await col.findOne({ email })) {
          return { content: [{ type: "text", text: `Error: Counselor with email ${email} already exists.` }] };
        }

        const now = new Date();
        await (await users()).updateOne(
          { email },
          {
            $set: { updated_at: now },
            $addToSet: { roles: { type: "counselor" as const } },
            $setOnInsert: { email, created_at: now },
          },
          { upsert: true },
        );
        await col.insertOne({ email, name, cc_on_meeting_notes, created_at: now, updated_at: now });

        return { content: [{ type: "text", text: `Counselor "${name}" (${email}) created.` }] };
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}
