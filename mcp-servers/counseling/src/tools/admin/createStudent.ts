import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { authorize } from "../../auth.js";
import { users, students, counselors } from "../../db.js";
import { errorResult } from "../../errors.js";

export function registerCreateStudent(server: McpServer, adminEmail: string): void {
  server.registerTool(
    "create_student",
    {
      title: "Create Student",
      description: "Create a student profile and user, and a parent user when a parent email is given.",
      inputSchema: {
        email: z.string().email().describe("Student's email address"),
        name: z.string().min(1).describe("Student's full name"),
        graduation_year: z.number().int().min(2000).max(2100).optional().describe("High school graduation year"),
        counselor_email: z.string().email().optional().describe("Assigned counselor"),
        parent_email: z.string().email().optional().describe("Parent/guardian email"),
      },
    },
    async ({ email, name, graduation_year, counselor_email, parent_email }) => {
      try {
        await authorize(adminEmail, "create_student");
        const studentsCol = await students();
        const usersCol = await users();

        const existing = await studentsCol.findOne({ email });
        if (existing) {
          return { content: [{ type: "text", text: `Error: Student with email ${email} already exists.` }] };
        }
        if (counselor_email && !(await (await counselors()).findOne({ email: counselor_email }))) {
          return { content: [{ type: "text", text: `Error: Counselor ${counselor_email} not found.` }] };
        }

        const now = new Date();

        await usersCol.updateOne(
          { email },
          {
            $set: { updated_at: now },
            $addToSet: { roles: { type: "student" as const } },
            $setOnInsert: { email, created_at: now },
          },
          { upsert: true },
        );

        if (parent_email) {
          await usersCol.updateOne(
            { email: parent_email },
            {
              $set: { updated_at: now },
              $addToSet: { roles: { type: "parent" as const, student_emails: [email] } },
              $setOnInsert: { email: parent_email, created_at: now },
            },
            { upsert: true },
          );
        }

        await studentsCol.insertOne({
          email,
          name,
          graduation_year: graduation_year ?? null,
          counselor_email: counselor_email ?? null,
          parent_email: parent_email ?? null,
          applied_roadmap_ids: [],
          created_at: now,
          updated_at: now,
        });

        return {
          content: [{
            type: "text",
            text: `Student "${name}" (${email}) created.${counselor_email ? ` Counselor: ${counselor_email}.` : ""}${parent_email ? ` Parent: ${parent_email}.` : ""}`,
          }],
        };
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}
