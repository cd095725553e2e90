import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ObjectId } from "mongodb";
import { z } from "zod";
import { authorize } from "../../auth.js";
import {
  APPLICATION_PLATFORMS, APPLICATION_STATUSES, IS_APPLYING_VALUES, REQUIREMENT_TRACKER_STATUSES,
} from "../../constants.js";
import { students, studentUniversityDecisions } from "../../db.js";
import { errorResult } from "../../errors.js";

const requirementStatus = z.enum(REQUIREMENT_TRACKER_STATUSES).default("");

export function registerAddTrackerSchool(server: McpServer, adminEmail: string): void {
  server.registerTool(
    "add_tracker_school",
    {
      title: "Add Tracker School",
      description: "Add a school to a student's application tracker.",
      inputSchema: {
        student_email: z.string().email().describe("Student's email address"),
        school_id: z.number().int().describe("School id"),
        school_name: z.string().min(1).describe("School name"),
        is_applying: z.enum(IS_APPLYING_VALUES).default("MAYBE").describe("Whether the student is applying"),
        application: z.enum(APPLICATION_PLATFORMS).default("").describe("Application platform"),
        application_status: z.enum(APPLICATION_STATUSES).default("n_a").describe("Application status"),
        transcript_status: requirementStatus.describe("Transcript requirement status"),
        test_scores_status: requirementStatus.describe("Test scores requirement status"),
        recommendation_one_status: requirementStatus.describe("First recommendation status"),
        recommendation_two_status: requirementStatus.describe("Second recommendation status"),
        recommendation_three_status: requirementStatus.describe("Third recommendation status"),
        recommendation_four_status: requirementStatus.describe("Fourth recommendation status"),
      },
    },
    async (input) => {
      try {
        await authorize(adminEmail, "add_tracker_school");
        if (!(await (await students()).findOne({ email: input.student_email }))) {
          return { content: [{ type: "text", text: `Error: Student ${input.student_email} not found.` }] };
        }

        const col = await studentUniversityDecisions();
        if (await col.findOne({ student_email: input.student_email, school_id: input.school_id })) {
          return {
            content: [{ type: "text", text: `Error: ${input.school_name} is already on ${input.student_email}'s tracker.` }],
          };
        }

        const now = new Date();
        await col.insertOne({ _id: new ObjectId(), ...input, created_at: now, updated_at: now });
        return { content: [{ type: "text", text: `${input.school_name} (${input.school_id}) added to ${input.student_email}'s tracker.` }] };
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}
