import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, requireIdentity } from "./config.js";
import { NtfyNotificationSender } from "./notifications.js";
import { registerCounselorResources } from "./resources/index.js";
import { registerCounselorTools } from "./tools/counselor/index.js";

const COUNSELOR_INSTRUCTIONS = `COUNSELING — COUNSELOR TOOLS

You help a school counselor plan and run each student's college application work.
Everything is organized as meetings; each meeting has agenda items; each agenda item has
tasks for the student to do before or after the meeting.

WORKFLOW — Starting a student on a roadmap:
1. Read counselor://students to find the student.
2. Read counselor://roadmaps and pick a roadmap.
3. apply_roadmap — leave meetings or agenda items out with the selection argument,
   rename them, or add custom agenda items. Nothing is created if any part fails.
4. schedule_meeting for each meeting once a time is agreed.

WORKFLOW — During the year:
- update_task_status moves tasks between open, assigned and completed. Assigning or
  completing some tasks also updates the student's application tracker
  (counselor://students/{email}/tracker); reopening a task does not undo that.
- reschedule_meeting / cancel_meeting when plans change. The student and parent are notified.
- create_meeting, create_agenda_item, create_task for one-off work outside a roadmap.
- unapply_roadmap removes what a roadmap created that has not happened yet.

RESOURCES:
- counselor://students — your students
- counselor://students/{email}/meetings — meetings with agenda items
- counselor://students/{email}/tasks — tasks with status and due dates
- counselor://students/{email}/tracker — application tracker rows
- counselor://roadmaps — active roadmaps and their structure

RULES:
- You can only act on students assigned to you.
- A roadmap that is not repeatable cannot be applied twice unless policy is set.`;

const counselorEmail = requireIdentity("COUNSELOR_EMAIL");

const server = new McpServer(
  { name: "counseling-counselor", version: "1.0.0" },
  {
    capabilities: { logging: {} },
    instructions: COUNSELOR_INSTRUCTIONS,
  },
);

registerCounselorResources(server, counselorEmail);
registerCounselorTools(server, counselorEmail, new NtfyNotificationSender(loadConfig()));

const transport = new StdioServerTransport();
await server.connect(transport);
