import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { requireIdentity } from "./config.js";
import { registerAdminResources } from "./resources/index.js";
import { registerAdminTools } from "./tools/admin/index.js";

const ADMIN_INSTRUCTIONS = `COUNSELING ADMIN — CONFIGURATION TOOLS

You have access to admin tools for setting up roadmaps, students and counselors.

WORKFLOW — Building a roadmap (bottom up):
1. create_task_template — one per task; optionally the tracker fields it sets
   when assigned or completed (on_assign_sud_update / on_complete_sud_update) and
   which tracker rows it applies to (include_school_sud_values)
2. create_agenda_item_template — lists task templates before and after the meeting
3. create_meeting_template — lists agenda item templates
4. create_roadmap — lists meeting templates in order

WORKFLOW — Setting up people:
1. create_counselor
2. create_student — with counselor_email and parent_email
3. add_tracker_school — one row per school on the student's list

RESOURCES:
- admin://roadmaps — all roadmaps
- admin://roadmaps/{id} — full template tree of one roadmap

RULES:
- Only superuser and admin roles can use these tools.
- Tracker mappings are validated when a template is created; a stored mapping that no
  longer parses is reported in the server log when a task using it changes status.`;

const server = new McpServer(
  { name: "counseling-admin", version: "1.0.0" },
  {
    capabilities: { logging: {} },
    instructions: ADMIN_INSTRUCTIONS,
  },
);

const adminEmail = requireIdentity("ADMIN_EMAIL");

registerAdminResources(server);

// Auth is enforced per call, so a fresh database holding only a superuser can still
// create the first counselor and student.
registerAdminTools(server, adminEmail);

const transport = new StdioServerTransport();
await server.connect(transport);
