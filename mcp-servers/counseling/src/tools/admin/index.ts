import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerCreateTaskTemplate } from "./createTaskTemplate.js";
import { registerCreateAgendaItemTemplate } from "./createAgendaItemTemplate.js";
import { registerCreateMeetingTemplate } from "./createMeetingTemplate.js";
import { registerCreateRoadmap } from "./createRoadmap.js";
import { registerCreateStudent } from "./createStudent.js";
import { registerCreateCounselor } from "./createCounselor.js";
import { registerAddTrackerSchool } from "./addTrackerSchool.js";

export function registerAdminTools(server: McpServer, adminEmail: string): void {
  registerCreateTaskTemplate(server, adminEmail);
  registerCreateAgendaItemTemplate(server, adminEmail);
  registerCreateMeetingTemplate(server, adminEmail);
  registerCreateRoadmap(server, adminEmail);
  registerCreateStudent(server, adminEmail);
  registerCreateCounselor(server, adminEmail);
  registerAddTrackerSchool(server, adminEmail);
}
