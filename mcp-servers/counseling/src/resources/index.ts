import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerCounselorStudents } from "./counselorStudents.js";
import { registerCounselorRoadmaps, registerAdminRoadmaps } from "./roadmaps.js";

export function registerCounselorResources(server: McpServer, counselorEmail: string): void {
  registerCounselorStudents(server, counselorEmail);
  registerCounselorRoadmaps(server);
}

export function registerAdminResources(server: McpServer): void {
  registerAdminRoadmaps(server);
}
