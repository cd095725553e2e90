import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { NotificationSender } from "../../notifications.js";
import { registerApplyRoadmap } from "./applyRoadmap.js";
import { registerUnapplyRoadmap } from "./unapplyRoadmap.js";
import { registerUpdateTaskStatus } from "./updateTaskStatus.js";
import { registerScheduleMeeting, registerRescheduleMeeting, registerCancelMeeting } from "./scheduleMeeting.js";
import { registerCreateMeeting } from "./createMeeting.js";
import { registerCreateAgendaItem } from "./createAgendaItem.js";
import { registerCreateTask } from "./createTask.js";

export function registerCounselorTools(server: McpServer, counselorEmail: string, sender: NotificationSender): void {
  registerApplyRoadmap(server, counselorEmail);
  registerUnapplyRoadmap(server, counselorEmail);
  registerUpdateTaskStatus(server, counselorEmail);
  registerScheduleMeeting(server, counselorEmail, sender);
  registerRescheduleMeeting(server, counselorEmail, sender);
  registerCancelMeeting(server, counselorEmail, sender);
  registerCreateMeeting(server, counselorEmail);
  registerCreateAgendaItem(server, counselorEmail);
  registerCreateTask(server, counselorEmail);
}
