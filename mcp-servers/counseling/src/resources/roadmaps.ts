import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ObjectId } from "mongodb";
import { roadmaps } from "../db.js";
import { getStore } from "../store.js";
import type { CounselingReader } from "../store.js";
import type { RoadmapDocument } from "../types.js";
import { byOrder } from "../validation.js";
import { errorContents, templateParam } from "./params.js";

/** Roadmap → meeting templates → agenda item templates → task templates, in application order. */
export async function roadmapTree(reader: CounselingReader, roadmap: RoadmapDocument) {
  const meetingTemplates = byOrder(
    await reader.getMeetingTemplates(roadmap.counselor_meeting_template_ids),
    roadmap.counselor_meeting_template_ids,
  );
  const agendaItemTemplates = await reader.getAgendaItemTemplates(
    meetingTemplates.flatMap(t => t.agenda_item_template_ids),
  );
  const taskTemplates = await reader.getTaskTemplates(agendaItemTemplates.flatMap(t => [
    ...t.pre_meeting_task_template_ids,
    ...t.post_meeting_task_template_ids,
  ]));
  const taskTemplate = new Map(taskTemplates.map(t => [t._id.toHexString(), t]));
  const pick = (ids: ObjectId[]) => ids.flatMap(id => taskTemplate.get(id.toHexString()) ?? []);

  return {
    ...roadmap,
    meetings: meetingTemplates.map(meeting => ({
      ...meeting,
      agenda_items: byOrder(
        agendaItemTemplates.filter(item => meeting.agenda_item_template_ids.some(id => id.equals(item._id))),
        meeting.agenda_item_template_ids,
      ).map(item => ({
        ...item,
        pre_meeting_tasks: pick(item.pre_meeting_task_template_ids),
        post_meeting_tasks: pick(item.post_meeting_task_template_ids),
      })),
    })),
  };
}

export function registerCounselorRoadmaps(server: McpServer): void {
  server.registerResource(
    "counselor_roadmaps",
    "counselor://roadmaps",
    {
      title: "Roadmaps",
      description: "Active roadmaps with their meetings and agenda items, for choosing what to apply.",
      mimeType: "application/json",
    },
    async (uri) => {
      const docs = await (await roadmaps()).find({ active: true }).sort({ title: 1 }).toArray();
      const store = getStore();
      const trees = await Promise.all(docs.map(doc => roadmapTree(store, doc)));
      return { contents: [{ uri: uri.href, text: JSON.stringify(trees) }] };
    },
  );
}

export function registerAdminRoadmaps(server: McpServer): void {
  server.registerResource(
    "admin_roadmaps_list",
    "admin://roadmaps",
    {
      title: "All Roadmaps",
      description: "Every roadmap, active or not, with its meeting template ids.",
      mimeType: "application/json",
    },
    async (uri) => {
      const docs = await (await roadmaps()).find({}).sort({ title: 1 }).toArray();
      return { contents: [{ uri: uri.href, text: JSON.stringify(docs) }] };
    },
  );

  server.registerResource(
    "admin_roadmap_detail",
    new ResourceTemplate("admin://roadmaps/{id}", { list: undefined }),
    {
      title: "Roadmap Detail",
      description: "Full template tree of one roadmap, including tracker mappings on each task template.",
      mimeType: "application/json",
    },
    async (uri, params) => {
      let id: string;
      try {
        id = templateParam(params.id);
      } catch (err) {
        return errorContents(uri, err);
      }
      if (!ObjectId.isValid(id)) {
        return { contents: [{ uri: uri.href, text: JSON.stringify({ error: "Invalid roadmap id" }) }] };
      }
      const store = getStore();
      const roadmap = await store.getRoadmap(new ObjectId(id));
      if (!roadmap) {
        return { contents: [{ uri: uri.href, text: JSON.stringify({ error: "Roadmap not found" }) }] };
      }
      return { contents: [{ uri: uri.href, text: JSON.stringify(await roadmapTree(store, roadmap)) }] };
    },
  );
}
