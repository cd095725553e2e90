import { z } from "zod";
import { ValidationError } from "../errors.js";
import type { AgendaItemTemplateDocument, CounselorMeetingTemplateDocument } from "../types.js";
import { byOrder } from "../validation.js";

const agendaItemChoiceSchema = z.union([
  z.boolean(),
  z.object({
    include: z.boolean().optional(),
    title: z.string().min(1).optional(),
    description: z.string().optional(),
  }).strict(),
]);

const meetingChoiceSchema = z.union([
  z.boolean(),
  z.object({
    include: z.boolean().optional(),
    title: z.string().min(1).optional(),
    agenda_items: z.record(z.string(), agendaItemChoiceSchema).optional(),
    custom_agenda_items: z.array(z.string().min(1)).optional(),
  }).strict(),
]);

/**
 * Which parts of a roadmap to create, keyed by template id. Anything not mentioned is
 * included with its template's text.
 */
export const roadmapSelectionSchema = z.object({
  meetings: z.record(z.string(), meetingChoiceSchema).optional(),
}).strict();

export type RoadmapSelection = z.infer<typeof roadmapSelectionSchema>;

type MeetingOptions = Exclude<z.infer<typeof meetingChoiceSchema>, boolean>;
type AgendaItemOptions = Exclude<z.infer<typeof agendaItemChoiceSchema>, boolean>;

export interface AgendaItemPlan {
  template: AgendaItemTemplateDocument;
  title: string;
  description: string;
}

export interface MeetingPlan {
  template: CounselorMeetingTemplateDocument;
  title: string;
  agendaItems: AgendaItemPlan[];
  customAgendaItems: string[];
}

function isIncluded(choice: boolean | { include?: boolean } | undefined): boolean {
  if (choice === undefined) return true;
  if (typeof choice === "boolean") return choice;
  return choice.include ?? true;
}

/**
 * Resolves a selection against the roadmap's meeting templates (already in roadmap order)
 * into the meetings and agenda items to create. Inactive agenda item templates are left out.
 */
export function resolveSelection(
  selection: RoadmapSelection | undefined,
  meetingTemplates: CounselorMeetingTemplateDocument[],
  agendaItemTemplates: Map<string, AgendaItemTemplateDocument>,
): MeetingPlan[] {
  const meetingChoices = selection?.meetings ?? {};
  const known = new Set(meetingTemplates.map(t => t._id.toHexString()));
  for (const id of Object.keys(meetingChoices)) {
    if (!known.has(id)) {
      throw new ValidationError(`Counselor meeting template ${id} is not part of this roadmap.`);
    }
  }

  const plans: MeetingPlan[] = [];
  for (const meetingTemplate of meetingTemplates) {
    const meetingId = meetingTemplate._id.toHexString();
    const choice = meetingChoices[meetingId];
    if (!isIncluded(choice)) continue;
    const options: MeetingOptions = typeof choice === "object" ? choice : {};

    const agendaChoices = options.agenda_items ?? {};
    const ownAgendaIds = new Set(meetingTemplate.agenda_item_template_ids.map(id => id.toHexString()));
    for (const id of Object.keys(agendaChoices)) {
      if (!ownAgendaIds.has(id)) {
        throw new ValidationError(
          `Agenda item template ${id} does not belong to meeting template "${meetingTemplate.title}".`,
        );
      }
    }

    const templates = meetingTemplate.agenda_item_template_ids.flatMap(id => {
      const template = agendaItemTemplates.get(id.toHexString());
      return template ? [template] : [];
    });

    const agendaItems: AgendaItemPlan[] = [];
    for (const template of byOrder(templates, meetingTemplate.agenda_item_template_ids)) {
      const agendaChoice = agendaChoices[template._id.toHexString()];
      if (!template.active || !isIncluded(agendaChoice)) continue;
      const override: AgendaItemOptions = typeof agendaChoice === "object" ? agendaChoice : {};
      agendaItems.push({
        template,
        title: override.title ?? template.title,
        description: override.description ?? template.description,
      });
    }

    plans.push({
      template: meetingTemplate,
      title: options.title ?? meetingTemplate.title,
      agendaItems,
      customAgendaItems: options.custom_agenda_items ?? [],
    });
  }

  return plans;
}
