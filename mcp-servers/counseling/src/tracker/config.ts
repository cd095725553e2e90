import { z } from "zod";
import {
  APPLICATION_PLATFORMS, APPLICATION_STATUSES, FILTERABLE_TRACKER_FIELDS, IS_APPLYING_VALUES,
  REQUIREMENT_TRACKER_FIELDS, REQUIREMENT_TRACKER_STATUSES,
} from "../constants.js";
import { ConfigurationError } from "../errors.js";
import type { Changes } from "../store.js";
import type { StudentUniversityDecisionDocument, TaskTemplateDocument } from "../types.js";

const requirementStatus = z.enum(REQUIREMENT_TRACKER_STATUSES);

export const trackerUpdateSchema = z.object({
  transcript_status: requirementStatus,
  test_scores_status: requirementStatus,
  recommendation_one_status: requirementStatus,
  recommendation_two_status: requirementStatus,
  recommendation_three_status: requirementStatus,
  recommendation_four_status: requirementStatus,
  application_status: z.enum(APPLICATION_STATUSES),
}).partial().strict();

export const schoolTrackerFilterSchema = trackerUpdateSchema.extend({
  school_id: z.number().int().optional(),
  is_applying: z.enum(IS_APPLYING_VALUES).optional(),
  application: z.enum(APPLICATION_PLATFORMS).optional(),
}).strict();

/** Conjunctive field → expected value predicate over a student's tracker rows. */
export type SchoolTrackerFilter = z.infer<typeof schoolTrackerFilterSchema>;

/** Field → new value written onto matched tracker rows. */
export type TrackerUpdate = z.infer<typeof trackerUpdateSchema>;

export type TrackerUpdateKey = "on_assign_sud_update" | "on_complete_sud_update";

function isEmpty(value: Record<string, unknown> | undefined): boolean {
  return !value || Object.keys(value).length === 0;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Returns null when the template declares no filter (absent or `{}`). */
export function parseTrackerFilter(template: TaskTemplateDocument): SchoolTrackerFilter | null {
  const raw = template.include_school_sud_values;
  if (isEmpty(raw)) return null;
  const parsed = schoolTrackerFilterSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Task template ${template._id.toHexString()} has an invalid include_school_sud_values (${describeIssues(parsed.error)}).`,
      { task_template_id: template._id.toHexString(), field: "include_school_sud_values" },
    );
  }
  return parsed.data;
}

export function parseTrackerUpdate(template: TaskTemplateDocument, key: TrackerUpdateKey): TrackerUpdate | null {
  const raw = template[key];
  if (isEmpty(raw)) return null;
  const parsed = trackerUpdateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Task template ${template._id.toHexString()} has an invalid ${key} (${describeIssues(parsed.error)}).`,
      { task_template_id: template._id.toHexString(), field: key },
    );
  }
  return parsed.data;
}

export function matchesTrackerFilter(row: StudentUniversityDecisionDocument, filter: SchoolTrackerFilter): boolean {
  return FILTERABLE_TRACKER_FIELDS.every(field => {
    const expected = filter[field];
    return expected === undefined || row[field] === expected;
  });
}

/**
 * Field changes `update` makes on `row`. With a non-empty `onlyAlter`, a field is changed
 * only while its current value is one of those listed.
 */
export function trackerChanges(
  row: StudentUniversityDecisionDocument,
  update: TrackerUpdate,
  onlyAlter: string[],
): Changes<StudentUniversityDecisionDocument> {
  const alterable = (current: string) => onlyAlter.length === 0 || onlyAlter.includes(current);
  const changes: Changes<StudentUniversityDecisionDocument> = {};

  for (const field of REQUIREMENT_TRACKER_FIELDS) {
    const next = update[field];
    if (next === undefined || row[field] === next || !alterable(row[field])) continue;
    changes[field] = next;
  }

  const nextApplication = update.application_status;
  if (
    nextApplication !== undefined
    && row.application_status !== nextApplication
    && alterable(row.application_status)
  ) {
    changes.application_status = nextApplication;
  }

  return changes;
}
