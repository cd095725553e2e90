import type { CounselingTransaction } from "../store.js";
import type { TaskDocument, TaskStatus } from "../types.js";
import { matchesTrackerFilter, parseTrackerFilter, parseTrackerUpdate, trackerChanges } from "./config.js";
import type { TrackerUpdateKey } from "./config.js";

export interface TrackerUpdateResult {
  matched: number;
  updated: number;
}

const NO_CHANGE: TrackerUpdateResult = { matched: 0, updated: 0 };

const UPDATE_ON_STATUS: Partial<Record<TaskStatus, TrackerUpdateKey>> = {
  assigned: "on_assign_sud_update",
  completed: "on_complete_sud_update",
};

/**
 * Propagates a task transition onto the student's application tracker rows, as declared
 * by the task's template. Runs inside the transaction that persists the transition.
 *
 * Only moves into `assigned` or `completed` write anything; reopening leaves tracker
 * fields where they are. No matching rows is not an error. Throws ConfigurationError
 * when the template's tracker mappings are malformed, before any row is written.
 */
export async function onTaskStatusChange(
  tx: CounselingTransaction,
  task: TaskDocument,
  oldStatus: TaskStatus,
  newStatus: TaskStatus,
  now: Date = new Date(),
): Promise<TrackerUpdateResult> {
  const updateKey = UPDATE_ON_STATUS[newStatus];
  if (!updateKey || oldStatus === newStatus || !task.task_template_id) return NO_CHANGE;

  // The template may have been deleted since; instances keep working without it
  const [template] = await tx.getTaskTemplates([task.task_template_id]);
  if (!template) return NO_CHANGE;

  const filter = parseTrackerFilter(template);
  if (!filter) return NO_CHANGE;
  const update = parseTrackerUpdate(template, updateKey);
  if (!update) return NO_CHANGE;

  // Schools named on the task narrow the candidates before the template filter applies
  const candidates = await tx.findStudentUniversityDecisions(
    task.student_email,
    task.school_ids.length > 0 ? task.school_ids : undefined,
  );
  const matched = candidates.filter(row => matchesTrackerFilter(row, filter));

  let updated = 0;
  for (const row of matched) {
    const changes = trackerChanges(row, update, template.only_alter_tracker_values);
    if (Object.keys(changes).length === 0) continue;
    await tx.updateStudentUniversityDecision(row._id, { ...changes, updated_at: now });
    updated++;
  }

  return { matched: matched.length, updated };
}
