import type { ObjectId } from "mongodb";
import { ConfigurationError, NotFoundError, ValidationError } from "../errors.js";
import type { Changes, CounselingStore } from "../store.js";
import type { TaskDocument, TaskStatus } from "../types.js";
import { isValidTaskTransition } from "../validation.js";
import { onTaskStatusChange } from "./updater.js";

export interface ChangeTaskStatusInput {
  taskIds: ObjectId[];
  status: TaskStatus;
  now?: Date;
}

export interface TaskStatusChange {
  task_id: string;
  from: TaskStatus;
  to: TaskStatus;
  tracker_rows_updated: number;
}

/**
 * Persists a status transition for one or more tasks and applies each task's tracker
 * side effects in the same transaction. Any invalid transition rejects the whole batch.
 */
export async function changeTaskStatus(
  store: CounselingStore,
  input: ChangeTaskStatusInput,
): Promise<TaskStatusChange[]> {
  if (input.taskIds.length === 0) {
    throw new ValidationError("At least one task is required.");
  }
  const now = input.now ?? new Date();
  // A repeated id would otherwise fail as a same-status move on its second pass
  const taskIds = [...new Map(input.taskIds.map(id => [id.toHexString(), id])).values()];

  return store.withTransaction(async (tx) => {
    const results: TaskStatusChange[] = [];

    for (const taskId of taskIds) {
      const task = await tx.getTask(taskId);
      if (!task) throw new NotFoundError("Task", taskId.toHexString());

      if (!isValidTaskTransition(task.status, input.status)) {
        throw new ValidationError(
          `Cannot move task "${task.title}" from "${task.status}" to "${input.status}".`,
          { task_id: taskId.toHexString() },
        );
      }

      const changes: Changes<TaskDocument> = { status: input.status, updated_at: now };
      if (input.status === "assigned") changes.assigned_at = task.assigned_at ?? now;
      if (input.status === "completed") changes.completed_at = now;
      if (input.status === "open") changes.completed_at = null;
      await tx.updateTask(task._id, changes);

      let trackerRowsUpdated = 0;
      try {
        const tracker = await onTaskStatusChange(tx, { ...task, ...changes }, task.status, input.status, now);
        trackerRowsUpdated = tracker.updated;
      } catch (err) {
        if (!(err instanceof ConfigurationError)) throw err;
        // Operator-facing only; completing the task must still succeed
        console.error(`[tracker] ${err.message}`, err.details);
      }

      results.push({
        task_id: taskId.toHexString(),
        from: task.status,
        to: input.status,
        tracker_rows_updated: trackerRowsUpdated,
      });
    }

    return results;
  });
}
