import { deliverNotifications, renderTaskReminder } from "../notifications.js";
import type { NotificationSender } from "../notifications.js";
import type { CounselingStore } from "../store.js";
import type { TaskDocument } from "../types.js";

const HOUR_MS = 60 * 60 * 1000;

// Tasks due within this many hours count as coming due
export const COMING_DUE_HOURS = 48;
// A task is not reminded about again sooner than this
export const MIN_REMINDER_INTERVAL_HOURS = 23;

export interface TaskReminderRun {
  students: number;
  notified: number;
  tasks: number;
}

function byStudent(tasks: TaskDocument[]): Map<string, TaskDocument[]> {
  const grouped = new Map<string, TaskDocument[]>();
  for (const task of tasks) {
    grouped.set(task.student_email, [...(grouped.get(task.student_email) ?? []), task]);
  }
  return grouped;
}

/**
 * Sends each student one reminder listing their overdue tasks and those coming due.
 * Tasks are stamped as reminded only when the reminder was delivered.
 */
export async function sendTaskReminders(
  store: CounselingStore,
  sender: NotificationSender,
  now: Date = new Date(),
): Promise<TaskReminderRun> {
  const candidates = await store.findTasks({
    exclude_status: "completed",
    due_before: new Date(now.getTime() + COMING_DUE_HOURS * HOUR_MS),
    reminded_before: new Date(now.getTime() - MIN_REMINDER_INTERVAL_HOURS * HOUR_MS),
  });

  const run: TaskReminderRun = { students: 0, notified: 0, tasks: 0 };
  for (const [studentEmail, tasks] of byStudent(candidates)) {
    run.students++;
    const overdue = tasks.filter(t => t.due !== null && t.due.getTime() < now.getTime());
    const comingDue = tasks.filter(t => !overdue.includes(t));

    const delivered = await deliverNotifications(sender, [renderTaskReminder(studentEmail, overdue, comingDue)]);
    if (delivered === 0) continue;

    await store.withTransaction(async (tx) => {
      for (const task of tasks) await tx.updateTask(task._id, { last_reminder_sent: now });
    });
    run.notified++;
    run.tasks += tasks.length;
  }

  return run;
}
