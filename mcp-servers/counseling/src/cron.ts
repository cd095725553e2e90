import cron from "node-cron";
import { loadConfig } from "./config.js";
import { NtfyNotificationSender } from "./notifications.js";
import { sendTaskReminders } from "./reminders/taskReminders.js";
import { getStore } from "./store.js";

const config = loadConfig();

if (!config.ntfyTopic) {
  console.error("NTFY_TOPIC not set");
  process.exit(1);
}

const sender = new NtfyNotificationSender(config);

console.log(`[cron] Scheduled task reminders at: ${config.reminderSchedule}`);

cron.schedule(config.reminderSchedule, async () => {
  try {
    const run = await sendTaskReminders(getStore(), sender);
    console.log(`[cron] Task reminders sent to ${run.notified}/${run.students} students covering ${run.tasks} tasks.`);
  } catch (err) {
    console.error("[cron] Task reminders failed:", err);
  }
});
