export interface CounselingConfig {
  mongoUri: string;
  ntfyBaseUrl: string;
  ntfyTopic: string | null;
  reminderSchedule: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CounselingConfig {
  return {
    mongoUri: env.MONGO_URI || "mongodb://localhost:27017/counseling",
    ntfyBaseUrl: (env.NTFY_BASE_URL || "https://ntfy.sh").replace(/\/+$/, ""),
    ntfyTopic: env.NTFY_TOPIC || null,
    reminderSchedule: env.REMINDER_SCHEDULE || "0 14 * * *",
  };
}

/** Identity a server process acts as; the process cannot start without it. */
export function requireIdentity(variable: "COUNSELOR_EMAIL" | "ADMIN_EMAIL", env: NodeJS.ProcessEnv = process.env): string {
  const value = env[variable] || "";
  if (!value) {
    console.error(`${variable} not set — cannot identify the acting user`);
    process.exit(1);
  }
  return value;
}
