import { MongoClient, Db, Collection } from "mongodb";
import { loadConfig } from "./config.js";
import type {
  UserDocument, StudentDocument, CounselorDocument,
  RoadmapDocument, CounselorMeetingTemplateDocument, AgendaItemTemplateDocument, TaskTemplateDocument,
  CounselorMeetingDocument, AgendaItemDocument, TaskDocument,
  StudentUniversityDecisionDocument, NotificationRecord,
} from "./types.js";

let client: MongoClient | null = null;
let db: Db | null = null;

export async function getClient(): Promise<MongoClient> {
  if (client) return client;
  const next = new MongoClient(loadConfig().mongoUri);
  await next.connect();
  client = next;
  return client;
}

export async function getDb(): Promise<Db> {
  if (db) return db;
  db = (await getClient()).db();
  return db;
}

export async function users(): Promise<Collection<UserDocument>> {
  return (await getDb()).collection("users");
}
export async function students(): Promise<Collection<StudentDocument>> {
  return (await getDb()).collection("students");
}
export async function counselors(): Promise<Collection<CounselorDocument>> {
  return (await getDb()).collection("counselors");
}
export async function roadmaps(): Promise<Collection<RoadmapDocument>> {
  return (await getDb()).collection("roadmaps");
}
export async function counselorMeetingTemplates(): Promise<Collection<CounselorMeetingTemplateDocument>> {
  return (await getDb()).collection("counselor_meeting_templates");
}
export async function agendaItemTemplates(): Promise<Collection<AgendaItemTemplateDocument>> {
  return (await getDb()).collection("agenda_item_templates");
}
export async function taskTemplates(): Promise<Collection<TaskTemplateDocument>> {
  return (await getDb()).collection("task_templates");
}
export async function counselorMeetings(): Promise<Collection<CounselorMeetingDocument>> {
  return (await getDb()).collection("counselor_meetings");
}
export async function agendaItems(): Promise<Collection<AgendaItemDocument>> {
  return (await getDb()).collection("agenda_items");
}
export async function tasks(): Promise<Collection<TaskDocument>> {
  return (await getDb()).collection("tasks");
}
export async function studentUniversityDecisions(): Promise<Collection<StudentUniversityDecisionDocument>> {
  return (await getDb()).collection("student_university_decisions");
}
export async function notificationsSent(): Promise<Collection<NotificationRecord>> {
  return (await getDb()).collection("notifications_sent");
}
