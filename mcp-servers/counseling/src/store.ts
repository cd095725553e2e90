import type { ClientSession, Filter, ObjectId } from "mongodb";
import {
  getClient, students, counselors, roadmaps, counselorMeetingTemplates, agendaItemTemplates,
  taskTemplates, counselorMeetings, agendaItems, tasks, studentUniversityDecisions,
} from "./db.js";
import type {
  StudentDocument, CounselorDocument, RoadmapDocument, CounselorMeetingTemplateDocument,
  AgendaItemTemplateDocument, TaskTemplateDocument, CounselorMeetingDocument, AgendaItemDocument,
  TaskDocument, TaskStatus, StudentUniversityDecisionDocument,
} from "./types.js";

export interface MeetingFilter {
  student_email: string;
  counselor_meeting_template_ids?: ObjectId[];
}

export interface TaskFilter {
  student_email?: string;
  task_template_ids?: ObjectId[];
  counselor_meeting_id?: ObjectId;
  exclude_status?: TaskStatus;
  // Due strictly before this time
  due_before?: Date;
  // Never reminded, or last reminded strictly before this time
  reminded_before?: Date;
}

export type Changes<T> = Partial<Omit<T, "_id">>;

/** Reads shared by the store and by an open transaction. */
export interface CounselingReader {
  getStudent(email: string): Promise<StudentDocument | null>;
  getCounselor(email: string): Promise<CounselorDocument | null>;
  getRoadmap(id: ObjectId): Promise<RoadmapDocument | null>;
  getMeetingTemplates(ids: ObjectId[]): Promise<CounselorMeetingTemplateDocument[]>;
  getAgendaItemTemplates(ids: ObjectId[]): Promise<AgendaItemTemplateDocument[]>;
  getTaskTemplates(ids: ObjectId[]): Promise<TaskTemplateDocument[]>;
  getMeeting(id: ObjectId): Promise<CounselorMeetingDocument | null>;
  getAgendaItem(id: ObjectId): Promise<AgendaItemDocument | null>;
  getTask(id: ObjectId): Promise<TaskDocument | null>;
  findMeetings(filter: MeetingFilter): Promise<CounselorMeetingDocument[]>;
  findAgendaItems(meetingIds: ObjectId[]): Promise<AgendaItemDocument[]>;
  findTasks(filter: TaskFilter): Promise<TaskDocument[]>;
  findStudentUniversityDecisions(studentEmail: string, schoolIds?: number[]): Promise<StudentUniversityDecisionDocument[]>;
}

export interface CounselingWriter {
  insertMeetings(docs: CounselorMeetingDocument[]): Promise<void>;
  insertAgendaItems(docs: AgendaItemDocument[]): Promise<void>;
  insertTasks(docs: TaskDocument[]): Promise<void>;
  updateMeeting(id: ObjectId, changes: Changes<CounselorMeetingDocument>): Promise<void>;
  updateAgendaItem(id: ObjectId, changes: Changes<AgendaItemDocument>): Promise<void>;
  updateTask(id: ObjectId, changes: Changes<TaskDocument>): Promise<void>;
  updateStudentUniversityDecision(id: ObjectId, changes: Changes<StudentUniversityDecisionDocument>): Promise<void>;
  deleteMeetings(ids: ObjectId[]): Promise<void>;
  deleteAgendaItems(ids: ObjectId[]): Promise<void>;
  deleteTasks(ids: ObjectId[]): Promise<void>;
  addAppliedRoadmap(studentEmail: string, roadmapId: ObjectId): Promise<void>;
  removeAppliedRoadmap(studentEmail: string, roadmapId: ObjectId): Promise<void>;
}

export type CounselingTransaction = CounselingReader & CounselingWriter;

export interface CounselingStore extends CounselingReader {
  /** Runs `work` atomically: every write it makes commits together or not at all. */
  withTransaction<T>(work: (tx: CounselingTransaction) => Promise<T>): Promise<T>;
}

export class MongoCounselingStore implements CounselingStore, CounselingTransaction {
  constructor(private readonly session?: ClientSession) {}

  async withTransaction<T>(work: (tx: CounselingTransaction) => Promise<T>): Promise<T> {
    const session = (await getClient()).startSession();
    try {
      session.startTransaction();
      const value = await work(new MongoCounselingStore(session));
      await session.commitTransaction();
      return value;
    } catch (err) {
      if (session.inTransaction()) await session.abortTransaction();
      throw err;
    } finally {
      await session.endSession();
    }
  }

  async getStudent(email: string): Promise<StudentDocument | null> {
    return (await students()).findOne({ email }, { session: this.session });
  }

  async getCounselor(email: string): Promise<CounselorDocument | null> {
    return (await counselors()).findOne({ email }, { session: this.session });
  }

  async getRoadmap(id: ObjectId): Promise<RoadmapDocument | null> {
    return (await roadmaps()).findOne({ _id: id }, { session: this.session });
  }

  async getMeetingTemplates(ids: ObjectId[]): Promise<CounselorMeetingTemplateDocument[]> {
    return (await counselorMeetingTemplates()).find({ _id: { $in: ids } }, { session: this.session }).toArray();
  }

  async getAgendaItemTemplates(ids: ObjectId[]): Promise<AgendaItemTemplateDocument[]> {
    return (await agendaItemTemplates()).find({ _id: { $in: ids } }, { session: this.session }).toArray();
  }

  async getTaskTemplates(ids: ObjectId[]): Promise<TaskTemplateDocument[]> {
    return (await taskTemplates()).find({ _id: { $in: ids } }, { session: this.session }).toArray();
  }

  async getMeeting(id: ObjectId): Promise<CounselorMeetingDocument | null> {
    return (await counselorMeetings()).findOne({ _id: id }, { session: this.session });
  }

  async getAgendaItem(id: ObjectId): Promise<AgendaItemDocument | null> {
    return (await agendaItems()).findOne({ _id: id }, { session: this.session });
  }

  async getTask(id: ObjectId): Promise<TaskDocument | null> {
    return (await tasks()).findOne({ _id: id }, { session: this.session });
  }

  async findMeetings(filter: MeetingFilter): Promise<CounselorMeetingDocument[]> {
    const query = filter.counselor_meeting_template_ids
      ? { student_email: filter.student_email, counselor_meeting_template_id: { $in: filter.counselor_meeting_template_ids } }
      : { student_email: filter.student_email };
    return (await counselorMeetings()).find(query, { session: this.session }).toArray();
  }

  async findAgendaItems(meetingIds: ObjectId[]): Promise<AgendaItemDocument[]> {
    return (await agendaItems())
      .find({ counselor_meeting_id: { $in: meetingIds } }, { session: this.session })
      .sort({ order: 1 })
      .toArray();
  }

  async findTasks(filter: TaskFilter): Promise<TaskDocument[]> {
    const query: Filter<TaskDocument> = {};
    if (filter.student_email !== undefined) query.student_email = filter.student_email;
    if (filter.task_template_ids) query.task_template_id = { $in: filter.task_template_ids };
    if (filter.counselor_meeting_id) query.counselor_meeting_ids = filter.counselor_meeting_id;
    if (filter.exclude_status) query.status = { $ne: filter.exclude_status };
    if (filter.due_before) query.due = { $lt: filter.due_before };
    if (filter.reminded_before) {
      query.$or = [{ last_reminder_sent: null }, { last_reminder_sent: { $lt: filter.reminded_before } }];
    }
    return (await tasks()).find(query, { session: this.session }).toArray();
  }

  async findStudentUniversityDecisions(
    studentEmail: string,
    schoolIds?: number[],
  ): Promise<StudentUniversityDecisionDocument[]> {
    const query = schoolIds
      ? { student_email: studentEmail, school_id: { $in: schoolIds } }
      : { student_email: studentEmail };
    return (await studentUniversityDecisions()).find(query, { session: this.session }).toArray();
  }

  async insertMeetings(docs: CounselorMeetingDocument[]): Promise<void> {
    if (docs.length === 0) return;
    await (await counselorMeetings()).insertMany(docs, { session: this.session });
  }

  async insertAgendaItems(docs: AgendaItemDocument[]): Promise<void> {
    if (docs.length === 0) return;
    await (await agendaItems()).insertMany(docs, { session: this.session });
  }

  async insertTasks(docs: TaskDocument[]): Promise<void> {
    if (docs.length === 0) return;
    await (await tasks()).insertMany(docs, { session: this.session });
  }

  async updateMeeting(id: ObjectId, changes: Changes<CounselorMeetingDocument>): Promise<void> {
    await (await counselorMeetings()).updateOne({ _id: id }, { $set: changes }, { session: this.session });
  }

  async updateAgendaItem(id: ObjectId, changes: Changes<AgendaItemDocument>): Promise<void> {
    await (await agendaItems()).updateOne({ _id: id }, { $set: changes }, { session: this.session });
  }

  async updateTask(id: ObjectId, changes: Changes<TaskDocument>): Promise<void> {
    await (await tasks()).updateOne({ _id: id }, { $set: changes }, { session: this.session });
  }

  async updateStudentUniversityDecision(
    id: ObjectId,
    changes: Changes<StudentUniversityDecisionDocument>,
  ): Promise<void> {
    await (await studentUniversityDecisions()).updateOne({ _id: id }, { $set: changes }, { session: this.session });
  }

  async deleteMeetings(ids: ObjectId[]): Promise<void> {
    if (ids.length === 0) return;
    await (await counselorMeetings()).deleteMany({ _id: { $in: ids } }, { session: this.session });
  }

  async deleteAgendaItems(ids: ObjectId[]): Promise<void> {
    if (ids.length === 0) return;
    await (await agendaItems()).deleteMany({ _id: { $in: ids } }, { session: this.session });
  }

  async deleteTasks(ids: ObjectId[]): Promise<void> {
    if (ids.length === 0) return;
    await (await tasks()).deleteMany({ _id: { $in: ids } }, { session: this.session });
  }

  async addAppliedRoadmap(studentEmail: string, roadmapId: ObjectId): Promise<void> {
    await (await students()).updateOne(
      { email: studentEmail },
      { $addToSet: { applied_roadmap_ids: roadmapId }, $set: { updated_at: new Date() } },
      { session: this.session },
    );
  }

  async removeAppliedRoadmap(studentEmail: string, roadmapId: ObjectId): Promise<void> {
    await (await students()).updateOne(
      { email: studentEmail },
      { $pull: { applied_roadmap_ids: roadmapId }, $set: { updated_at: new Date() } },
      { session: this.session },
    );
  }
}

let store: CounselingStore | null = null;

export function getStore(): CounselingStore {
  if (!store) store = new MongoCounselingStore();
  return store;
}
