import type { ObjectId } from "mongodb";
import { NotFoundError, ValidationError } from "../errors.js";
import type { CounselingStore } from "../store.js";
import { includesId } from "../validation.js";

export interface UnapplyRoadmapInput {
  roadmapId: ObjectId;
  studentEmail: string;
  now?: Date;
}

export interface RoadmapRemoval {
  deletedMeetings: number;
  deletedAgendaItems: number;
  deletedTasks: number;
}

/**
 * Takes a roadmap back off a student: meetings from its templates that are unscheduled or
 * have not ended yet are deleted with their agenda items, and so are the student's
 * unfinished tasks from its task templates. Ended meetings and completed tasks stay.
 */
export async function unapplyRoadmap(store: CounselingStore, input: UnapplyRoadmapInput): Promise<RoadmapRemoval> {
  const now = input.now ?? new Date();

  const removal = await store.withTransaction(async (tx) => {
    const student = await tx.getStudent(input.studentEmail);
    if (!student) throw new NotFoundError("Student", input.studentEmail);
    if (!includesId(student.applied_roadmap_ids, input.roadmapId)) {
      throw new ValidationError(
        `Roadmap ${input.roadmapId.toHexString()} has not been applied to ${input.studentEmail}.`,
      );
    }
    const roadmap = await tx.getRoadmap(input.roadmapId);
    if (!roadmap) throw new NotFoundError("Roadmap", input.roadmapId.toHexString());

    const meetingTemplates = await tx.getMeetingTemplates(roadmap.counselor_meeting_template_ids);
    const agendaItemTemplates = await tx.getAgendaItemTemplates(
      meetingTemplates.flatMap(t => t.agenda_item_template_ids),
    );
    const taskTemplateIds = agendaItemTemplates.flatMap(t => [
      ...t.pre_meeting_task_template_ids,
      ...t.post_meeting_task_template_ids,
    ]);

    const roadmapMeetings = await tx.findMeetings({
      student_email: student.email,
      counselor_meeting_template_ids: roadmap.counselor_meeting_template_ids,
    });
    const removedMeetings = roadmapMeetings.filter(m => m.end === null || m.end.getTime() > now.getTime());
    const keptMeetings = roadmapMeetings.filter(m => !removedMeetings.includes(m));

    const removedAgendaItems = await tx.findAgendaItems(removedMeetings.map(m => m._id));
    const removedTasks = taskTemplateIds.length > 0
      ? await tx.findTasks({ student_email: student.email, task_template_ids: taskTemplateIds, exclude_status: "completed" })
      : [];
    const removedTaskIds = removedTasks.map(t => t._id);

    // Kept meetings may still list tasks that are about to go
    for (const item of await tx.findAgendaItems(keptMeetings.map(m => m._id))) {
      const pre = item.pre_meeting_task_ids.filter(id => !includesId(removedTaskIds, id));
      const post = item.post_meeting_task_ids.filter(id => !includesId(removedTaskIds, id));
      if (pre.length !== item.pre_meeting_task_ids.length || post.length !== item.post_meeting_task_ids.length) {
        await tx.updateAgendaItem(item._id, { pre_meeting_task_ids: pre, post_meeting_task_ids: post, updated_at: now });
      }
    }

    await tx.deleteTasks(removedTaskIds);
    await tx.deleteAgendaItems(removedAgendaItems.map(a => a._id));
    await tx.deleteMeetings(removedMeetings.map(m => m._id));
    await tx.removeAppliedRoadmap(student.email, roadmap._id);

    return {
      deletedMeetings: removedMeetings.length,
      deletedAgendaItems: removedAgendaItems.length,
      deletedTasks: removedTasks.length,
    };
  });

  console.error(
    `[roadmap] Removed roadmap ${input.roadmapId.toHexString()} from ${input.studentEmail}: `
    + `${removal.deletedMeetings} meetings, ${removal.deletedAgendaItems} agenda items, ${removal.deletedTasks} tasks.`,
  );
  return removal;
}
