import type { ObjectId } from "mongodb";
import { authorize } from "../../auth.js";
import { NotFoundError } from "../../errors.js";
import type { CounselingReader } from "../../store.js";
import type { CounselorMeetingDocument } from "../../types.js";

/** Loads a meeting and checks the caller may act on its student. */
export async function authorizeForMeeting(
  reader: CounselingReader,
  userEmail: string,
  action: string,
  meetingId: ObjectId,
): Promise<CounselorMeetingDocument> {
  const meeting = await reader.getMeeting(meetingId);
  if (!meeting) throw new NotFoundError("Counselor meeting", meetingId.toHexString());
  await authorize(userEmail, action, meeting.student_email);
  return meeting;
}
