/**
 * Recorded meetings from Zoom cloud recordings
 */

import { z } from "zod";
import { defineRecord, type Stored, type zoom } from "@cio/connector";
import { companyId, flag, list, text, timestamp } from "./fields.js";

// Zoom meeting types 3 and 8 are the recurring ones
const RECURRING_MEETING_TYPES = new Set([3, 8]);

export const NewRecordedMeetingSchema = z.object({
  meeting_id: z.string(),
  name: text,
  description: text,
  start_time: timestamp,
  end_time: timestamp,
  video: text,
  chat_log_link: text,
  chat_log: text,
  is_recurring: flag,
  attendees: list,
  transcript: text,
  transcript_id: text,
  google_event_id: text,
  event_link: text,
  location: text,
  cio_company_id: companyId,
});

export type NewRecordedMeeting = z.infer<typeof NewRecordedMeetingSchema>;
export type RecordedMeeting = Stored<NewRecordedMeeting>;

export const RecordedMeetings = defineRecord({
  name: "RecordedMeeting",
  table: "recorded_meetings",
  schema: NewRecordedMeetingSchema,
  matchOn: ["cio_company_id", "meeting_id"],
  airtable: {
    base: "misc",
    table: "Recorded Meetings",
    exclude: ["chat_log", "transcript"],
  },
});

/** Recording files after they were copied to Google Drive */
export interface MovedRecordings {
  video: string;
  end_time: Date | null;
  chat_log_link: string;
  chat_log: string;
  transcript: string;
  transcript_id: string;
}

export const NO_RECORDINGS: MovedRecordings = {
  video: "",
  end_time: null,
  chat_log_link: "",
  chat_log: "",
  transcript: "",
  transcript_id: "",
};

export function recordedMeetingFromZoom(
  meeting: zoom.MeetingRecording,
  moved: MovedRecordings,
  cioCompanyId: number
): NewRecordedMeeting {
  return {
    meeting_id: meeting.uuid,
    name: meeting.topic.trim(),
    description: "",
    start_time: meeting.start_time,
    end_time: moved.end_time ?? new Date(meeting.start_time.getTime() + meeting.duration * 60 * 1000),
    video: moved.video,
    chat_log_link: moved.chat_log_link,
    chat_log: moved.chat_log,
    is_recurring: RECURRING_MEETING_TYPES.has(meeting.type ?? 0),
    attendees: meeting.host_email ? [meeting.host_email] : [],
    transcript: moved.transcript,
    transcript_id: moved.transcript_id,
    google_event_id: "",
    event_link: moved.video,
    location: meeting.host_email ? `Meeting hosted by ${meeting.host_email}` : "",
    cio_company_id: cioCompanyId,
  };
}
