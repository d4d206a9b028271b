/**
 * Zoom recordings
 *
 * Copies the last month of cloud recordings into the "Automated Documents"
 * shared drive (zoom_recordings/<start time>/), trashes each copied file in
 * Zoom and records the meeting with links to the copies. Files that were not
 * copied stay in Zoom.
 */

import { RecordStore, setupLogger } from "@cio/connector";
import {
  NO_RECORDINGS,
  RecordedMeetings,
  recordedMeetingFromZoom,
  type MovedRecordings,
} from "../records/recorded-meetings.js";
import { mirrorToAirtable, type JobContext } from "./context.js";

const logger = setupLogger("sync-recorded-meetings");

export const SHARED_DRIVE_NAME = "Automated Documents";
export const RECORDINGS_FOLDER = "zoom_recordings";
const LOOKBACK_DAYS = 30;

const FILE_TYPES = new Map<string, { mimeType: string; extension: string }>([
  ["MP4", { mimeType: "video/mp4", extension: ".mp4" }],
  ["M4A", { mimeType: "audio/mp4", extension: ".m4a" }],
  ["CHAT", { mimeType: "text/plain", extension: ".txt" }],
  ["TRANSCRIPT", { mimeType: "text/vtt", extension: ".vtt" }],
  ["CC", { mimeType: "text/vtt", extension: ".vtt" }],
  ["TIMELINE", { mimeType: "application/json", extension: ".json" }],
  ["CSV", { mimeType: "text/csv", extension: ".csv" }],
]);

/** "Ann's Weekly Sync" -> "ann-weekly-sync" */
export function driveFileName(topic: string, extension: string): string {
  const slug = topic
    .replace(/'s/g, "")
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return `${slug}${extension}`;
}

export function driveLink(fileId: string): string {
  return `https://drive.google.com/open?id=${fileId}`;
}

/**
 * Meeting UUIDs starting with "/" or containing "//" must be encoded twice.
 */
export function meetingPathId(uuid: string): string {
  return uuid.startsWith("/") || uuid.includes("//") ? encodeURIComponent(uuid) : uuid;
}

export async function syncRecordedMeetings(ctx: JobContext): Promise<void> {
  const zoom = await ctx.clients.zoom();
  const now = ctx.now();
  const meetings = await zoom.listRecordingsAsAdmin(new Date(now.getTime() - LOOKBACK_DAYS * 24 * 60 * 60 * 1000), now);
  if (meetings.length === 0) {
    logger.info("No Zoom recordings to move");
    return;
  }

  const drive = await ctx.clients.googleDrive();
  const sharedDrive = await drive.getDriveByName(SHARED_DRIVE_NAME);
  const recordingsFolderId = await drive.createFolder(sharedDrive.id, RECORDINGS_FOLDER);
  const store = new RecordStore(RecordedMeetings, ctx.db);
  const decoder = new TextDecoder();

  for (const meeting of meetings) {
    if (meeting.topic.trim() === "") {
      logger.warn(`Zoom meeting ${meeting.uuid} has no topic, skipping`);
      continue;
    }

    const folderId = await drive.createFolder(recordingsFolderId, meeting.start_time.toISOString());
    const moved: MovedRecordings = { ...NO_RECORDINGS };
    let copied = 0;

    for (const file of meeting.recording_files) {
      const type = FILE_TYPES.get(file.file_type);
      if (type === undefined) {
        logger.warn(`Zoom meeting ${meeting.topic} has a recording of unknown type ${file.file_type || "(none)"}`);
        continue;
      }
      if (file.status !== "" && file.status !== "completed") {
        logger.warn(`Zoom meeting ${meeting.topic} recording ${file.id} is ${file.status}, skipping`);
        continue;
      }

      logger.info(`Copying ${file.file_type} of ${meeting.topic} to Google Drive`);
      const contents = await zoom.downloadFile(file.download_url);
      const uploaded = await drive.uploadFile(folderId, driveFileName(meeting.topic, type.extension), type.mimeType, contents);
      await zoom.deleteRecording(meetingPathId(meeting.uuid), file.id);
      copied++;

      switch (file.file_type) {
        case "MP4":
          moved.video = driveLink(uploaded.id);
          moved.end_time = file.recording_end ? new Date(file.recording_end) : null;
          break;
        case "TRANSCRIPT":
          moved.transcript = decoder.decode(contents);
          moved.transcript_id = file.id;
          break;
        case "CHAT":
          moved.chat_log_link = driveLink(uploaded.id);
          moved.chat_log = decoder.decode(contents);
          break;
      }
    }

    if (copied > 0) {
      logger.info(`Trashed ${copied} Zoom recordings of ${meeting.topic}`);
    }

    await store.upsert(recordedMeetingFromZoom(meeting, moved, ctx.company.id));
  }

  await mirrorToAirtable(ctx, RecordedMeetings);
}
