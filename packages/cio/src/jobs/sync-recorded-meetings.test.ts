import { describe, it, expect, vi, beforeEach } from "vitest";
import { stubFetch } from "@cio/connector/testing";
import { base, testContext, type TestContext } from "../testing.js";
import { driveFileName, meetingPathId, syncRecordedMeetings } from "./sync-recorded-meetings.js";

const RECORDINGS = /^https:\/\/api\.zoom\.us\/v2\/accounts\/me\/recordings\?/;
const DRIVE_FILES = /^https:\/\/www\.googleapis\.com\/drive\/v3\/files\?/;
const DRIVE_UPLOAD = /^https:\/\/www\.googleapis\.com\/upload\/drive\/v3\/files\?/;

function file(id: string, fileType: string, status = "completed") {
  return {
    id,
    file_type: fileType,
    status,
    download_url: `https://zoom.us/rec/download/${id}`,
    recording_end: "2024-02-20T17:40:00Z",
  };
}

const meeting = {
  uuid: "abc==",
  id: 123,
  topic: "Ann's Weekly Sync",
  type: 8,
  host_email: "ann@example.com",
  start_time: "2024-02-20T17:00:00Z",
  duration: 45,
  recording_files: [
    file("f-1", "MP4"),
    file("f-2", "SUMMARY"),
    file("f-3", "M4A", "processing"),
    file("f-4", "CHAT"),
    file("f-5", "TRANSCRIPT"),
  ],
};

describe("sync-recorded-meetings", () => {
  it("should name Drive files after the topic", () => {
    expect(driveFileName("Ann's Weekly Sync", ".mp4")).toBe("ann-weekly-sync.mp4");
    expect(driveFileName("  Q1 / Planning!  ", ".txt")).toBe("q1-planning.txt");
  });

  it("should encode awkward meeting uuids twice", () => {
    expect(meetingPathId("abc==")).toBe("abc==");
    expect(meetingPathId("/abc")).toBe("%2Fabc");
    expect(meetingPathId("a//b")).toBe("a%2F%2Fb");
  });

  describe("syncRecordedMeetings", () => {
    let ctx: TestContext;

    beforeEach(() => {
      vi.spyOn(console, "log").mockImplementation(() => {});
      ctx = testContext();
    });

    it("should move recordings to Drive and record the meeting", async () => {
      const calls = stubFetch([
        { url: RECORDINGS, json: { meetings: [meeting, { ...meeting, uuid: "def==", topic: " " }], next_page_token: "" } },
        {
          url: /^https:\/\/www\.googleapis\.com\/drive\/v3\/drives\?/,
          json: { drives: [{ id: "drive-1", name: "Automated Documents" }] },
        },
        { url: DRIVE_FILES, json: { files: [] } },
        { method: "POST", url: DRIVE_FILES, json: { id: "folder-1", name: "folder" } },
        { url: "https://zoom.us/rec/download/f-1", text: "video-bytes" },
        { url: "https://zoom.us/rec/download/f-4", text: "10:00 Ada: hi" },
        { url: "https://zoom.us/rec/download/f-5", text: "WEBVTT" },
        { method: "POST", url: DRIVE_UPLOAD, json: { id: "up-1", name: "weekly.mp4" }, once: true },
        { method: "POST", url: DRIVE_UPLOAD, json: { id: "up-2", name: "weekly.txt" }, once: true },
        { method: "POST", url: DRIVE_UPLOAD, json: { id: "up-3", name: "weekly.vtt" }, once: true },
        { method: "DELETE", url: /^https:\/\/api\.zoom\.us\/v2\/meetings\/abc%3D%3D\/recordings\/f-\d\?action=trash$/, status: 204 },
      ]);

      await syncRecordedMeetings(ctx);

      expect(calls.filter((c) => c.method === "DELETE").map((c) => c.url)).toEqual([
        "https://api.zoom.us/v2/meetings/abc%3D%3D/recordings/f-1?action=trash",
        "https://api.zoom.us/v2/meetings/abc%3D%3D/recordings/f-4?action=trash",
        "https://api.zoom.us/v2/meetings/abc%3D%3D/recordings/f-5?action=trash",
      ]);
      expect(calls.filter((c) => DRIVE_UPLOAD.test(c.url))).toHaveLength(3);

      const rows = ctx.db.rows("recorded_meetings");
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        meeting_id: "abc==",
        name: "Ann's Weekly Sync",
        end_time: new Date("2024-02-20T17:40:00Z"),
        video: "https://drive.google.com/open?id=up-1",
        chat_log_link: "https://drive.google.com/open?id=up-2",
        chat_log: "10:00 Ada: hi",
        transcript: "WEBVTT",
        transcript_id: "f-5",
        is_recurring: true,
      });

      const [record] = base(ctx, "misc").records("Recorded Meetings");
      expect(record?.fields.video).toBe("https://drive.google.com/open?id=up-1");
      expect(record?.fields).not.toHaveProperty("transcript");
      expect(record?.fields).not.toHaveProperty("chat_log");
    });

    it("should stop when there is nothing to move", async () => {
      const calls = stubFetch([{ url: RECORDINGS, json: { meetings: [], next_page_token: "" } }]);

      await syncRecordedMeetings(ctx);

      expect(calls).toHaveLength(1);
      expect(ctx.db.rows("recorded_meetings")).toHaveLength(0);
    });
  });
});
