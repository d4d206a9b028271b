/**
 * Zoom API Client
 *
 * Users, Zoom Rooms and account cloud recordings.
 * Server-to-server OAuth (account credentials grant).
 */

import { z } from "zod";
import { ApiError } from "../../lib/errors.js";
import { ApiClient, bearer, type Query, type RetryOptions } from "../../lib/http-client.js";
import { requestToken, type AccessTokenSource, type ClientCredentials, type TokenGrant } from "../../lib/oauth.js";

export const ZOOM_API_BASE = "https://api.zoom.us/v2/";
export const ZOOM_TOKEN_URL = "https://zoom.us/oauth/token";
const PAGE_SIZE = 300;
const RECORDING_WINDOW_DAYS = 30;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Zoom user types */
export const ZoomUserType = {
  Basic: 1,
  Licensed: 2,
} as const;

export function zoomGrant(accountId: string, client: ClientCredentials): TokenGrant {
  return async () =>
    requestToken(ZOOM_TOKEN_URL, { grant_type: "account_credentials", account_id: accountId }, client, {
      service: "zoom",
      clientAuth: "basic",
    });
}

const text = z
  .string()
  .nullable()
  .optional()
  .transform((v) => v ?? "");

export const ZoomUserSchema = z
  .object({
    id: z.string(),
    first_name: text,
    last_name: text,
    email: z.string(),
    type: z.number(),
    status: text,
    pmi: z.number().optional(),
    timezone: text,
    dept: text,
    role_id: text,
    created_at: text,
    last_login_time: text,
    use_pmi: z.boolean().optional(),
    vanity_url: text,
    personal_meeting_url: text,
    job_title: text,
    location: text,
  })
  .passthrough();

export type ZoomUser = z.infer<typeof ZoomUserSchema>;

export const RoomSchema = z
  .object({
    id: z.string(),
    room_id: text,
    name: z.string(),
    activation_code: text,
    status: text,
    location_id: text,
  })
  .passthrough();

export type Room = z.infer<typeof RoomSchema>;

export const RecordingFileSchema = z
  .object({
    id: text,
    meeting_id: text,
    recording_start: text,
    recording_end: text,
    file_type: text,
    file_extension: text,
    file_size: z.number().optional(),
    play_url: text,
    download_url: text,
    status: text,
    recording_type: text,
  })
  .passthrough();

export type RecordingFile = z.infer<typeof RecordingFileSchema>;

export const MeetingRecordingSchema = z
  .object({
    uuid: z.string(),
    id: z.number(),
    host_id: text,
    host_email: text,
    topic: text,
    type: z.number().optional(),
    start_time: z.coerce.date(),
    duration: z.number().default(0),
    total_size: z.number().default(0),
    recording_count: z.number().default(0),
    recording_files: z.array(RecordingFileSchema).default([]),
  })
  .passthrough();

export type MeetingRecording = z.infer<typeof MeetingRecordingSchema>;

const PageSchema = z
  .object({
    next_page_token: z.string().nullable().optional(),
  })
  .passthrough();

export interface CreateZoomUser {
  firstName: string;
  lastName: string;
  email: string;
  type?: number;
}

export interface UpdateZoomUser {
  firstName?: string;
  lastName?: string;
  usePmi?: boolean;
  vanityName?: string;
  type?: number;
}

/** YYYY-MM-DD in UTC */
function day(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class ZoomClient extends ApiClient {
  private readonly tokens: AccessTokenSource;

  constructor(tokens: AccessTokenSource, retry: Omit<RetryOptions, "service" | "logger"> = {}) {
    super("zoom", ZOOM_API_BASE, retry);
    this.tokens = tokens;
  }

  protected async getAuthHeaders(): Promise<Record<string, string>> {
    return { Authorization: bearer(await this.tokens.accessToken()) };
  }

  /**
   * Follow `next_page_token` over a list endpoint whose items sit under `key`.
   */
  private async listAll<T extends z.ZodTypeAny>(
    key: string,
    item: T,
    path: string,
    query: Query = {}
  ): Promise<z.output<T>[]> {
    const rows = z.array(item).default([]);
    const results: z.output<T>[] = [];
    let nextPageToken: string | undefined;

    do {
      const page = await this.getJson(PageSchema, path, {
        ...query,
        page_size: PAGE_SIZE,
        next_page_token: nextPageToken,
      });
      results.push(...rows.parse(page[key]));
      nextPageToken = page.next_page_token || undefined;
    } while (nextPageToken);

    return results;
  }

  async listUsers(status: "active" | "inactive" | "pending" = "active"): Promise<ZoomUser[]> {
    return this.listAll("users", ZoomUserSchema, "users", { status });
  }

  /**
   * Look a user up by email or id. Users signing in with Google are not
   * found under the default login type, so that is tried second.
   */
  async getUser(emailOrId: string): Promise<ZoomUser | null> {
    for (const loginType of [100, 1]) {
      try {
        return await this.getJson(ZoomUserSchema, `users/${encodeURIComponent(emailOrId)}`, { login_type: loginType });
      } catch (error) {
        if (!(error instanceof ApiError && error.isNotFound)) {
          throw error;
        }
      }
    }
    return null;
  }

  async createUser(user: CreateZoomUser): Promise<ZoomUser> {
    return this.requestJson(ZoomUserSchema, "POST", "users", {
      json: {
        action: "create",
        user_info: {
          first_name: user.firstName,
          last_name: user.lastName,
          email: user.email,
          type: user.type ?? ZoomUserType.Licensed,
        },
      },
    });
  }

  async updateUser(emailOrId: string, update: UpdateZoomUser): Promise<void> {
    await this.send("PATCH", `users/${encodeURIComponent(emailOrId)}`, {
      json: {
        first_name: update.firstName,
        last_name: update.lastName,
        use_pmi: update.usePmi,
        vanity_name: update.vanityName,
        type: update.type,
      },
    });
  }

  /**
   * Delete a user, or only disassociate them from the account.
   */
  async deleteUser(emailOrId: string, action: "delete" | "disassociate" = "delete"): Promise<void> {
    await this.send("DELETE", `users/${encodeURIComponent(emailOrId)}`, { query: { action } });
  }

  async listRooms(): Promise<Room[]> {
    return this.listAll("rooms", RoomSchema, "rooms");
  }

  /**
   * Cloud recordings of the whole account between two dates. The API
   * answers at most one month per request, so the range is walked in
   * 30-day windows.
   */
  async listRecordingsAsAdmin(from: Date, to: Date = new Date()): Promise<MeetingRecording[]> {
    const meetings: MeetingRecording[] = [];
    let windowStart = from;

    while (windowStart.getTime() < to.getTime()) {
      const windowEnd = new Date(Math.min(windowStart.getTime() + RECORDING_WINDOW_DAYS * DAY_MS, to.getTime()));
      meetings.push(
        ...(await this.listAll("meetings", MeetingRecordingSchema, "accounts/me/recordings", {
          from: day(windowStart),
          to: day(windowEnd),
        }))
      );
      windowStart = new Date(windowEnd.getTime() + DAY_MS);
    }

    return meetings;
  }

  /**
   * Contents of a recording file from its download_url.
   */
  async downloadFile(downloadUrl: string): Promise<Uint8Array> {
    const response = await this.request("GET", downloadUrl, { headers: { Accept: "*/*" } });
    return new Uint8Array(await response.arrayBuffer());
  }

  /**
   * Removes a single recording file, leaving the rest of the meeting's recordings.
   */
  async deleteRecording(
    meetingId: string | number,
    recordingId: string,
    action: "trash" | "delete" = "trash"
  ): Promise<void> {
    await this.send(
      "DELETE",
      `meetings/${encodeURIComponent(String(meetingId))}/recordings/${encodeURIComponent(recordingId)}`,
      { query: { action } }
    );
  }

  async deleteMeetingRecordings(meetingId: string | number, action: "trash" | "delete" = "trash"): Promise<void> {
    await this.send("DELETE", `meetings/${encodeURIComponent(String(meetingId))}/recordings`, { query: { action } });
  }
}
