/**
 * Google Drive API Client
 *
 * Files and folders on shared drives: search, create, upload, delete.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { ApiClient, bearer, type RetryOptions } from "../../lib/http-client.js";
import type { AccessTokenSource } from "../../lib/oauth.js";

export const DRIVE_API_BASE = "https://www.googleapis.com/drive/v3/";
export const DRIVE_UPLOAD_URL = "https://www.googleapis.com/upload/drive/v3/files";
export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";
const PAGE_SIZE = 1000;
const FILE_FIELDS = "id,name,mimeType,parents,driveId,webViewLink,modifiedTime,size";

export const DriveFileSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    mimeType: z.string().default(""),
    parents: z.array(z.string()).default([]),
    driveId: z.string().optional(),
    webViewLink: z.string().optional(),
    modifiedTime: z.string().optional(),
    size: z.string().optional(),
  })
  .passthrough();

export type DriveFile = z.infer<typeof DriveFileSchema>;

const FileListSchema = z.object({
  files: z.array(DriveFileSchema).default([]),
  nextPageToken: z.string().optional(),
});

export const SharedDriveSchema = z.object({ id: z.string(), name: z.string() }).passthrough();

export type SharedDrive = z.infer<typeof SharedDriveSchema>;

const DriveListSchema = z.object({
  drives: z.array(SharedDriveSchema).default([]),
  nextPageToken: z.string().optional(),
});

/** Quote a value inside a Drive search query */
export function queryString(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

const shared = { supportsAllDrives: "true" };

export class GoogleDriveClient extends ApiClient {
  private readonly tokens: AccessTokenSource;

  constructor(tokens: AccessTokenSource, retry: Omit<RetryOptions, "service" | "logger"> = {}) {
    super("google-drive", DRIVE_API_BASE, retry);
    this.tokens = tokens;
  }

  protected async getAuthHeaders(): Promise<Record<string, string>> {
    return { Authorization: bearer(await this.tokens.accessToken()) };
  }

  /**
   * Every file matching a search query, across all drives.
   */
  async listFiles(q: string): Promise<DriveFile[]> {
    const files: DriveFile[] = [];
    let pageToken: string | undefined;

    do {
      const page = await this.getJson(FileListSchema, "files", {
        q,
        ...shared,
        includeItemsFromAllDrives: "true",
        corpora: "allDrives",
        pageSize: PAGE_SIZE,
        fields: `nextPageToken,files(${FILE_FIELDS})`,
        pageToken,
      });
      files.push(...page.files);
      pageToken = page.nextPageToken;
    } while (pageToken);

    return files;
  }

  /**
   * Shared drive by exact name.
   *
   * @throws Error when no shared drive has that name
   */
  async getDriveByName(name: string): Promise<SharedDrive> {
    let pageToken: string | undefined;
    do {
      const page = await this.getJson(DriveListSchema, "drives", {
        q: `name = ${queryString(name)}`,
        useDomainAdminAccess: "true",
        pageSize: 100,
        pageToken,
      });
      const drive = page.drives.find((d) => d.name === name);
      if (drive) {
        return drive;
      }
      pageToken = page.nextPageToken;
    } while (pageToken);

    throw new Error(`Google shared drive not found: ${name}`);
  }

  async findFileByName(parentId: string, name: string): Promise<DriveFile | null> {
    const files = await this.listFiles(
      `name = ${queryString(name)} and ${queryString(parentId)} in parents and trashed = false`
    );
    return files[0] ?? null;
  }

  /**
   * Return the folder's id, creating it when it does not exist yet.
   */
  async createFolder(parentId: string, name: string): Promise<string> {
    const existing = await this.listFiles(
      `name = ${queryString(name)} and ${queryString(parentId)} in parents and mimeType = ${queryString(FOLDER_MIME_TYPE)} and trashed = false`
    );
    if (existing[0]) {
      return existing[0].id;
    }

    const folder = await this.requestJson(DriveFileSchema, "POST", "files", {
      query: { ...shared, fields: FILE_FIELDS },
      json: { name, mimeType: FOLDER_MIME_TYPE, parents: [parentId] },
    });
    this.logger.info(`Created folder ${name}`, { id: folder.id });
    return folder.id;
  }

  async deleteFile(fileId: string): Promise<void> {
    await this.send("DELETE", `files/${encodeURIComponent(fileId)}`, { query: shared });
  }

  /**
   * Create or replace a file by name in a folder (multipart upload).
   */
  async uploadFile(parentId: string, name: string, mimeType: string, contents: string | Uint8Array): Promise<DriveFile> {
    const existing = await this.findFileByName(parentId, name);
    const boundary = `cio-${randomUUID()}`;
    // parents may not be set on update
    const metadata = existing ? { name, mimeType } : { name, mimeType, parents: [parentId] };

    const body = new Blob([
      `--${boundary}\r\nContent-Type: application/json; charset=UTF-8\r\n\r\n${JSON.stringify(metadata)}\r\n`,
      `--${boundary}\r\nContent-Type: ${mimeType}\r\n\r\n`,
      contents,
      `\r\n--${boundary}--`,
    ]);

    return this.requestJson(
      DriveFileSchema,
      existing ? "PATCH" : "POST",
      existing ? `${DRIVE_UPLOAD_URL}/${encodeURIComponent(existing.id)}` : DRIVE_UPLOAD_URL,
      {
        query: { uploadType: "multipart", ...shared, fields: FILE_FIELDS },
        headers: { "Content-Type": `multipart/related; boundary=${boundary}` },
        body,
      }
    );
  }
}
