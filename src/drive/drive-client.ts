/**
 * Google Drive API client with Service Account authentication
 *
 * Implements the FileSource capability: recursive listing under a root
 * folder and raw content download (Workspace documents are exported).
 */

import { drive_v3, drive } from '@googleapis/drive';
import { JWT } from 'google-auth-library';
import {
  DriveError,
  FileSourceError,
  FileSourceErrorKind,
  RetryConfig,
  toError,
  withRetry,
} from '../errors/index.js';
import type { FetchedContent, FileSource } from '../types/file-source.js';
import type { RemoteFile } from '../types/index.js';

/**
 * Service Account credentials for Google Drive API
 */
export interface DriveCredentials {
  /**
   * Service account email (e.g., "xxx@xxx.iam.gserviceaccount.com")
   */
  clientEmail: string;

  /**
   * Private key from service account JSON, including the PEM header
   */
  privateKey: string;

  /**
   * Optional: Email of user to impersonate (for domain-wide delegation)
   */
  subject?: string;
}

export interface DriveClientOptions {
  /**
   * Attempts per request for transient failures (1 disables retrying)
   */
  maxRetries?: number;
  retryDelayMs?: number;
}

const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';
const SHORTCUT_MIME_TYPE = 'application/vnd.google-apps.shortcut';
const WORKSPACE_PREFIX = 'application/vnd.google-apps.';

/**
 * Export formats for Google Workspace documents, which have no binary content
 */
const WORKSPACE_EXPORTS: Record<string, string> = {
  'application/vnd.google-apps.document': 'text/plain',
  'application/vnd.google-apps.presentation': 'text/plain',
  'application/vnd.google-apps.spreadsheet': 'text/csv',
};
const DEFAULT_EXPORT = 'application/pdf';

export function exportTypeFor(mimeType: string): string | undefined {
  if (!mimeType.startsWith(WORKSPACE_PREFIX)) {
    return undefined;
  }
  return WORKSPACE_EXPORTS[mimeType] ?? DEFAULT_EXPORT;
}

/**
 * Pull an HTTP status out of a gaxios-style error
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }

  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }

  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }

  if ('code' in error) {
    const code = Number(error.code);
    if (Number.isInteger(code) && code >= 100 && code < 600) {
      return code;
    }
  }

  return undefined;
}

export function classifyFetchError(error: unknown): FileSourceErrorKind {
  const status = httpStatusOf(error);

  if (status === 404) {
    return 'NOT_FOUND';
  }
  if (status === 401 || status === 403) {
    return 'PERMISSION_DENIED';
  }
  return 'TRANSIENT_IO';
}

function toBytes(data: unknown): Uint8Array {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  if (typeof data === 'string') {
    return new TextEncoder().encode(data);
  }
  throw new Error(`Unexpected response body type: ${typeof data}`);
}

/**
 * Google Drive client with Service Account authentication
 */
export class DriveClient implements FileSource {
  private static readonly DRIVE_SCOPES = ['https://www.googleapis.com/auth/drive.readonly'];
  private static readonly LIST_FIELDS =
    'nextPageToken, files(id, name, mimeType, size, modifiedTime, webViewLink)';

  private drive: drive_v3.Drive;
  private auth: JWT;
  private retryConfig: RetryConfig;

  constructor(credentials: DriveCredentials, options: DriveClientOptions = {}) {
    this.auth = new JWT({
      email: credentials.clientEmail,
      key: credentials.privateKey,
      scopes: DriveClient.DRIVE_SCOPES,
      subject: credentials.subject, // For domain-wide delegation
    });

    this.drive = drive({ version: 'v3', auth: this.auth });
    this.retryConfig = {
      maxRetries: options.maxRetries ?? 3,
      delayMs: options.retryDelayMs ?? 1000,
      exponentialBackoff: true,
    };
  }

  /**
   * Create a DriveClient from a service account JSON string
   */
  static fromJSON(json: string, subject?: string, options?: DriveClientOptions): DriveClient {
    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (error) {
      throw new DriveError('Failed to parse service account JSON', {
        error: toError(error).message,
      });
    }

    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new DriveError('Invalid service account JSON: must be a valid JSON object');
    }

    const clientEmail = 'client_email' in parsed ? parsed.client_email : undefined;
    const privateKey = 'private_key' in parsed ? parsed.private_key : undefined;

    if (typeof clientEmail !== 'string' || !clientEmail) {
      throw new DriveError('Invalid service account JSON: client_email must be a non-empty string');
    }

    if (typeof privateKey !== 'string' || !privateKey) {
      throw new DriveError('Invalid service account JSON: private_key must be a non-empty string');
    }

    return new DriveClient({ clientEmail, privateKey, subject }, options);
  }

  /**
   * Recursively list every file under the root folder
   */
  async listFiles(rootFolderId: string): Promise<RemoteFile[]> {
    const files: RemoteFile[] = [];
    const seen = new Set<string>();

    try {
      await this.scanFolder(rootFolderId, '', files, seen);
      return files;
    } catch (error) {
      throw new DriveError('Failed to list files', {
        rootFolderId,
        error: toError(error).message,
      });
    }
  }

  /**
   * Walk one folder, recursing into subfolders. Folder ids form a tree,
   * and the seen set also guards against files reachable through two parents.
   */
  private async scanFolder(
    folderId: string,
    folderPath: string,
    files: RemoteFile[],
    seen: Set<string>
  ): Promise<void> {
    let pageToken: string | undefined;

    do {
      const response = await withRetry(async () => {
        return await this.drive.files.list({
          q: `'${folderId}' in parents and trashed=false`,
          pageToken,
          fields: DriveClient.LIST_FIELDS,
          pageSize: 100,
          supportsAllDrives: true,
          includeItemsFromAllDrives: true,
        });
      }, this.retryConfig);

      const items = response.data.files || [];

      for (const item of items) {
        if (!item.id || !item.name) continue;

        const currentPath = folderPath ? `${folderPath}/${item.name}` : item.name;

        if (item.mimeType === FOLDER_MIME_TYPE) {
          await this.scanFolder(item.id, currentPath, files, seen);
        } else if (item.mimeType !== SHORTCUT_MIME_TYPE && !seen.has(item.id)) {
          seen.add(item.id);
          files.push(this.toRemoteFile(item, item.id, item.name, currentPath));
        }
      }

      pageToken = response.data.nextPageToken || undefined;
    } while (pageToken);
  }

  private toRemoteFile(
    item: drive_v3.Schema$File,
    id: string,
    name: string,
    path: string
  ): RemoteFile {
    const size = item.size ? Number.parseInt(item.size, 10) : 0;

    return {
      id,
      name,
      path,
      mimeType: item.mimeType || 'application/octet-stream',
      size: Number.isFinite(size) && size >= 0 ? size : 0,
      modifiedTime: item.modifiedTime ?? '',
      url: item.webViewLink || '',
    };
  }

  /**
   * Download raw content; Workspace documents are exported
   */
  async fetchContent(fileId: string): Promise<FetchedContent> {
    const meta = await this.request(fileId, () =>
      this.drive.files.get({ fileId, fields: 'id, mimeType', supportsAllDrives: true })
    );
    const mimeType = meta.data.mimeType || 'application/octet-stream';
    const exportType = exportTypeFor(mimeType);

    if (exportType) {
      const response = await this.request(fileId, () =>
        this.drive.files.export(
          { fileId, mimeType: exportType },
          { responseType: 'arraybuffer' }
        )
      );
      return { data: toBytes(response.data), contentType: exportType };
    }

    const response = await this.request(fileId, () =>
      this.drive.files.get(
        { fileId, alt: 'media', supportsAllDrives: true },
        { responseType: 'arraybuffer' }
      )
    );

    return { data: toBytes(response.data), contentType: mimeType };
  }

  /**
   * Run a per-file request, mapping failures to FileSourceError and
   * retrying only the transient ones
   */
  private async request<T>(fileId: string, call: () => Promise<T>): Promise<T> {
    return withRetry(
      async () => {
        try {
          return await call();
        } catch (error) {
          const err = toError(error);
          throw new FileSourceError(
            `Failed to fetch file content: ${err.message}`,
            classifyFetchError(error),
            { fileId, status: httpStatusOf(error) }
          );
        }
      },
      {
        ...this.retryConfig,
        shouldRetry: error => error instanceof FileSourceError && error.retryable,
      }
    );
  }
}
