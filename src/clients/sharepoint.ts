import { AZURE_LOGIN_BASE, GRAPH_API_BASE, GRAPH_SCOPE, config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { ApiError } from '../utils/errors.js';
import { fetchWithTimeout } from '../utils/http.js';
import { fileTimestamp } from '../utils/dates.js';
import type {
  GraphCollection,
  GraphDriveItem,
  GraphListItem,
  ListFields,
} from '../types/index.js';

/**
 * Microsoft Graph client for one SharePoint site
 * Documentation: https://learn.microsoft.com/graph/api/resources/sharepoint
 */

interface TokenResponse {
  access_token: string;
  expires_in?: number;
}

interface CachedToken {
  value: string;
  expiresAt: number;
}

export interface SharePointSettings {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  siteUrl: string;
}

export interface SiteLocation {
  hostname: string;
  path: string;
}

/** Lookup column to probe: candidate internal names and the parent item id. */
export interface LookupTarget {
  candidates: readonly string[];
  value: string;
}

export interface UploadedFile {
  id: string;
  name: string;
  webUrl: string | null;
  size: number | null;
  folderCreated: boolean;
}

export interface FolderListing {
  files: GraphDriveItem[];
  folders: GraphDriveItem[];
}

export interface UploadFileOptions {
  folder?: string;
  overwrite?: boolean;
}

// Renew the token this long before Azure AD says it expires
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const CONTENT_TYPES: Record<string, string> = {
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  xls: 'application/vnd.ms-excel',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  doc: 'application/msword',
  pdf: 'application/pdf',
  txt: 'text/plain',
  csv: 'text/csv',
  json: 'application/json',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  zip: 'application/zip',
};

export function contentTypeFor(filename: string): string {
  const dot = filename.lastIndexOf('.');
  const extension = dot === -1 ? '' : filename.slice(dot + 1).toLowerCase();
  return CONTENT_TYPES[extension] ?? 'application/octet-stream';
}

/**
 * `https://contoso.sharepoint.com/sites/Finanzas/` → `{ hostname: 'contoso.sharepoint.com', path: 'sites/Finanzas' }`
 */
export function parseSiteUrl(siteUrl: string): SiteLocation {
  const url = new URL(siteUrl);
  return {
    hostname: url.hostname,
    path: url.pathname.replace(/^\/+|\/+$/g, ''),
  };
}

function encodePath(path: string): string {
  return path
    .split('/')
    .filter(Boolean)
    .map(segment => encodeURIComponent(segment))
    .join('/');
}

function splitFolders(folder: string): string[] {
  return folder.split('/').filter(Boolean);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Graph returns the new item id at the top level; some tenants only echo it in `fields`.
 */
export function extractCreatedId(body: unknown): string | null {
  if (!isRecord(body)) return null;
  const candidates: unknown[] = [body.id];
  if (isRecord(body.fields)) {
    candidates.push(body.fields.id, body.fields.ID);
  }
  for (const candidate of candidates) {
    if (typeof candidate === 'string' && candidate !== '') return candidate;
    if (typeof candidate === 'number') return String(candidate);
  }
  return null;
}

class SharePointClient {
  private settings: SharePointSettings;
  private token: CachedToken | null = null;
  private siteId: string | null = null;
  private listIds = new Map<string, string>();
  // list name → lookup column name the list accepted last
  private lookupHits = new Map<string, string>();

  constructor(settings?: Partial<SharePointSettings>) {
    this.settings = {
      tenantId: config.azureTenantId,
      clientId: config.azureClientId,
      clientSecret: config.azureClientSecret,
      siteUrl: config.siteUrl,
      ...settings,
    };
  }

  /** Drop cached token, site, list and lookup names. */
  clearCache(): void {
    this.token = null;
    this.siteId = null;
    this.listIds.clear();
    this.lookupHits.clear();
  }

  // ===== Authentication =====
  async getAccessToken(): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAt) {
      return this.token.value;
    }

    const url = `${AZURE_LOGIN_BASE}/${this.settings.tenantId}/oauth2/v2.0/token`;
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.settings.clientId,
      client_secret: this.settings.clientSecret,
      scope: GRAPH_SCOPE,
    });

    const response = await fetchWithTimeout(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: body.toString(),
    });

    if (!response.ok) {
      const errorText = await response.text();
      logger.error(`Azure AD token error [${response.status}]:`, errorText);
      throw new ApiError('Azure AD', response.status, errorText);
    }

    const data = (await response.json()) as TokenResponse;
    const lifetimeMs = (data.expires_in ?? 3600) * 1000;
    this.token = {
      value: data.access_token,
      expiresAt: Date.now() + lifetimeMs - TOKEN_EXPIRY_MARGIN_MS,
    };
    logger.debug('Azure AD token acquired');
    return data.access_token;
  }

  /**
   * Authenticated Graph call. `target` is either a path under the v1.0 root
   * or an absolute `@odata.nextLink`. The response is returned as-is.
   */
  private async request(target: string, options: RequestInit = {}): Promise<Response> {
    const token = await this.getAccessToken();
    const url = target.startsWith('https://') ? target : `${GRAPH_API_BASE}${target}`;

    return fetchWithTimeout(url, {
      ...options,
      headers: {
        'Authorization': `Bearer ${token}`,
        'Content-Type': 'application/json',
        ...options.headers,
      },
    });
  }

  private async fetch<T>(target: string, options: RequestInit = {}): Promise<T> {
    const response = await this.request(target, options);

    if (!response.ok) {
      const errorText = await response.text();
      logger.error(`Graph API error [${response.status}]:`, errorText);
      throw new ApiError('Graph', response.status, errorText);
    }

    return response.json() as Promise<T>;
  }

  // ===== Resource resolution =====
  async getSiteId(): Promise<string> {
    if (this.siteId) return this.siteId;

    const { hostname, path } = parseSiteUrl(this.settings.siteUrl);
    const site = await this.fetch<{ id: string }>(`/sites/${hostname}:/${path}?$select=id`);
    this.siteId = site.id;
    logger.debug(`Resolved site ${hostname}/${path} → ${site.id}`);
    return site.id;
  }

  async getListId(listName: string): Promise<string> {
    const cached = this.listIds.get(listName);
    if (cached) return cached;

    const siteId = await this.getSiteId();
    const filter = encodeURIComponent(`displayName eq '${listName.replace(/'/g, "''")}'`);
    const lists = await this.fetch<GraphCollection<{ id: string; displayName?: string }>>(
      `/sites/${siteId}/lists?$filter=${filter}`
    );

    const list = lists.value[0];
    if (!list) {
      throw new Error(`SharePoint list "${listName}" not found`);
    }

    this.listIds.set(listName, list.id);
    return list.id;
  }

  private async itemsPath(listName: string): Promise<string> {
    const siteId = await this.getSiteId();
    const listId = await this.getListId(listName);
    return `/sites/${siteId}/lists/${listId}/items`;
  }

  // ===== List items =====
  private async postItem(path: string, fields: ListFields): Promise<Response> {
    return this.request(path, {
      method: 'POST',
      body: JSON.stringify({ fields }),
    });
  }

  /**
   * Create one list item. Anything but 201 throws; returns the new item id
   * (null when Graph did not echo one).
   */
  async createListItem(listName: string, fields: ListFields): Promise<string | null> {
    const path = await this.itemsPath(listName);
    const response = await this.postItem(path, fields);

    if (response.status !== 201) {
      const errorText = await response.text();
      throw new ApiError('Graph', response.status, errorText);
    }

    return extractCreatedId(await response.json());
  }

  /**
   * Create an item that points at a parent through a lookup column whose
   * internal name is not known up front. Each candidate name is tried until
   * one is accepted; the accepted name is tried first for the next rows of
   * the same list.
   */
  async createListItemWithLookup(
    listName: string,
    fields: ListFields,
    lookup: LookupTarget
  ): Promise<string | null> {
    const path = await this.itemsPath(listName);
    const remembered = this.lookupHits.get(listName);
    const candidates = remembered
      ? [remembered, ...lookup.candidates.filter(name => name !== remembered)]
      : [...lookup.candidates];

    let lastStatus = 0;
    let lastBody = 'no lookup field candidates';

    for (const candidate of candidates) {
      const response = await this.postItem(path, { ...fields, [candidate]: lookup.value });

      if (response.status === 201) {
        if (remembered !== candidate) {
          logger.debug(`List "${listName}" accepts lookup field ${candidate}`);
          this.lookupHits.set(listName, candidate);
        }
        return extractCreatedId(await response.json());
      }

      lastStatus = response.status;
      lastBody = await response.text();
      logger.debug(`Lookup field ${candidate} rejected by "${listName}" [${lastStatus}]`);
    }

    throw new ApiError('Graph', lastStatus, lastBody);
  }

  /**
   * Every item of a list with its fields, following `@odata.nextLink`.
   */
  async getListItems(listName: string): Promise<GraphListItem[]> {
    const items: GraphListItem[] = [];
    let next: string | undefined = `${await this.itemsPath(listName)}?$expand=fields`;

    while (next) {
      const page: GraphCollection<GraphListItem> = await this.fetch<GraphCollection<GraphListItem>>(next);
      items.push(...page.value);
      next = page['@odata.nextLink'];
    }

    logger.debug(`Read ${items.length} items from "${listName}"`);
    return items;
  }

  async findItemsByTitle(listName: string, title: string): Promise<GraphListItem[]> {
    const items = await this.getListItems(listName);
    return items.filter(item => String(item.fields?.Title ?? '') === title);
  }

  async deleteListItem(listName: string, itemId: string): Promise<void> {
    const path = await this.itemsPath(listName);
    const response = await this.request(`${path}/${encodeURIComponent(itemId)}`, { method: 'DELETE' });

    if (response.status !== 204) {
      const errorText = await response.text();
      throw new ApiError('Graph', response.status, errorText);
    }
  }

  // ===== Document library =====
  private async driveItemPath(itemPath: string): Promise<string> {
    const siteId = await this.getSiteId();
    return `/sites/${siteId}/drive/root:/${encodePath(itemPath)}`;
  }

  async driveItemExists(itemPath: string): Promise<boolean> {
    const response = await this.request(await this.driveItemPath(itemPath));
    if (response.status === 200) return true;
    if (response.status === 404) return false;
    const errorText = await response.text();
    throw new ApiError('Graph', response.status, errorText);
  }

  /**
   * Make sure every segment of `folder` exists, creating the missing ones.
   */
  async createFolder(folder: string): Promise<void> {
    const siteId = await this.getSiteId();
    const segments = splitFolders(folder);

    for (let depth = 1; depth <= segments.length; depth++) {
      const current = segments.slice(0, depth).join('/');
      if (await this.driveItemExists(current)) {
        continue;
      }

      const parent = segments.slice(0, depth - 1).join('/');
      const childrenPath = parent
        ? `/sites/${siteId}/drive/root:/${encodePath(parent)}:/children`
        : `/sites/${siteId}/drive/root/children`;

      await this.fetch<GraphDriveItem>(childrenPath, {
        method: 'POST',
        body: JSON.stringify({
          name: segments[depth - 1],
          folder: {},
          '@microsoft.graph.conflictBehavior': 'rename',
        }),
      });
      logger.info(`Created folder ${current}`);
    }
  }

  async listFolder(folder = ''): Promise<FolderListing> {
    const siteId = await this.getSiteId();
    const path = splitFolders(folder).length > 0
      ? `/sites/${siteId}/drive/root:/${encodePath(folder)}:/children`
      : `/sites/${siteId}/drive/root/children`;

    const listing = await this.fetch<GraphCollection<GraphDriveItem>>(path);
    return {
      files: listing.value.filter(item => item.file !== undefined),
      folders: listing.value.filter(item => item.folder !== undefined),
    };
  }

  /**
   * PUT a file into the site's default document library. A missing folder is
   * created and the upload retried once. With `overwrite: false` an existing
   * file keeps its name and the upload gets a timestamp suffix.
   */
  async uploadFile(
    filename: string,
    content: Uint8Array,
    options: UploadFileOptions = {}
  ): Promise<UploadedFile> {
    const folder = splitFolders(options.folder ?? '').join('/');
    const overwrite = options.overwrite ?? true;
    let name = filename;

    if (!overwrite && (await this.driveItemExists(folder ? `${folder}/${name}` : name))) {
      const dot = name.lastIndexOf('.');
      const base = dot === -1 ? name : name.slice(0, dot);
      const extension = dot === -1 ? '' : name.slice(dot);
      name = `${base}_${fileTimestamp()}${extension}`;
      logger.info(`File exists, uploading as ${name}`);
    }

    const target = `${await this.driveItemPath(folder ? `${folder}/${name}` : name)}:/content`;
    const put = () =>
      this.request(target, {
        method: 'PUT',
        headers: { 'Content-Type': contentTypeFor(name) },
        body: content,
      });

    let folderCreated = false;
    let response = await put();

    if (response.status === 404 && folder) {
      logger.warn(`Folder ${folder} not found, creating it`);
      await this.createFolder(folder);
      folderCreated = true;
      response = await put();
    }

    if (response.status !== 200 && response.status !== 201) {
      const errorText = await response.text();
      logger.error(`Upload of ${name} failed [${response.status}]:`, errorText);
      throw new ApiError('Graph', response.status, errorText);
    }

    const item = (await response.json()) as GraphDriveItem;
    logger.info(`Uploaded ${item.name} (${content.byteLength} bytes)`);
    return {
      id: item.id,
      name: item.name,
      webUrl: item.webUrl ?? null,
      size: item.size ?? null,
      folderCreated,
    };
  }
}

export { SharePointClient };
export const sharepoint = new SharePointClient();
