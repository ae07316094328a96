import { DEFAULT_GROUPS_PAGE_SIZE, DEFAULT_QUERY_PAGE_SIZE } from '../config/defaults.js';
import { AuthError, describeError } from '../errors.js';
import type { EntriesQueryPayload, HttpMethod } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { sendJson, type FetchLike, type QueryParams } from './http.js';
import {
  dataListSchema,
  entriesPageSchema,
  groupSchema,
  parseResponse,
  uploadResponseSchema,
  userSchema,
  type GroupInfo,
  type UploadInfo,
  type UserInfo,
} from './schemas.js';

export interface NomadClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs?: number | undefined;
  fetch?: FetchLike | undefined;
  logger?: Logger | undefined;
}

export interface RequestOptions {
  query?: QueryParams | undefined;
  body?: unknown;
  /** When false, a 401 fails this call only and leaves the session usable. */
  terminalOnReject?: boolean | undefined;
}

export interface EntriesPage {
  data: unknown[];
  total: number;
}

export class NomadClient {
  readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number | undefined;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly logger: Logger | undefined;
  private rejection: AuthError | undefined;

  constructor(options: NomadClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch;
    this.logger = options.logger;
  }

  /**
   * Performs an authenticated call. Once the token has been rejected with a 401
   * every later call fails with the same AuthError without touching the network,
   * unless the call opted out with `terminalOnReject: false`.
   */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    if (this.rejection) {
      throw this.rejection;
    }

    try {
      return await sendJson(
        {
          method,
          baseUrl: this.baseUrl,
          path,
          query: options.query,
          body: options.body,
          headers: { Authorization: `Bearer ${this.token}` },
        },
        { fetch: this.fetchImpl, timeoutMs: this.timeoutMs },
      );
    } catch (error) {
      if (error instanceof AuthError && error.status === 401 && options.terminalOnReject !== false) {
        this.rejection = error;
      }
      this.logger?.(`${method} ${path} failed: ${describeError(error)}`);
      throw error;
    }
  }

  /** Returns one page of `entries/archive/query`; adds a pagination block when the filter has none. */
  async query(filter: Record<string, unknown>, pageSize: number = DEFAULT_QUERY_PAGE_SIZE): Promise<Record<string, unknown>[]> {
    const payload = filter.pagination === undefined ? { ...filter, pagination: { page_size: pageSize } } : filter;
    const response = await this.request('POST', 'entries/archive/query', { body: payload });
    return parseResponse(dataListSchema, response ?? {}, 'entries/archive/query').data;
  }

  /**
   * One page of `entries/query`. The server answers an `admin`-owner query from a
   * non-admin account with 401, so that refusal never ends the session.
   */
  async queryEntries(payload: EntriesQueryPayload): Promise<EntriesPage> {
    const response = await this.request('POST', 'entries/query', {
      body: payload,
      terminalOnReject: payload.owner !== 'admin',
    });
    const page = parseResponse(entriesPageSchema, response, 'entries/query');
    return { data: page.data, total: page.pagination?.total ?? 0 };
  }

  async getCurrentUser(): Promise<UserInfo> {
    const response = await this.request('GET', 'users/me');
    return parseResponse(userSchema, response, 'users/me');
  }

  async getUser(userId: string): Promise<UserInfo> {
    const path = `users/${encodeURIComponent(userId)}`;
    const response = await this.request('GET', path);
    return parseResponse(userSchema, unwrapData(response), path);
  }

  async getUserByEmail(email: string): Promise<UserInfo | undefined> {
    const response = await this.request('GET', 'users', { query: { email } });
    const [first] = parseResponse(dataListSchema, response ?? {}, 'users').data;
    return first === undefined ? undefined : parseResponse(userSchema, first, 'users');
  }

  async getUpload(uploadId: string): Promise<UploadInfo> {
    const path = `uploads/${encodeURIComponent(uploadId)}`;
    const response = await this.request('GET', path);
    return parseResponse(uploadResponseSchema, response, path).data;
  }

  async getGroups(pageSize: number = DEFAULT_GROUPS_PAGE_SIZE): Promise<GroupInfo[]> {
    const response = await this.request('GET', 'groups', { query: { page_size: pageSize } });
    return parseResponse(dataListSchema, response ?? {}, 'groups').data.map((group) =>
      parseResponse(groupSchema, group, 'groups'),
    );
  }

  async getGroup(groupId: string): Promise<GroupInfo> {
    const path = `groups/${encodeURIComponent(groupId)}`;
    return parseResponse(groupSchema, await this.request('GET', path), path);
  }

  async createGroup(groupName: string, members: string[] = []): Promise<GroupInfo> {
    const body = members.length > 0 ? { group_name: groupName, members } : { group_name: groupName };
    return parseResponse(groupSchema, await this.request('POST', 'groups', { body }), 'groups');
  }

  /** Replaces the group's member list with `members`. */
  async updateGroupMembers(groupId: string, members: string[]): Promise<GroupInfo> {
    const path = `groups/${encodeURIComponent(groupId)}/edit`;
    return parseResponse(groupSchema, await this.request('POST', path, { body: { members } }), path);
  }

  async deleteGroup(groupId: string): Promise<void> {
    await this.request('DELETE', `groups/${encodeURIComponent(groupId)}`);
  }
}

// Some deployments wrap single resources in `{ data: ... }`.
function unwrapData(response: unknown): unknown {
  if (response && typeof response === 'object' && 'data' in response) {
    const { data } = response;
    if (data && typeof data === 'object' && !Array.isArray(data)) {
      return data;
    }
  }
  return response;
}
