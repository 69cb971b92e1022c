import { google, sheets_v4 } from 'googleapis';
import NodeCache from 'node-cache';
import { DateTime } from 'luxon';
import { SystemActorDeletionError } from '../domain/errors';
import { ActorId, Book, BookPage, Permission, Role, SYSTEM_ACTOR_ID, User } from '../domain/types';
import { BookRepository, PermissionRepository, QueryOptions, RoleRepository, UserRepository } from './interfaces';
import { withRetry } from '../utils/retry';
import logger from '../utils/logger';

export const SHEET_PERMISSIONS = 'permissions';
export const SHEET_ROLES = 'roles';
export const SHEET_ROLE_PERMISSIONS = 'role_permissions';
export const SHEET_USER_ROLES = 'user_roles';
export const SHEET_USERS = 'users';
export const SHEET_BOOKS = 'books';

export const HEADERS: Record<string, string[]> = {
  [SHEET_PERMISSIONS]: ['id', 'name'],
  [SHEET_ROLES]: ['id', 'name'],
  [SHEET_ROLE_PERMISSIONS]: ['role_id', 'permission_id'],
  [SHEET_USER_ROLES]: ['user_id', 'role_id'],
  [SHEET_USERS]: ['id', 'name', 'email', 'password_hash', 'created_at', 'updated_at'],
  [SHEET_BOOKS]: ['id', 'title', 'description', 'created_at', 'updated_at']
};

// Access tabs are read on every check and never cached.
const CACHED_SHEETS = new Set([SHEET_USERS, SHEET_BOOKS]);

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

type SheetRow = string[];
type SheetRows = SheetRow[];
type SheetRowMap = Record<string, string>;

interface RequestOptions {
  signal?: AbortSignal;
}

/** The subset of the Sheets v4 `spreadsheets.values` resource this repository uses. */
export interface SheetValuesApi {
  get(
    params: { spreadsheetId: string; range: string },
    options?: RequestOptions
  ): Promise<{ data: { values?: unknown[][] | null } }>;
  update(
    params: { spreadsheetId: string; range: string; valueInputOption: string; requestBody: { values: SheetRows } },
    options?: RequestOptions
  ): Promise<unknown>;
  append(
    params: {
      spreadsheetId: string;
      range: string;
      valueInputOption: string;
      insertDataOption: string;
      requestBody: { values: SheetRows };
    },
    options?: RequestOptions
  ): Promise<unknown>;
}

export interface GoogleSheetsRepositoryOptions {
  spreadsheetId: string;
  cacheTtlSeconds: number;
  timeoutMs: number;
  retries?: number;
}

export const toSheetValuesApi = (values: sheets_v4.Resource$Spreadsheets$Values): SheetValuesApi => ({
  get: (params, options) => values.get(params, options),
  update: (params, options) => values.update(params, options),
  append: (params, options) => values.append(params, options)
});

export const createSheetsClient = (serviceAccountJson: string): sheets_v4.Sheets => {
  const credentials: { client_email?: string; private_key?: string } = JSON.parse(serviceAccountJson);
  const auth = new google.auth.JWT({
    email: credentials.client_email,
    key: (credentials.private_key ?? '').replace(/\\n/g, '\n'),
    scopes: SCOPES
  });
  return google.sheets({ version: 'v4', auth });
};

const nowIso = (): string => DateTime.utc().toISO() ?? new Date().toISOString();

const toInt = (value: string | undefined): number => {
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : 0;
};

const toCell = (value: unknown): string => (value === undefined || value === null ? '' : String(value));

// Permission and role names are compared after trimming, wherever they are read.
const nameOf = (record: Record<string, string>): string => (record['name'] ?? '').trim();

export class GoogleSheetsRepository implements PermissionRepository, RoleRepository, UserRepository, BookRepository {
  private readonly cache: NodeCache;

  constructor(private readonly values: SheetValuesApi, private readonly options: GoogleSheetsRepositoryOptions) {
    this.cache = new NodeCache({ stdTTL: options.cacheTtlSeconds });
  }

  private cacheKey(tab: string): string {
    return `sheet:${tab}`;
  }

  private range(tab: string): string {
    return `${tab}!A:Z`;
  }

  // The storage timeout applies whether or not the caller brings its own signal.
  private requestOptions(signal?: AbortSignal): RequestOptions {
    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    return { signal: signal ? AbortSignal.any([signal, timeout]) : timeout };
  }

  private async fetch(tab: string, options: QueryOptions = {}): Promise<SheetRows> {
    const key = this.cacheKey(tab);
    if (CACHED_SHEETS.has(tab)) {
      const cached = this.cache.get<SheetRows>(key);
      if (cached) {
        return cached;
      }
    }

    const requestOptions = this.requestOptions(options.signal);
    const response = await withRetry(
      () =>
        this.values.get(
          {
            spreadsheetId: this.options.spreadsheetId,
            range: this.range(tab)
          },
          requestOptions
        ),
      { retries: this.options.retries, signal: requestOptions.signal }
    );
    const rows = (response.data.values || []).map((row) => row.map(toCell));
    if (CACHED_SHEETS.has(tab)) {
      this.cache.set(key, rows);
    }
    return rows;
  }

  private async write(tab: string, rows: SheetRows): Promise<void> {
    const requestOptions = this.requestOptions();
    await withRetry(
      () =>
        this.values.update(
          {
            spreadsheetId: this.options.spreadsheetId,
            range: this.range(tab),
            valueInputOption: 'RAW',
            requestBody: { values: rows }
          },
          requestOptions
        ),
      { retries: this.options.retries, signal: requestOptions.signal }
    );
    this.cache.del(this.cacheKey(tab));
  }

  private async append(tab: string, row: SheetRow): Promise<void> {
    const requestOptions = this.requestOptions();
    await withRetry(
      () =>
        this.values.append(
          {
            spreadsheetId: this.options.spreadsheetId,
            range: this.range(tab),
            valueInputOption: 'RAW',
            insertDataOption: 'INSERT_ROWS',
            requestBody: { values: [row] }
          },
          requestOptions
        ),
      { retries: this.options.retries, signal: requestOptions.signal }
    );
    this.cache.del(this.cacheKey(tab));
  }

  private headersMatch(current: string[], expected: string[]): boolean {
    if (current.length < expected.length) {
      return false;
    }
    return expected.every((value, index) => current[index] === value);
  }

  private async ensureHeader(tab: string): Promise<SheetRows> {
    const expected = HEADERS[tab];
    const rows = await this.fetch(tab);

    if (!rows.length) {
      await this.write(tab, [expected]);
      logger.info({ sheet: tab }, 'Header initialized');
      return [expected];
    }

    const [header, ...data] = rows;
    if (!this.headersMatch(header, expected)) {
      logger.warn({ sheet: tab }, 'Unexpected header detected, attempting to realign');
      return this.realignSheet(tab, header, data, expected);
    }

    return rows;
  }

  private async realignSheet(tab: string, header: string[], data: SheetRow[], expected: string[]): Promise<SheetRows> {
    const rebuilt: SheetRows = [expected];
    data.forEach((row) => {
      const record = this.mapRow(header, row);
      rebuilt.push(expected.map((column) => record[column] ?? ''));
    });

    await this.write(tab, rebuilt);
    return rebuilt;
  }

  private mapRow(header: string[], row: SheetRow): SheetRowMap {
    const map: SheetRowMap = {};
    header.forEach((column, index) => {
      map[column] = row[index] ?? '';
    });
    return map;
  }

  /** Read-only view of a tab keyed by its header row; never writes. */
  private async readRecords(tab: string, options: QueryOptions = {}): Promise<SheetRowMap[]> {
    const rows = await this.fetch(tab, options);
    if (!rows.length) {
      return [];
    }
    const [header, ...data] = rows;
    return data.map((row) => this.mapRow(header, row));
  }

  private async readForWrite(tab: string): Promise<{ header: string[]; records: SheetRowMap[] }> {
    const [header, ...data] = await this.ensureHeader(tab);
    return { header, records: data.map((row) => this.mapRow(header, row)) };
  }

  private toRow(header: string[], record: SheetRowMap): SheetRow {
    return header.map((column) => record[column] ?? '');
  }

  private async writeRecords(tab: string, header: string[], records: SheetRowMap[]): Promise<void> {
    await this.write(tab, [header, ...records.map((record) => this.toRow(header, record))]);
  }

  private async replaceRecords(
    tab: string,
    predicate: (record: SheetRowMap) => boolean,
    replacements: SheetRowMap[] = []
  ): Promise<number> {
    const { header, records } = await this.readForWrite(tab);
    const kept = records.filter((record) => !predicate(record));
    const removed = records.length - kept.length;
    if (removed === 0 && replacements.length === 0) {
      return 0;
    }
    await this.writeRecords(tab, header, [...kept, ...replacements]);
    return removed;
  }

  private nextId(records: SheetRowMap[]): number {
    return records.reduce((max, record) => Math.max(max, toInt(record['id'])), 0) + 1;
  }

  /* Permissions */

  async listPermissionNames(options: QueryOptions = {}): Promise<string[]> {
    const records = await this.readRecords(SHEET_PERMISSIONS, options);
    return records.map(nameOf).filter((name) => name.length > 0);
  }

  async listPermissions(): Promise<Permission[]> {
    const records = await this.readRecords(SHEET_PERMISSIONS);
    return records.map((record) => ({ id: toInt(record['id']), name: nameOf(record) }));
  }

  async createPermission(name: string): Promise<Permission> {
    const { records } = await this.readForWrite(SHEET_PERMISSIONS);
    const permission: Permission = { id: this.nextId(records), name };
    await this.append(SHEET_PERMISSIONS, [String(permission.id), permission.name]);
    return permission;
  }

  async deletePermission(name: string): Promise<boolean> {
    const { header, records } = await this.readForWrite(SHEET_PERMISSIONS);
    const target = records.find((record) => nameOf(record) === name);
    if (!target) {
      return false;
    }
    await this.writeRecords(
      SHEET_PERMISSIONS,
      header,
      records.filter((record) => record !== target)
    );
    await this.replaceRecords(SHEET_ROLE_PERMISSIONS, (record) => record['permission_id'] === target['id']);
    return true;
  }

  /* Roles */

  async actorHasPermissionViaRoles(
    actorId: ActorId,
    permissionName: string,
    options: QueryOptions = {}
  ): Promise<boolean> {
    const permissions = await this.readRecords(SHEET_PERMISSIONS, options);
    const permission = permissions.find((record) => nameOf(record) === permissionName);
    if (!permission) {
      return false;
    }

    const userRoles = await this.readRecords(SHEET_USER_ROLES, options);
    const roleIds = new Set(
      userRoles.filter((record) => toInt(record['user_id']) === actorId).map((record) => record['role_id'])
    );
    if (!roleIds.size) {
      return false;
    }

    const links = await this.readRecords(SHEET_ROLE_PERMISSIONS, options);
    return links.some((link) => roleIds.has(link['role_id']) && link['permission_id'] === permission['id']);
  }

  async listRoles(): Promise<Role[]> {
    const records = await this.readRecords(SHEET_ROLES);
    return records.map((record) => ({ id: toInt(record['id']), name: nameOf(record) }));
  }

  async getRole(id: number): Promise<Role | null> {
    const roles = await this.listRoles();
    return roles.find((role) => role.id === id) ?? null;
  }

  async createRole(name: string): Promise<Role> {
    const { records } = await this.readForWrite(SHEET_ROLES);
    const role: Role = { id: this.nextId(records), name };
    await this.append(SHEET_ROLES, [String(role.id), role.name]);
    return role;
  }

  async deleteRole(id: number): Promise<boolean> {
    const key = String(id);
    const removed = await this.replaceRecords(SHEET_ROLES, (record) => record['id'] === key);
    if (!removed) {
      return false;
    }
    await this.replaceRecords(SHEET_ROLE_PERMISSIONS, (record) => record['role_id'] === key);
    await this.replaceRecords(SHEET_USER_ROLES, (record) => record['role_id'] === key);
    return true;
  }

  async attachPermission(roleId: number, permissionId: number): Promise<void> {
    const { records } = await this.readForWrite(SHEET_ROLE_PERMISSIONS);
    const exists = records.some(
      (record) => record['role_id'] === String(roleId) && record['permission_id'] === String(permissionId)
    );
    if (!exists) {
      await this.append(SHEET_ROLE_PERMISSIONS, [String(roleId), String(permissionId)]);
    }
  }

  async detachPermission(roleId: number, permissionId: number): Promise<void> {
    await this.replaceRecords(
      SHEET_ROLE_PERMISSIONS,
      (record) => record['role_id'] === String(roleId) && record['permission_id'] === String(permissionId)
    );
  }

  async syncRolePermissions(roleId: number, permissionIds: number[]): Promise<void> {
    const key = String(roleId);
    const replacements = [...new Set(permissionIds)].map((permissionId) => ({
      role_id: key,
      permission_id: String(permissionId)
    }));
    await this.replaceRecords(SHEET_ROLE_PERMISSIONS, (record) => record['role_id'] === key, replacements);
  }

  async assignRole(userId: ActorId, roleId: number): Promise<void> {
    const { records } = await this.readForWrite(SHEET_USER_ROLES);
    const exists = records.some(
      (record) => record['user_id'] === String(userId) && record['role_id'] === String(roleId)
    );
    if (!exists) {
      await this.append(SHEET_USER_ROLES, [String(userId), String(roleId)]);
    }
  }

  async revokeRole(userId: ActorId, roleId: number): Promise<void> {
    await this.replaceRecords(
      SHEET_USER_ROLES,
      (record) => record['user_id'] === String(userId) && record['role_id'] === String(roleId)
    );
  }

  async syncUserRoles(userId: ActorId, roleIds: number[]): Promise<void> {
    const key = String(userId);
    const replacements = [...new Set(roleIds)].map((roleId) => ({ user_id: key, role_id: String(roleId) }));
    await this.replaceRecords(SHEET_USER_ROLES, (record) => record['user_id'] === key, replacements);
  }

  /* Users */

  private toUser(record: SheetRowMap): User {
    return {
      id: toInt(record['id']),
      name: record['name'],
      email: record['email'],
      passwordHash: record['password_hash'],
      createdAt: record['created_at'],
      updatedAt: record['updated_at']
    };
  }

  async getUserById(id: ActorId): Promise<User | null> {
    const records = await this.readRecords(SHEET_USERS);
    const match = records.find((record) => toInt(record['id']) === id);
    return match ? this.toUser(match) : null;
  }

  async getUserByEmail(email: string): Promise<User | null> {
    const records = await this.readRecords(SHEET_USERS);
    const match = records.find((record) => record['email'] === email);
    return match ? this.toUser(match) : null;
  }

  async createUser(input: Omit<User, 'id'> & { id?: ActorId }): Promise<User> {
    const { records } = await this.readForWrite(SHEET_USERS);
    const user: User = { ...input, id: input.id ?? this.nextId(records) };
    await this.append(SHEET_USERS, [
      String(user.id),
      user.name,
      user.email,
      user.passwordHash,
      user.createdAt,
      user.updatedAt
    ]);
    return user;
  }

  async deleteUser(id: ActorId): Promise<boolean> {
    if (id === SYSTEM_ACTOR_ID) {
      throw new SystemActorDeletionError();
    }
    const key = String(id);
    const removed = await this.replaceRecords(SHEET_USERS, (record) => record['id'] === key);
    if (removed) {
      await this.replaceRecords(SHEET_USER_ROLES, (record) => record['user_id'] === key);
    }
    return removed > 0;
  }

  /* Books */

  private toBook(record: SheetRowMap): Book {
    return {
      id: toInt(record['id']),
      title: record['title'],
      description: record['description'],
      createdAt: record['created_at'],
      updatedAt: record['updated_at']
    };
  }

  private fromBook(book: Book): SheetRowMap {
    return {
      id: String(book.id),
      title: book.title,
      description: book.description,
      created_at: book.createdAt,
      updated_at: book.updatedAt
    };
  }

  async paginateBooks(page: number, perPage: number): Promise<BookPage> {
    const records = await this.readRecords(SHEET_BOOKS);
    const start = (page - 1) * perPage;
    return {
      items: records.slice(start, start + perPage).map((record) => this.toBook(record)),
      total: records.length,
      page,
      perPage
    };
  }

  async getBook(id: number): Promise<Book | null> {
    const records = await this.readRecords(SHEET_BOOKS);
    const match = records.find((record) => toInt(record['id']) === id);
    return match ? this.toBook(match) : null;
  }

  async createBook(input: Pick<Book, 'title' | 'description'>): Promise<Book> {
    const { records } = await this.readForWrite(SHEET_BOOKS);
    const timestamp = nowIso();
    const book: Book = { id: this.nextId(records), ...input, createdAt: timestamp, updatedAt: timestamp };
    await this.append(SHEET_BOOKS, this.toRow(HEADERS[SHEET_BOOKS], this.fromBook(book)));
    return book;
  }

  async updateBook(id: number, input: Partial<Pick<Book, 'title' | 'description'>>): Promise<Book | null> {
    const { header, records } = await this.readForWrite(SHEET_BOOKS);
    let updated: Book | null = null;

    const next = records.map((record) => {
      if (toInt(record['id']) !== id) {
        return record;
      }
      const current = this.toBook(record);
      const merged: Book = {
        ...current,
        title: input.title ?? current.title,
        description: input.description ?? current.description,
        updatedAt: nowIso()
      };
      updated = merged;
      return this.fromBook(merged);
    });

    if (!updated) {
      return null;
    }
    await this.writeRecords(SHEET_BOOKS, header, next);
    return updated;
  }

  async deleteBook(id: number): Promise<boolean> {
    const removed = await this.replaceRecords(SHEET_BOOKS, (record) => toInt(record['id']) === id);
    return removed > 0;
  }
}
