import { AppConfig } from '../config/config';
import {
  createSheetsClient,
  GoogleSheetsRepository,
  toSheetValuesApi
} from '../repositories/googleSheetsRepository';
import { AccessRepository, BookRepository, UserRepository } from '../repositories/interfaces';
import { AccessAdminService } from './accessAdminService';
import { AuthService, AuthSettings } from './authService';
import { AuthorizationEngine } from './authorizationEngine';
import { AuthorizationGate } from './authorizationGate';
import { BookService } from './bookService';
import { PermissionCatalog } from './permissionCatalog';
import { RoleAssignment } from './roleAssignment';

export interface Repositories {
  access: AccessRepository;
  users: UserRepository;
  books: BookRepository;
}

export interface Container {
  repositories: Repositories;
  engine: AuthorizationEngine;
  gate: AuthorizationGate;
  authService: AuthService;
  bookService: BookService;
  accessAdminService: AccessAdminService;
}

export const createSheetsRepositories = (config: AppConfig): Repositories => {
  const sheets = createSheetsClient(config.storage.googleServiceAccountJson);
  const repository = new GoogleSheetsRepository(toSheetValuesApi(sheets.spreadsheets.values), {
    spreadsheetId: config.storage.spreadsheetId,
    cacheTtlSeconds: config.storage.cacheTtlSeconds,
    timeoutMs: config.storage.timeoutMs
  });
  return { access: repository, users: repository, books: repository };
};

/**
 * Wires every service explicitly. The engine is created here, once, and handed
 * to whatever serves requests.
 */
export const createContainer = (repositories: Repositories, settings: AuthSettings): Container => {
  const engine = new AuthorizationEngine(
    new PermissionCatalog(repositories.access),
    new RoleAssignment(repositories.access)
  );

  return {
    repositories,
    engine,
    gate: new AuthorizationGate(engine),
    authService: new AuthService(repositories.users, settings),
    bookService: new BookService(repositories.books),
    accessAdminService: new AccessAdminService(repositories.access, engine)
  };
};
