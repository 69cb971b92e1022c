import { ActorId, Book, BookPage, Permission, Role, User } from '../domain/types';

export interface QueryOptions {
  signal?: AbortSignal;
}

export interface PermissionRepository {
  listPermissionNames(options?: QueryOptions): Promise<string[]>;
  listPermissions(): Promise<Permission[]>;
  createPermission(name: string): Promise<Permission>;
  deletePermission(name: string): Promise<boolean>;
}

export interface RoleRepository {
  /** Existence check: stops at the first role of `actorId` linked to `permissionName`. */
  actorHasPermissionViaRoles(actorId: ActorId, permissionName: string, options?: QueryOptions): Promise<boolean>;
  listRoles(): Promise<Role[]>;
  getRole(id: number): Promise<Role | null>;
  createRole(name: string): Promise<Role>;
  deleteRole(id: number): Promise<boolean>;
  attachPermission(roleId: number, permissionId: number): Promise<void>;
  detachPermission(roleId: number, permissionId: number): Promise<void>;
  syncRolePermissions(roleId: number, permissionIds: number[]): Promise<void>;
  assignRole(userId: ActorId, roleId: number): Promise<void>;
  revokeRole(userId: ActorId, roleId: number): Promise<void>;
  syncUserRoles(userId: ActorId, roleIds: number[]): Promise<void>;
}

export interface UserRepository {
  getUserById(id: ActorId): Promise<User | null>;
  getUserByEmail(email: string): Promise<User | null>;
  createUser(user: Omit<User, 'id'> & { id?: ActorId }): Promise<User>;
  deleteUser(id: ActorId): Promise<boolean>;
}

export interface BookRepository {
  paginateBooks(page: number, perPage: number): Promise<BookPage>;
  getBook(id: number): Promise<Book | null>;
  createBook(input: Pick<Book, 'title' | 'description'>): Promise<Book>;
  updateBook(id: number, input: Partial<Pick<Book, 'title' | 'description'>>): Promise<Book | null>;
  deleteBook(id: number): Promise<boolean>;
}

export type AccessRepository = PermissionRepository & RoleRepository;
