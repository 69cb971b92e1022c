import { NotFoundError, ValidationError } from '../domain/errors';
import { ActorId, Permission, Role } from '../domain/types';
import { AccessRepository } from '../repositories/interfaces';
import { FieldRules, parsePositiveInteger, validatePayload } from '../utils/validators';
import logger from '../utils/logger';
import { AuthorizationEngine } from './authorizationEngine';

const NAME_RULES: Record<'name', FieldRules> = {
  name: { required: true, max: 255 }
};

const PERMISSION_NAME_PATTERN = /^[a-z0-9_-]+(\.[a-z0-9_-]+)*$/;

/**
 * Administrative changes to permissions, roles and their links. Any change to
 * the set of permission names re-initializes the engine.
 */
export class AccessAdminService {
  constructor(
    private readonly repository: AccessRepository,
    private readonly engine: Pick<AuthorizationEngine, 'initialize' | 'registeredPermissions'>
  ) {}

  listPermissions(): string[] {
    return this.engine.registeredPermissions();
  }

  async createPermission(payload: unknown): Promise<Permission> {
    const { name = '' } = validatePayload(payload, NAME_RULES);
    const normalized = name.trim();
    if (!PERMISSION_NAME_PATTERN.test(normalized)) {
      throw new ValidationError({ name: ['The name field format is invalid.'] });
    }
    const existing = await this.repository.listPermissions();
    if (existing.some((permission) => permission.name === normalized)) {
      throw new ValidationError({ name: ['The name has already been taken.'] });
    }

    const permission = await this.repository.createPermission(normalized);
    logger.info({ permission: permission.name }, 'Permission created');
    await this.engine.initialize();
    return permission;
  }

  async deletePermission(name: string): Promise<void> {
    const removed = await this.repository.deletePermission(name);
    if (!removed) {
      throw new NotFoundError();
    }
    logger.info({ permission: name }, 'Permission deleted');
    await this.engine.initialize();
  }

  async createRole(payload: unknown): Promise<Role> {
    const { name = '' } = validatePayload(payload, NAME_RULES);
    const normalized = name.trim();
    const roles = await this.repository.listRoles();
    if (roles.some((role) => role.name === normalized)) {
      throw new ValidationError({ name: ['The name has already been taken.'] });
    }
    return this.repository.createRole(normalized);
  }

  async deleteRole(id: number): Promise<void> {
    if (!(await this.repository.deleteRole(id))) {
      throw new NotFoundError();
    }
  }

  async syncRolePermissions(roleId: number, payload: unknown): Promise<string[]> {
    await this.requireRole(roleId);
    const names = this.parseList(payload, 'permissions', (value) => (typeof value === 'string' ? value : undefined));

    const permissions = await this.repository.listPermissions();
    const byName = new Map(permissions.map((permission) => [permission.name, permission.id]));
    const unknown = names.filter((name) => !byName.has(name));
    if (unknown.length) {
      throw new ValidationError({ permissions: [`Unknown permissions: ${unknown.join(', ')}.`] });
    }

    const ids = names.flatMap((name) => {
      const id = byName.get(name);
      return id === undefined ? [] : [id];
    });
    await this.repository.syncRolePermissions(roleId, ids);
    return names;
  }

  async attachPermission(roleId: number, name: string): Promise<void> {
    await this.requireRole(roleId);
    const permission = await this.requirePermission(name);
    await this.repository.attachPermission(roleId, permission.id);
  }

  async detachPermission(roleId: number, name: string): Promise<void> {
    await this.requireRole(roleId);
    const permission = await this.requirePermission(name);
    await this.repository.detachPermission(roleId, permission.id);
  }

  async assignRole(userId: ActorId, roleId: number): Promise<void> {
    await this.requireRole(roleId);
    await this.repository.assignRole(userId, roleId);
  }

  async revokeRole(userId: ActorId, roleId: number): Promise<void> {
    await this.requireRole(roleId);
    await this.repository.revokeRole(userId, roleId);
  }

  async syncUserRoles(userId: ActorId, payload: unknown): Promise<number[]> {
    const roleIds = this.parseList(payload, 'roles', parsePositiveInteger);
    const roles = await this.repository.listRoles();
    const known = new Set(roles.map((role) => role.id));
    const unknown = roleIds.filter((id) => !known.has(id));
    if (unknown.length) {
      throw new ValidationError({ roles: [`Unknown roles: ${unknown.join(', ')}.`] });
    }

    await this.repository.syncUserRoles(userId, roleIds);
    return roleIds;
  }

  private async requireRole(roleId: number): Promise<Role> {
    const role = await this.repository.getRole(roleId);
    if (!role) {
      throw new NotFoundError();
    }
    return role;
  }

  private async requirePermission(name: string): Promise<Permission> {
    const permissions = await this.repository.listPermissions();
    const permission = permissions.find((candidate) => candidate.name === name);
    if (!permission) {
      throw new NotFoundError();
    }
    return permission;
  }

  private parseList<T>(payload: unknown, field: string, parse: (value: unknown) => T | undefined): T[] {
    const raw: unknown =
      payload && typeof payload === 'object' && !Array.isArray(payload) ? Reflect.get(payload, field) : undefined;
    if (!Array.isArray(raw)) {
      throw new ValidationError({ [field]: [`The ${field} field must be an array.`] });
    }

    const parsed: T[] = [];
    for (const item of raw) {
      const value = parse(item);
      if (value === undefined) {
        throw new ValidationError({ [field]: [`The ${field} field contains an invalid value.`] });
      }
      if (!parsed.includes(value)) {
        parsed.push(value);
      }
    }
    return parsed;
  }
}
