import { ActorId, SYSTEM_ACTOR_ID } from '../domain/types';
import { QueryOptions } from '../repositories/interfaces';
import logger from '../utils/logger';
import { AuthorizationOutcome, trackAuthorization } from '../utils/metrics';
import { PermissionCatalog } from './permissionCatalog';
import { RoleAssignment } from './roleAssignment';

export type EngineState = 'uninitialized' | 'ready';

const EMPTY_SNAPSHOT: ReadonlySet<string> = new Set<string>();

/**
 * Answers "does actor X hold permission P".
 *
 * Holds an immutable snapshot of the registered permission names; role and
 * permission assignments are always queried live through `RoleAssignment`.
 * The snapshot is derived state: `initialize()` rebuilds it from the catalog
 * and publishes it with a single reference swap.
 */
export class AuthorizationEngine {
  private snapshot: ReadonlySet<string> = EMPTY_SNAPSHOT;
  private currentState: EngineState = 'uninitialized';
  private generation = 0;
  private publishedGeneration = 0;

  constructor(private readonly catalog: PermissionCatalog, private readonly roles: RoleAssignment) {}

  get state(): EngineState {
    return this.currentState;
  }

  async initialize(options: QueryOptions = {}): Promise<void> {
    const generation = ++this.generation;
    const names = await this.catalog.listNames(options);

    // A run started later has already published; never roll back to older data.
    // A later run that fails leaves this one's snapshot in place.
    if (generation < this.publishedGeneration) {
      return;
    }

    this.publishedGeneration = generation;
    this.snapshot = new Set(names);
    this.currentState = 'ready';
    logger.info({ permissions: names.length }, 'Authorization engine initialized');
  }

  isRegistered(permissionName: string): boolean {
    return this.snapshot.has(permissionName);
  }

  registeredPermissions(): string[] {
    return [...this.snapshot];
  }

  async evaluate(actorId: ActorId, permissionName: string, options: QueryOptions = {}): Promise<boolean> {
    // The System Actor is decided here, before any lookup, and cannot be
    // granted or revoked through role data.
    if (actorId === SYSTEM_ACTOR_ID) {
      return this.decide('system', true, actorId, permissionName);
    }

    if (!this.snapshot.has(permissionName)) {
      return this.decide('unregistered', false, actorId, permissionName);
    }

    const granted = await this.roles.actorHasPermission(actorId, permissionName, options);
    return this.decide(granted ? 'granted' : 'denied', granted, actorId, permissionName);
  }

  private decide(outcome: AuthorizationOutcome, result: boolean, actorId: ActorId, permission: string): boolean {
    trackAuthorization(outcome);
    logger.debug({ actorId, permission, outcome }, 'Authorization decision');
    return result;
  }
}
