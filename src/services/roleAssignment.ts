import { ActorId } from '../domain/types';
import { QueryOptions, RoleRepository } from '../repositories/interfaces';

const isValidActorId = (actorId: ActorId): boolean => Number.isInteger(actorId) && actorId > 0;

export class RoleAssignment {
  constructor(private readonly repository: Pick<RoleRepository, 'actorHasPermissionViaRoles'>) {}

  /**
   * True when at least one of the actor's roles carries `permissionName`.
   * Always a live read; role membership is never cached.
   */
  async actorHasPermission(actorId: ActorId, permissionName: string, options: QueryOptions = {}): Promise<boolean> {
    if (!isValidActorId(actorId) || !permissionName) {
      return false;
    }
    return this.repository.actorHasPermissionViaRoles(actorId, permissionName, options);
  }
}
