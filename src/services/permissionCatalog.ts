import { PermissionRepository, QueryOptions } from '../repositories/interfaces';
import logger from '../utils/logger';

/**
 * Enumerates the permission names currently defined in storage.
 *
 * An unreachable or not-yet-provisioned store reads as an empty catalog so
 * that startup and pre-migration environments keep serving requests; every
 * non-system check then denies.
 */
export class PermissionCatalog {
  constructor(private readonly repository: Pick<PermissionRepository, 'listPermissionNames'>) {}

  async listNames(options: QueryOptions = {}): Promise<string[]> {
    let names: string[];
    try {
      names = await this.repository.listPermissionNames(options);
    } catch (error) {
      // Only the caller's own cancellation propagates; a storage timeout is an outage.
      if (options.signal?.aborted) {
        throw error;
      }
      logger.warn({ error }, 'Permission catalog unavailable; treating it as empty');
      return [];
    }
    return [...new Set(names)];
  }
}
