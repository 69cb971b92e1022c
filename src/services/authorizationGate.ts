import { HttpError } from '../domain/errors';
import { ActorId } from '../domain/types';
import { QueryOptions } from '../repositories/interfaces';
import { AuthorizationEngine } from './authorizationEngine';

export const AUTHORIZATION_DENIED_MESSAGE = 'This action is unauthorized.';

export class AuthorizationDeniedError extends HttpError {
  override name = 'AuthorizationDeniedError';

  constructor() {
    super(AUTHORIZATION_DENIED_MESSAGE, 403);
  }
}

/** Entry point for protected operations; call `require` before any state change. */
export class AuthorizationGate {
  constructor(private readonly engine: Pick<AuthorizationEngine, 'evaluate'>) {}

  allow(actorId: ActorId, permissionName: string, options: QueryOptions = {}): Promise<boolean> {
    return this.engine.evaluate(actorId, permissionName, options);
  }

  async require(actorId: ActorId, permissionName: string, options: QueryOptions = {}): Promise<void> {
    if (!(await this.allow(actorId, permissionName, options))) {
      throw new AuthorizationDeniedError();
    }
  }
}
