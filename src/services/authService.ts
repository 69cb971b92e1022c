import jwt from 'jsonwebtoken';
import NodeCache from 'node-cache';
import { v4 as uuid } from 'uuid';
import { AppConfig } from '../config/config';
import { HttpError } from '../domain/errors';
import { ActorId, User } from '../domain/types';
import { UserRepository } from '../repositories/interfaces';
import { verifySecret } from '../utils/passwordHasher';
import { validatePayload } from '../utils/validators';
import logger from '../utils/logger';

export class InvalidCredentialsError extends HttpError {
  override name = 'InvalidCredentialsError';

  constructor() {
    super('Invalid credentials', 401);
  }
}

export class AccountLockedError extends HttpError {
  override name = 'AccountLockedError';

  constructor() {
    super('Too many login attempts. Please try again later.', 423);
  }
}

export class InvalidTokenError extends Error {
  override name = 'InvalidTokenError';

  constructor(message = 'Invalid token') {
    super(message);
  }
}

export interface LoginResult {
  accessToken: string;
  tokenType: 'bearer';
  expiresIn: number;
}

export interface AccessTokenPayload {
  sub: ActorId;
  email: string;
  jti: string;
}

export interface LoginMetadata {
  ip?: string;
  userAgent?: string;
}

interface AttemptState {
  attempts: number;
  lockedUntil?: number;
}

export type AuthSettings = Pick<AppConfig, 'jwt' | 'auth'>;

/** Failed-login state per email; an entry lapses one lock window after its last failure. */
export const createLoginAttemptStore = (settings: Pick<AppConfig, 'auth'>): NodeCache =>
  new NodeCache({ stdTTL: settings.auth.loginLockMinutes * 60, checkperiod: 60, useClones: false });

const LOGIN_RULES = {
  email: { required: true, email: true },
  password: { required: true }
};

export class AuthService {
  constructor(
    private readonly users: Pick<UserRepository, 'getUserByEmail'>,
    private readonly settings: AuthSettings,
    private readonly now: () => number = Date.now,
    private readonly loginAttempts: NodeCache = createLoginAttemptStore(settings)
  ) {}

  get ttlSeconds(): number {
    return this.settings.jwt.ttlMinutes * 60;
  }

  async login(payload: unknown, metadata: LoginMetadata = {}): Promise<LoginResult> {
    const { email = '', password = '' } = validatePayload(payload, LOGIN_RULES);
    this.assertNotLocked(email);

    const user = await this.users.getUserByEmail(email);
    const valid = user ? await verifySecret(password, user.passwordHash) : false;

    if (!user || !valid) {
      this.registerFailedAttempt(email);
      logger.info({ email, ip: metadata.ip }, 'Login failed');
      throw new InvalidCredentialsError();
    }

    this.loginAttempts.del(email);
    logger.info({ userId: user.id, ip: metadata.ip, userAgent: metadata.userAgent }, 'Login succeeded');

    return {
      accessToken: this.signToken(user),
      tokenType: 'bearer',
      expiresIn: this.ttlSeconds
    };
  }

  verifyAccessToken(token: string): AccessTokenPayload {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.settings.jwt.secret, {
        algorithms: [this.settings.jwt.algorithm]
      });
    } catch (error) {
      throw new InvalidTokenError(error instanceof Error ? error.message : undefined);
    }

    if (typeof decoded === 'string') {
      throw new InvalidTokenError('Unexpected token payload');
    }

    const sub = Number(decoded.sub);
    if (!Number.isInteger(sub) || sub <= 0) {
      throw new InvalidTokenError('Invalid subject');
    }

    return {
      sub,
      email: typeof decoded.email === 'string' ? decoded.email : '',
      jti: decoded.jti ?? ''
    };
  }

  private signToken(user: User): string {
    return jwt.sign({ email: user.email }, this.settings.jwt.secret, {
      algorithm: this.settings.jwt.algorithm,
      expiresIn: this.ttlSeconds,
      subject: String(user.id),
      jwtid: uuid()
    });
  }

  private assertNotLocked(email: string): void {
    const state = this.loginAttempts.get<AttemptState>(email);
    if (!state?.lockedUntil) {
      return;
    }
    if (state.lockedUntil > this.now()) {
      throw new AccountLockedError();
    }
    this.loginAttempts.del(email);
  }

  private registerFailedAttempt(email: string): void {
    const state = this.loginAttempts.get<AttemptState>(email) ?? { attempts: 0 };
    state.attempts += 1;

    if (state.attempts >= this.settings.auth.loginMaxAttempts) {
      state.lockedUntil = this.now() + this.settings.auth.loginLockMinutes * 60 * 1000;
      logger.warn({ email }, 'Login locked after repeated failures');
    }

    this.loginAttempts.set(email, state);
  }
}
