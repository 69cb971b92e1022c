import * as bcrypt from 'bcryptjs';
import { OPTIONAL_DEFAULTS } from '../config/config';

export const hashSecret = (secret: string, cost: number = OPTIONAL_DEFAULTS.bcryptCost): Promise<string> =>
  bcrypt.hash(secret, cost);

export const verifySecret = async (secret: string, hash: string): Promise<boolean> => {
  if (!hash) {
    return false;
  }
  return bcrypt.compare(secret, hash);
};
