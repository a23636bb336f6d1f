import { createHash, timingSafeEqual } from 'crypto';

export interface AdminAuthorizer {
  isAuthorizedForBypass(credential: string | undefined): boolean;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Checks an `Authorization: Bearer <token>` header against the configured admin token.
 * With no token configured nobody is an admin.
 */
export class AdminTokenAuthorizer implements AdminAuthorizer {
  private readonly expected: Buffer | undefined;

  constructor(adminToken: string | undefined) {
    this.expected = adminToken ? digest(adminToken) : undefined;
  }

  isAuthorizedForBypass(credential: string | undefined): boolean {
    if (!this.expected || !credential?.startsWith('Bearer ')) {
      return false;
    }

    return timingSafeEqual(digest(credential.substring(7)), this.expected);
  }
}
