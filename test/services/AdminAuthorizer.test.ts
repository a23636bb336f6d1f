import { describe, it, expect } from 'vitest';
import { AdminTokenAuthorizer } from '../../src/services/index.js';
import { TEST_ADMIN_TOKEN } from '../fixtures/index.js';

describe('AdminTokenAuthorizer', () => {
  const authorizer = new AdminTokenAuthorizer(TEST_ADMIN_TOKEN);

  it('should accept the configured bearer token', () => {
    expect(authorizer.isAuthorizedForBypass(`Bearer ${TEST_ADMIN_TOKEN}`)).toBe(true);
  });

  it('should reject a wrong or missing token', () => {
    expect(authorizer.isAuthorizedForBypass('Bearer wrong-token')).toBe(false);
    expect(authorizer.isAuthorizedForBypass(undefined)).toBe(false);
    expect(authorizer.isAuthorizedForBypass('')).toBe(false);
  });

  it('should require the Bearer scheme', () => {
    expect(authorizer.isAuthorizedForBypass(TEST_ADMIN_TOKEN)).toBe(false);
    expect(authorizer.isAuthorizedForBypass(`Basic ${TEST_ADMIN_TOKEN}`)).toBe(false);
  });

  it('should authorize nobody when no token is configured', () => {
    const open = new AdminTokenAuthorizer(undefined);
    expect(open.isAuthorizedForBypass('Bearer ')).toBe(false);
    expect(open.isAuthorizedForBypass(`Bearer ${TEST_ADMIN_TOKEN}`)).toBe(false);
  });
});
