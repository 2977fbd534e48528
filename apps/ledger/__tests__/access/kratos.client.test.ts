import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { KratosClient } from '../../src/access/infrastructure/kratos.client';

const makeResponse = (payload: unknown, status = 200): Response =>
  new Response(typeof payload === 'string' ? payload : JSON.stringify(payload), { status });

const makeClient = (baseUrl?: string) =>
  new KratosClient(new ConfigService(baseUrl ? { KRATOS_PUBLIC_URL: baseUrl } : {}));

describe('KratosClient', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('throws when KRATOS_PUBLIC_URL is missing', async () => {
    await expect(makeClient().whoAmI('token')).rejects.toThrow(
      'KRATOS_PUBLIC_URL is required to validate sessions'
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('sends the session token to whoami', async () => {
    fetchMock.mockResolvedValue(makeResponse({ identity: { id: 'identity-1' } }));

    await makeClient('http://kratos.test').whoAmI('test-session');

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe('http://kratos.test/sessions/whoami');
    expect(init?.headers).toEqual({ accept: 'application/json', 'x-session-token': 'test-session' });
  });

  it('rejects unauthorized responses', async () => {
    fetchMock.mockResolvedValue(makeResponse('', 401));
    await expect(makeClient('http://kratos.test').whoAmI('token')).rejects.toThrow('Invalid or expired session');
  });

  it('rejects non-ok responses', async () => {
    fetchMock.mockResolvedValue(makeResponse('nope', 500));
    await expect(makeClient('http://kratos.test').whoAmI('token')).rejects.toThrow(
      'Unable to validate session (status 500)'
    );
  });

  it('rejects invalid payloads', async () => {
    fetchMock.mockResolvedValue(makeResponse({}, 200));
    await expect(makeClient('http://kratos.test').whoAmI('token')).rejects.toBeInstanceOf(UnauthorizedException);
  });

  it('rejects inactive sessions', async () => {
    fetchMock.mockResolvedValue(makeResponse({ active: false, identity: { id: 'identity-1' } }));
    await expect(makeClient('http://kratos.test').whoAmI('token')).rejects.toThrow('Session is no longer active');
  });

  it('returns the identity for valid payloads', async () => {
    fetchMock.mockResolvedValue(
      makeResponse({ active: true, identity: { id: 'identity-1', traits: { email: 'user@example.com' } } })
    );
    await expect(makeClient('http://kratos.test').whoAmI('token')).resolves.toEqual({
      id: 'identity-1',
      traits: { email: 'user@example.com' },
    });
  });
});
