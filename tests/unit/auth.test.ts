import { ManagedIdentityTokenProvider, acquireRunTokens, normalizeToken } from '../../src/core/auth';
import { AuthenticationError } from '../../src/core/errors';
import type { ResourceAudience, TokenProvider } from '../../src/types';

const mockAcquireToken = jest.fn();
const mockConfigs: unknown[] = [];

jest.mock('@azure/msal-node', () => ({
  LogLevel: { Error: 0, Warning: 1, Info: 2, Verbose: 3, Trace: 4 },
  ManagedIdentityApplication: jest.fn().mockImplementation((config: unknown) => {
    mockConfigs.push(config);
    return { acquireToken: mockAcquireToken };
  }),
}));

describe('normalizeToken', () => {
  it('accepts strings, buffers and token objects', () => {
    expect(normalizeToken('  abc  ')).toBe('abc');
    expect(normalizeToken(Buffer.from('from-buffer'))).toBe('from-buffer');
    expect(normalizeToken({ accessToken: 'from-result' })).toBe('from-result');
    expect(normalizeToken({ token: 'from-access-token' })).toBe('from-access-token');
  });

  it.each([[''], ['   '], [null], [{}], [{ accessToken: 42 }]])('rejects %p', (raw: unknown) => {
    expect(() => normalizeToken(raw)).toThrow(new AuthenticationError('Identity returned an empty access token'));
  });
});

describe('acquireRunTokens', () => {
  it('acquires one token per distinct audience', async () => {
    const acquireToken = jest.fn(async (audience: ResourceAudience) => `token-${audience}`);

    const tokens = await acquireRunTokens({ acquireToken }, ['graph', 'storage', 'graph']);

    expect(acquireToken).toHaveBeenCalledTimes(2);
    expect([...tokens.entries()]).toEqual([
      ['graph', 'token-graph'],
      ['storage', 'token-storage'],
    ]);
  });

  it('wraps provider failures', async () => {
    const provider: TokenProvider = {
      acquireToken: async () => {
        throw new Error('IMDS unreachable');
      },
    };

    const error = await acquireRunTokens(provider, ['graph']).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toHaveProperty('message', 'Authentication failed for graph: IMDS unreachable');
  });

  it('rejects an empty token', async () => {
    await expect(acquireRunTokens({ acquireToken: async () => '' }, ['graph'])).rejects.toBeInstanceOf(
      AuthenticationError
    );
  });
});

describe('ManagedIdentityTokenProvider', () => {
  beforeEach(() => {
    mockAcquireToken.mockReset();
    mockConfigs.length = 0;
  });

  it('requests a token for the resource of the audience', async () => {
    mockAcquireToken.mockResolvedValue({ accessToken: 'graph-token', expiresOn: new Date('2030-01-01T00:00:00Z') });
    const provider = new ManagedIdentityTokenProvider();

    await expect(provider.acquireToken('graph')).resolves.toBe('graph-token');
    await expect(provider.acquireToken('logAnalytics')).resolves.toBe('graph-token');

    expect(mockAcquireToken.mock.calls).toEqual([
      [{ resource: 'https://graph.microsoft.com' }],
      [{ resource: 'https://api.loganalytics.io' }],
    ]);
    expect(mockConfigs).toHaveLength(1);
    expect(mockConfigs[0]).not.toHaveProperty('managedIdentityIdParams');
  });

  it('targets a user-assigned identity when a client id is given', async () => {
    mockAcquireToken.mockResolvedValue({ accessToken: 'storage-token', expiresOn: null });

    await new ManagedIdentityTokenProvider('client-1').acquireToken('storage');

    expect(mockConfigs[0]).toMatchObject({ managedIdentityIdParams: { userAssignedClientId: 'client-1' } });
  });

  it('reports identity failures as authentication errors', async () => {
    mockAcquireToken.mockRejectedValue(new Error('IMDS unreachable'));

    const error = await new ManagedIdentityTokenProvider().acquireToken('graph').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toHaveProperty('message', 'Authentication failed for graph: IMDS unreachable');
    expect(error).toHaveProperty('cause', new Error('IMDS unreachable'));
  });

  it('rejects an empty access token', async () => {
    mockAcquireToken.mockResolvedValue({ accessToken: '', expiresOn: null });

    await expect(new ManagedIdentityTokenProvider().acquireToken('graph')).rejects.toThrow(
      'Identity returned an empty access token'
    );
  });
});
