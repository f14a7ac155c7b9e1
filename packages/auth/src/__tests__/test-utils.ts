import { vi, type Mock } from 'vitest';
import type { ServiceConfig } from '@multi-oauth/models';
import { OAuth2Manager, type OAuth2ManagerOptions } from '../implementations/oauth2-manager.js';
import { MemoryTokenStore } from '../implementations/memory-token-store.js';
import { PkceVerifierCache } from '../implementations/pkce-verifier-cache.js';
import type { FetchLike } from '../utils/request/token-request.js';

export const TEST_SERVICE: ServiceConfig = {
  serviceName: 'example',
  clientId: 'client-1',
  clientSecret: 'test-secret',
  authorizationEndpoint: 'https://auth.example.com/authorize',
  tokenEndpoint: 'https://auth.example.com/token',
  redirectUri: 'http://localhost:8000/oauth/callback/example',
  scope: 'read write',
};

export const createTestServiceConfig = (overrides: Partial<ServiceConfig> = {}): ServiceConfig => ({
  ...TEST_SERVICE,
  ...overrides,
});

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

export const createMockFetch = (): Mock<FetchLike> => vi.fn<FetchLike>();

/**
 * Fetch that only settles when its signal aborts
 */
export const hangingFetch: FetchLike = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
  });

/** Form body sent with the given fetch call */
export const sentForm = (mockFetch: Mock<FetchLike>, callIndex = 0): URLSearchParams => {
  const call = mockFetch.mock.calls[callIndex];
  if (!call) {
    throw new Error(`fetch was not called ${callIndex + 1} time(s)`);
  }
  const body = call[1].body;
  if (typeof body !== 'string') {
    throw new Error('Expected a string request body');
  }
  return new URLSearchParams(body);
};

export class TestClock {
  private current: number;

  public constructor(start: string = '2025-01-01T12:00:00.000Z') {
    this.current = Date.parse(start);
  }

  public readonly now = (): Date => new Date(this.current);

  public advance(ms: number): void {
    this.current += ms;
  }
}

export interface TestManagerContext {
  manager: OAuth2Manager;
  mockFetch: Mock<FetchLike>;
  tokenStore: MemoryTokenStore;
  verifierCache: PkceVerifierCache;
  clock: TestClock;
}

/**
 * Manager with an in-memory store, a controllable clock and a mocked
 * token endpoint. The example service is registered.
 */
export const createTestManager = async (
  overrides: Partial<OAuth2ManagerOptions> = {},
): Promise<TestManagerContext> => {
  const clock = new TestClock();
  const mockFetch = createMockFetch();
  const tokenStore = new MemoryTokenStore();
  const verifierCache = new PkceVerifierCache({
    sweepIntervalMs: 0,
    now: () => clock.now().getTime(),
  });

  const manager = await OAuth2Manager.create({
    tokenStore,
    verifierCache,
    fetch: mockFetch,
    now: clock.now,
    ...overrides,
  });
  manager.registerService(TEST_SERVICE);

  return { manager, mockFetch, tokenStore, verifierCache, clock };
};
