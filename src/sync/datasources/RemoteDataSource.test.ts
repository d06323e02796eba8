import { FunctionsFetchError, FunctionsHttpError, FunctionsRelayError } from '@supabase/supabase-js';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { AuthenticationError, CancelledError, NotFoundError, RemoteRequestError, ServerError } from '../errors';
import { RemoteDataSource, type SupabaseTransport } from './RemoteDataSource';
import type { SessionProvider } from './types';

type Invoke = SupabaseTransport['functions']['invoke'];
type SetSession = SupabaseTransport['auth']['setSession'];

interface InvokeResult {
  data: unknown;
  error: unknown;
}

function createTransport(results: InvokeResult[]) {
  const invoke = vi.fn<Invoke>(async () => {
    const next = results.shift();
    if (!next) throw new Error('Unexpected invoke');
    return next;
  });
  const setSession = vi.fn<SetSession>(async () => ({ error: null }));
  const transport: SupabaseTransport = { functions: { invoke }, auth: { setSession } };
  return { transport, invoke, setSession };
}

const sessionProvider: SessionProvider = {
  getSession: async () => ({ accessToken: 'test-access-token', refreshToken: 'test-refresh-token' }),
};

function httpError(status: number, body: string | null = null): InvokeResult {
  return { data: null, error: new FunctionsHttpError(new Response(body, { status })) };
}

describe('RemoteDataSource', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('invokes the endpoint with the session applied', async () => {
    const { transport, invoke, setSession } = createTransport([{ data: { id: 'r-1' }, error: null }]);
    const remote = new RemoteDataSource(transport, sessionProvider);

    const data = await remote.post('time/clock', { type: 'ClockIn' });

    expect(data).toEqual({ id: 'r-1' });
    expect(invoke).toHaveBeenCalledWith('time/clock', { method: 'POST', body: { type: 'ClockIn' } });
    expect(setSession).toHaveBeenCalledWith({
      access_token: 'test-access-token',
      refresh_token: 'test-refresh-token',
    });
  });

  it('fails with AuthenticationError when there is no session', async () => {
    const { transport, invoke } = createTransport([]);
    const remote = new RemoteDataSource(transport, null);

    await expect(remote.get('reports')).rejects.toBeInstanceOf(AuthenticationError);
    expect(invoke).not.toHaveBeenCalled();
  });

  it('skips the session for unauthenticated requests', async () => {
    const { transport, setSession } = createTransport([{ data: null, error: null }]);
    const remote = new RemoteDataSource(transport, null);

    await expect(remote.delete('reports/r-1', { requiresAuth: false })).resolves.toBeNull();
    expect(setSession).not.toHaveBeenCalled();
  });

  it('maps 404 to NotFoundError with the body message and does not retry', async () => {
    const { transport, invoke } = createTransport([httpError(404, JSON.stringify({ message: 'gone' }))]);
    const remote = new RemoteDataSource(transport, sessionProvider, { baseRetryDelayMs: 1 });

    const failure = remote.get('reports/r-1');

    await expect(failure).rejects.toBeInstanceOf(NotFoundError);
    await expect(failure).rejects.toMatchObject({ status: 404, message: 'gone' });
    expect(invoke).toHaveBeenCalledTimes(1);
  });

  it('maps 401 to AuthenticationError', async () => {
    const { transport, invoke } = createTransport([httpError(401, JSON.stringify({ error: 'expired' }))]);
    const remote = new RemoteDataSource(transport, sessionProvider, { baseRetryDelayMs: 1 });

    await expect(remote.get('reports')).rejects.toMatchObject({ name: 'AuthenticationError', status: 401, message: 'expired' });
    expect(invoke).toHaveBeenCalledTimes(1);
  });

  it('retries transient server errors', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { transport, invoke } = createTransport([httpError(503), { data: { ok: true }, error: null }]);
    const remote = new RemoteDataSource(transport, sessionProvider, { baseRetryDelayMs: 1 });

    await expect(remote.put('reports/r-1', { text: 'updated' })).resolves.toEqual({ ok: true });
    expect(invoke).toHaveBeenCalledTimes(2);
  });

  it('gives up on fetch failures after the configured retries', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const fetchFailure = (): InvokeResult => ({ data: null, error: new FunctionsFetchError(new Error('socket hang up')) });
    const { transport, invoke } = createTransport([fetchFailure(), fetchFailure(), fetchFailure()]);
    const remote = new RemoteDataSource(transport, sessionProvider, { maxRetries: 2, baseRetryDelayMs: 1 });

    const failure = remote.get('reports');

    await expect(failure).rejects.toBeInstanceOf(RemoteRequestError);
    await expect(failure).rejects.toMatchObject({ status: null });
    expect(invoke).toHaveBeenCalledTimes(3);
  });

  it('maps relay failures to a 502 ServerError', async () => {
    const { transport } = createTransport([{ data: null, error: new FunctionsRelayError(new Error('relay down')) }]);
    const remote = new RemoteDataSource(transport, sessionProvider, { maxRetries: 0 });

    const failure = remote.get('reports');

    await expect(failure).rejects.toBeInstanceOf(ServerError);
    await expect(failure).rejects.toMatchObject({ status: 502 });
  });

  it('sends multipart payloads as form data', async () => {
    const { transport, invoke } = createTransport([{ data: { id: 'p-1', status: 'success' }, error: null }]);
    const remote = new RemoteDataSource(transport, sessionProvider);

    await remote.postMultipart('photos/upload', {
      fields: { timestamp: '2024-05-01T08:00:00.000Z', userId: 'user-1' },
      files: [{ fieldName: 'image', fileName: 'p-1.jpg', contentType: 'image/jpeg', data: new Uint8Array([1, 2, 3]) }],
    });

    const [endpoint, options] = invoke.mock.calls[0];
    expect(endpoint).toBe('photos/upload');
    expect(options.method).toBe('POST');
    const body = options.body;
    if (!(body instanceof FormData)) {
      throw new Error('Expected a FormData body');
    }
    expect(body.get('timestamp')).toBe('2024-05-01T08:00:00.000Z');
    expect(body.get('userId')).toBe('user-1');
    const image = body.get('image');
    expect(image).toBeInstanceOf(Blob);
    if (image instanceof Blob) {
      expect(image.size).toBe(3);
      expect(image.type).toBe('image/jpeg');
    }
  });

  it('does not call out once the signal is aborted', async () => {
    const { transport, invoke } = createTransport([]);
    const remote = new RemoteDataSource(transport, sessionProvider);

    await expect(remote.get('reports', { signal: AbortSignal.abort() })).rejects.toBeInstanceOf(CancelledError);
    expect(invoke).not.toHaveBeenCalled();
  });
});
