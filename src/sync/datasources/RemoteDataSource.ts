/**
 * RemoteDataSource
 *
 * Remote client over Supabase Edge Functions. Every endpoint is a function
 * name (`time/clock`, `reports/{id}`, ...). Transient failures (408, 429, 5xx,
 * fetch failures) are retried with exponential backoff before the error
 * reaches the adapters.
 */

import { FunctionsFetchError, FunctionsHttpError, FunctionsRelayError } from '@supabase/supabase-js';
import { z } from 'zod';
import {
    AuthenticationError,
    errorForStatus,
    getErrorMessage,
    RemoteRequestError,
    ServerError,
    SyncError,
} from '../errors';
import { getRetryDelay, SYNC_CONFIG } from '../types';
import { delay, throwIfCancelled } from '../utils/async';
import type {
    JsonBody,
    MultipartPayload,
    RemoteClient,
    RequestOptions,
    SessionProvider,
} from './types';

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

interface InvokeOptions {
  method: HttpMethod;
  body?: JsonBody | FormData;
}

/**
 * The slice of SupabaseClient this data source uses.
 */
export interface SupabaseTransport {
  functions: {
    invoke(functionName: string, options: InvokeOptions): Promise<{ data: unknown; error: unknown }>;
  };
  auth: {
    setSession(session: { access_token: string; refresh_token: string }): Promise<{ error: unknown }>;
  };
}

export interface RemoteDataSourceOptions {
  maxRetries?: number;
  baseRetryDelayMs?: number;
}

const errorBodySchema = z.object({
  message: z.string().optional(),
  error: z.string().optional(),
});

async function readErrorMessage(response: Response): Promise<string> {
  try {
    const parsed = errorBodySchema.safeParse(await response.clone().json());
    return parsed.success ? parsed.data.message ?? parsed.data.error ?? '' : '';
  } catch (error) {
    console.warn('[RemoteDataSource] Error response body is not JSON:', getErrorMessage(error));
    return '';
  }
}

export class RemoteDataSource implements RemoteClient {
  private readonly maxRetries: number;
  private readonly baseRetryDelayMs: number;

  constructor(
    private readonly supabase: SupabaseTransport,
    private readonly sessionProvider: SessionProvider | null,
    options: RemoteDataSourceOptions = {}
  ) {
    this.maxRetries = options.maxRetries ?? SYNC_CONFIG.MAX_RETRY_ATTEMPTS;
    this.baseRetryDelayMs = options.baseRetryDelayMs ?? SYNC_CONFIG.BASE_RETRY_DELAY_MS;
  }

  get(endpoint: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request(endpoint, { method: 'GET' }, options);
  }

  post(endpoint: string, body: JsonBody, options: RequestOptions = {}): Promise<unknown> {
    return this.request(endpoint, { method: 'POST', body }, options);
  }

  postMultipart(endpoint: string, payload: MultipartPayload, options: RequestOptions = {}): Promise<unknown> {
    const form = new FormData();
    for (const [name, value] of Object.entries(payload.fields)) {
      form.append(name, value);
    }
    for (const file of payload.files) {
      form.append(file.fieldName, new Blob([file.data], { type: file.contentType }), file.fileName);
    }
    return this.request(endpoint, { method: 'POST', body: form }, options);
  }

  put(endpoint: string, body: JsonBody, options: RequestOptions = {}): Promise<unknown> {
    return this.request(endpoint, { method: 'PUT', body }, options);
  }

  delete(endpoint: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request(endpoint, { method: 'DELETE' }, options);
  }

  /**
   * Setup auth session before making requests.
   */
  private async setupAuth(): Promise<void> {
    const session = this.sessionProvider ? await this.sessionProvider.getSession() : null;
    if (!session) {
      throw new AuthenticationError('No active session');
    }

    const { error } = await this.supabase.auth.setSession({
      access_token: session.accessToken,
      refresh_token: session.refreshToken,
    });
    if (error) {
      throw new AuthenticationError(getErrorMessage(error), null, { cause: error });
    }
  }

  private async request(endpoint: string, invoke: InvokeOptions, options: RequestOptions): Promise<unknown> {
    let attempt = 0;

    while (true) {
      throwIfCancelled(options.signal);

      try {
        if (options.requiresAuth ?? true) {
          await this.setupAuth();
        }
        return await this.invoke(endpoint, invoke);
      } catch (error) {
        if (!(error instanceof RemoteRequestError) || !error.isTransient || attempt >= this.maxRetries) {
          throw error;
        }

        const waitMs = getRetryDelay(attempt, this.baseRetryDelayMs);
        console.warn(
          `[RemoteDataSource] ${invoke.method} ${endpoint} failed (${error.message}), retry ${attempt + 1}/${this.maxRetries} in ${waitMs}ms`
        );
        attempt++;
        await delay(waitMs, options.signal);
      }
    }
  }

  private async invoke(endpoint: string, invoke: InvokeOptions): Promise<unknown> {
    const { data, error } = await this.supabase.functions.invoke(endpoint, invoke);
    if (error) {
      throw await this.toSyncError(error);
    }
    return data;
  }

  private async toSyncError(error: unknown): Promise<SyncError> {
    if (error instanceof FunctionsHttpError) {
      const response: unknown = error.context;
      if (response instanceof Response) {
        return errorForStatus(response.status, await readErrorMessage(response));
      }
      return new RemoteRequestError(error.message, null, { cause: error });
    }
    if (error instanceof FunctionsRelayError) {
      return new ServerError(error.message, 502, { cause: error });
    }
    if (error instanceof FunctionsFetchError) {
      return new RemoteRequestError(error.message, null, { cause: error });
    }
    return new RemoteRequestError(getErrorMessage(error), null, { cause: error });
  }
}
