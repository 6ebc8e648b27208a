import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { apiErrorBodySchema } from '@taskpad/shared';
import { env } from '../config/env';
import {
  ApiError,
  MalformedResponseError,
  TransportError,
  ValidationError,
  describeError,
} from '../utils/errors';
import { apiLogger } from '../utils/logger';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface RequestOptions {
  headers?: Record<string, string>;
  params?: Record<string, string | number | boolean | undefined>;
  signal?: AbortSignal;
}

export interface BatchRequest {
  method: HttpMethod;
  endpoint: string;
  data?: unknown;
  options?: RequestOptions;
}

function isFormData(value: unknown): value is FormData {
  return typeof FormData !== 'undefined' && value instanceof FormData;
}

function isStructured(value: unknown): value is object {
  if (value === null || typeof value !== 'object') return false;
  if (Array.isArray(value)) return true;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function extractErrorMessage(status: number, raw: unknown): string {
  const fallback = `HTTP error: ${status}`;
  if (typeof raw !== 'string' || raw.length === 0) {
    return fallback;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    apiLogger.debug('Error response is not JSON', { status, error: describeError(error) });
    return fallback;
  }

  const body = apiErrorBodySchema.safeParse(parsed);
  if (!body.success) {
    return fallback;
  }

  const { message, error } = body.data;
  if (message) return message;
  if (typeof error === 'string' && error) return error;
  if (typeof error === 'object' && error.message) return error.message;
  return fallback;
}

function parseErrorBody(raw: unknown): unknown {
  if (typeof raw !== 'string') return raw;
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function toRequestError(error: unknown): unknown {
  if (!axios.isAxiosError(error)) {
    return error;
  }

  if (error.response) {
    const { status, data } = error.response;
    return new ApiError(status, extractErrorMessage(status, data), parseErrorBody(data));
  }

  return new TransportError(error.message || 'Network request failed');
}

function parseResponseBody(response: AxiosResponse<unknown>): unknown {
  if (response.status === 204) {
    return null;
  }

  const contentType = String(response.headers['content-type'] ?? '');
  const text = typeof response.data === 'string' ? response.data : '';

  if (contentType.includes('application/json')) {
    if (text.length === 0) return null;
    try {
      return JSON.parse(text);
    } catch {
      throw new MalformedResponseError(`Invalid JSON in response (status ${response.status})`);
    }
  }

  return text;
}

/**
 * HTTP gateway for the Authentication Service and the Resource API.
 *
 * Injects `Authorization: Bearer <token>` while a token is set, serializes
 * structured bodies as JSON and turns failures into {@link ApiError} or
 * {@link TransportError}.
 */
export class ApiClient {
  private readonly http: AxiosInstance;
  private authToken: string | null = null;
  private defaultHeaders: Record<string, string> = {
    'Content-Type': 'application/json',
  };

  constructor(readonly baseURL: string = env.VITE_API_URL) {
    this.http = axios.create({
      withCredentials: true,
      // Raw text in, parsed by content type below
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
    });

    this.http.interceptors.request.use((config) => {
      if (this.authToken) {
        config.headers.Authorization = `Bearer ${this.authToken}`;
      }
      return config;
    });

    this.http.interceptors.response.use(
      (response) => response,
      (error: unknown) => Promise.reject(toRequestError(error))
    );
  }

  setAuthToken(token: string | null): this {
    this.authToken = token;
    return this;
  }

  getAuthToken(): string | null {
    return this.authToken;
  }

  clearAuth(): void {
    this.authToken = null;
  }

  setDefaultHeaders(headers: Record<string, string>): void {
    this.defaultHeaders = { ...this.defaultHeaders, ...headers };
  }

  buildURL(endpoint: string): string {
    const path = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
    return this.baseURL + path;
  }

  async request(
    method: HttpMethod,
    endpoint: string,
    options: RequestOptions & { body?: unknown } = {}
  ): Promise<unknown> {
    const url = this.buildURL(endpoint);
    const headers: Record<string, string> = { ...this.defaultHeaders, ...options.headers };
    let data: unknown = options.body ?? undefined;

    if (isFormData(data)) {
      // Let the transport write the multipart boundary
      for (const name of Object.keys(headers)) {
        if (name.toLowerCase() === 'content-type') {
          delete headers[name];
        }
      }
    } else if (isStructured(data)) {
      data = JSON.stringify(data);
    }

    apiLogger.debug(`${method} ${url}`);

    try {
      const response = await this.http.request<unknown>({
        method,
        url,
        headers,
        data,
        params: options.params,
        signal: options.signal,
      });
      return parseResponseBody(response);
    } catch (error) {
      apiLogger.warn(`Request failed ${method} ${url}`, { error: describeError(error) });
      throw error;
    }
  }

  get(endpoint: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request('GET', endpoint, options);
  }

  post(endpoint: string, data: unknown = null, options: RequestOptions = {}): Promise<unknown> {
    return this.request('POST', endpoint, { ...options, body: data });
  }

  put(endpoint: string, data: unknown = null, options: RequestOptions = {}): Promise<unknown> {
    return this.request('PUT', endpoint, { ...options, body: data });
  }

  patch(endpoint: string, data: unknown = null, options: RequestOptions = {}): Promise<unknown> {
    return this.request('PATCH', endpoint, { ...options, body: data });
  }

  delete(endpoint: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request('DELETE', endpoint, options);
  }

  /** POST a file as multipart form data. A bare Blob is sent under the `file` field. */
  async upload(endpoint: string, file: Blob | FormData, options: RequestOptions = {}): Promise<unknown> {
    let formData: FormData;

    if (isFormData(file)) {
      formData = file;
    } else if (file instanceof Blob) {
      formData = new FormData();
      formData.append('file', file);
    } else {
      throw new ValidationError('Upload data must be a File, Blob or FormData');
    }

    return this.request('POST', endpoint, { ...options, body: formData });
  }

  /** Issue every request concurrently; one failure does not abort the others. */
  batch(requests: BatchRequest[]): Promise<PromiseSettledResult<unknown>[]> {
    return Promise.allSettled(
      requests.map(({ method, endpoint, data, options }) =>
        this.request(method, endpoint, { ...options, body: data })
      )
    );
  }
}
