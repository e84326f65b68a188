import axios, { AxiosInstance, AxiosRequestConfig, AxiosError } from 'axios';
import { createLogger } from '../core/Logger';
import { HttpClientConfig } from '../types/http.types';

const logger = createLogger('HTTP');

export const DEFAULT_TIMEOUT_MS = 10000;

/**
 * Create an HTTP client with request/response logging.
 * Requests are sent once; failed requests are not retried.
 */
export function createHttpClient(config: HttpClientConfig = {}): AxiosInstance {
  const axiosConfig: AxiosRequestConfig = {
    timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
    headers: {
      Accept: 'application/json',
    },
  };

  const client = axios.create(axiosConfig);
  addLoggingInterceptor(client);

  return client;
}

/**
 * Add request/response logging interceptor
 */
export function addLoggingInterceptor(client: AxiosInstance): void {
  client.interceptors.request.use(
    (config) => {
      logger.debug(`${config.method?.toUpperCase()} ${client.getUri(config)}`);
      return config;
    },
    (error: unknown) => {
      logger.error(`Request error: ${formatHttpError(error)}`);
      return Promise.reject(error);
    }
  );

  client.interceptors.response.use(
    (response) => {
      logger.debug(
        `${response.config.method?.toUpperCase()} ${response.config.url} - ${response.status}`
      );
      return response;
    },
    (error: unknown) => {
      if (axios.isAxiosError(error)) {
        const target = `${error.config?.method?.toUpperCase()} ${error.config?.url}`;
        logger.debug(
          error.response ? `${target} - ${error.response.status}` : `${target} - No response`
        );
      }
      return Promise.reject(error);
    }
  );
}

/**
 * Format an Axios error for logging
 */
export function formatHttpError(error: unknown): string {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error.message : 'Unknown error';
  }

  const axiosError: AxiosError = error;
  const url = axiosError.config?.url || 'unknown';

  if (axiosError.response) {
    const { status, statusText, data } = axiosError.response;
    let message = `HTTP ${status} ${statusText} for ${url}`;

    // ipinfo-style bodies carry { error: { title, message } } or { message }
    const detail = extractErrorDetail(data);
    if (detail) {
      message += `: ${detail}`;
    }

    return message;
  } else if (axiosError.request) {
    if (axiosError.code === 'ECONNREFUSED') {
      return `Connection refused to ${url}`;
    } else if (axiosError.code === 'ETIMEDOUT' || axiosError.code === 'ECONNABORTED') {
      return `Request timed out for ${url}`;
    } else if (axiosError.code === 'ENOTFOUND') {
      return `Host not found for ${url}`;
    }
    return `No response received from ${url}: ${axiosError.code || axiosError.message}`;
  }

  return axiosError.message;
}

function extractErrorDetail(data: unknown): string | undefined {
  let body: unknown = data;
  if (typeof body === 'string') {
    try {
      body = JSON.parse(body);
    } catch {
      return undefined;
    }
  }
  if (!isObject(body)) {
    return undefined;
  }

  const { message, error } = body;
  if (typeof message === 'string') {
    return message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (isObject(error) && typeof error.message === 'string') {
    return error.message;
  }
  return undefined;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * HTTP status of a failed request, if the server answered at all
 */
export function getHttpStatus(error: unknown): number | undefined {
  if (!axios.isAxiosError(error)) {
    return undefined;
  }
  return error.response?.status;
}

export function isHttpStatus(error: unknown, status: number): boolean {
  return getHttpStatus(error) === status;
}
