/**
 * HTTP client configuration
 */
export interface HttpClientConfig {
  timeout?: number;
}
