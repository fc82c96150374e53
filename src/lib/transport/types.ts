/**
 * Request and response shapes shared by the live and simulated transports
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type ApiVersion = "2" | "3";

export interface ApiRequest {
  method: HttpMethod;
  /** Path below /rest/api/<version>/, e.g. "issue/PROJ-1/transitions" */
  endpoint: string;
  body?: unknown;
  apiVersion: ApiVersion;
}

export interface ApiResponse {
  status: number;
  body: string;
}

export interface Credentials {
  baseUrl?: string;
  email?: string;
  apiToken?: string;
}

export interface Transport {
  send(request: ApiRequest): Promise<ApiResponse>;
}

export function buildUrl(baseUrl: string, request: ApiRequest): string {
  return `${baseUrl}/rest/api/${request.apiVersion}/${request.endpoint}`;
}
