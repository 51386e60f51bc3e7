import { AxiosError, AxiosHeaders, type AxiosAdapter, type AxiosResponse } from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  headers: AxiosHeaders;
  data: unknown;
}

export type StubReply = { status: number; data?: unknown } | { networkError: string };

/**
 * In-process axios transport. Every request is recorded and answered by
 * `reply`; 4xx/5xx replies reject the way axios' own adapters do.
 */
export function createStubAdapter(reply: (request: RecordedRequest, index: number) => StubReply) {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      headers: AxiosHeaders.from(config.headers),
      data: config.data,
    };
    requests.push(request);

    const answer = reply(request, requests.length - 1);
    if ('networkError' in answer) {
      throw new AxiosError(answer.networkError, 'ECONNREFUSED', config);
    }

    const response: AxiosResponse = {
      status: answer.status,
      statusText: String(answer.status),
      data: answer.data,
      headers: {},
      config,
    };

    if (answer.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${answer.status}`,
        answer.status >= 500 ? 'ERR_BAD_RESPONSE' : 'ERR_BAD_REQUEST',
        config,
        undefined,
        response
      );
    }

    return response;
  };

  return { adapter, requests };
}

export function jsonBody(request: RecordedRequest): unknown {
  return JSON.parse(String(request.data));
}

export function requestAt(requests: RecordedRequest[], index: number): RecordedRequest {
  const request = requests[index];
  if (!request) {
    throw new Error(`Expected a request at index ${index}, got ${requests.length} request(s)`);
  }
  return request;
}
