/**
 * 进程内的 axios 适配器，模拟气象数据 API
 */

import { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  body: unknown;
}

export type RouteHandler = (request: RecordedRequest) => { status: number; data: unknown } | Error;

export interface FakeApi {
  adapter: AxiosAdapter;
  requests: RecordedRequest[];
}

function parseBody(data: unknown): unknown {
  return typeof data === 'string' && data.length > 0 ? JSON.parse(data) : data;
}

/**
 * 按 "METHOD url" 分发请求；未登记的路由返回 404
 */
export function createFakeApi(routes: Record<string, RouteHandler>): FakeApi {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const request: RecordedRequest = {
      method: (config.method || 'get').toUpperCase(),
      url: config.url || '',
      body: parseBody(config.data)
    };
    requests.push(request);

    const handler = routes[`${request.method} ${request.url}`];
    const outcome = handler ? handler(request) : { status: 404, data: { detail: 'Not Found' } };

    if (outcome instanceof Error) {
      throw outcome;
    }

    const response: AxiosResponse = {
      data: outcome.data,
      status: outcome.status,
      statusText: String(outcome.status),
      headers: {},
      config
    };

    if (outcome.status < 200 || outcome.status >= 300) {
      throw new AxiosError(
        `Request failed with status code ${outcome.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        null,
        response
      );
    }

    return response;
  };

  return { adapter, requests };
}

export function connectionRefused(): AxiosError {
  return new AxiosError('connect ECONNREFUSED 127.0.0.1:8000', 'ECONNREFUSED');
}

/** 所有城市都成功的 /download/bulk 响应 */
export function bulkOk(cities: string[], rows = 24): RouteHandler {
  return () => ({
    status: 200,
    data: {
      result: cities.map(city => ({ city, success: true, rows, file: `${city}.csv` }))
    }
  });
}
