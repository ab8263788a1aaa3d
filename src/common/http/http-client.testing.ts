import { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';

export interface StubResponse {
  status: number;
  body: string;
}

/**
 * 프로세스 내 axios 어댑터
 *
 * 요청 설정을 기록하고 미리 정한 응답을 순서대로 반환합니다.
 * 마지막 응답은 이후 요청에 반복 사용됩니다.
 */
export function stubAxiosAdapter(...responses: StubResponse[]) {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    const response = responses[Math.min(requests.length, responses.length - 1)];
    requests.push(config);
    return {
      data: response.body,
      status: response.status,
      statusText: String(response.status),
      headers: {},
      config,
    };
  };
  return { adapter, requests };
}

export function jsonResponse(payload: unknown, status = 200): StubResponse {
  return { status, body: JSON.stringify(payload) };
}
