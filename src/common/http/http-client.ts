import { Logger } from '@nestjs/common';
import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import { HttpClientError, getErrorMessage } from '../errors/news-errors';

/** 기본 요청 타임아웃 (밀리초) */
export const DEFAULT_HTTP_TIMEOUT_MS = 30000;

/** 모든 요청에 포함되는 기본 헤더 */
export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'application/json',
  'User-Agent': 'ticker-news-aggregator/1.0',
};

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * HTTP 클라이언트 생성 옵션
 */
export interface HttpClientOptions {
  /** 상대 경로 요청에 붙는 기본 URL */
  baseUrl?: string;
  /** 요청 타임아웃 (밀리초) */
  timeoutMs?: number;
  /** 기본 헤더에 병합되는 추가 헤더 */
  headers?: Record<string, string>;
  /** axios 전송 어댑터 (테스트에서 프로세스 내 응답을 주입할 때 사용) */
  adapter?: AxiosAdapter;
}

export interface RequestOptions {
  params?: QueryParams;
  headers?: Record<string, string>;
  /** 이 요청에만 적용되는 타임아웃 */
  timeoutMs?: number;
}

export interface PostOptions extends RequestOptions {
  /** 폼 데이터 또는 원본 문자열 본문 */
  data?: Record<string, string> | string;
  /** JSON 본문 (data보다 우선) */
  json?: unknown;
}

/**
 * HTTP 응답 (본문은 디코딩 전 문자열)
 */
export interface HttpResponse {
  url: string;
  status: number;
  body: string;
}

/**
 * 범용 HTTP 클라이언트
 *
 * axios 인스턴스를 감싸 GET/POST 요청을 수행합니다.
 *
 * 주요 기능:
 * - 기본 URL 결합 (절대 URL은 그대로 사용)
 * - 기본 헤더 + 요청별 헤더 병합
 * - 클라이언트 단위 타임아웃
 * - 2xx 이외의 응답은 HttpClientError로 변환
 * - keep-alive 에이전트를 소유하며 close()로 해제
 */
export class HttpClient {
  private readonly logger = new Logger(HttpClient.name);

  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly headers: Readonly<Record<string, string>>;

  private readonly httpAgent = new http.Agent({ keepAlive: true });
  private readonly httpsAgent = new https.Agent({ keepAlive: true });
  private readonly client: AxiosInstance;
  private closed = false;

  constructor(options: HttpClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? '').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.headers = { ...DEFAULT_HEADERS, ...options.headers };

    this.client = axios.create({
      timeout: this.timeoutMs,
      headers: { ...this.headers },
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      adapter: options.adapter,
      // 상태 코드와 JSON 디코딩은 직접 처리
      responseType: 'text',
      transformResponse: (data: unknown) => data,
      validateStatus: () => true,
    });
  }

  /**
   * 엔드포인트로부터 전체 URL을 만듭니다
   *
   * @example
   * ```typescript
   * new HttpClient({ baseUrl: 'https://api.example.com/' }).buildUrl('/users');
   * // 'https://api.example.com/users'
   * ```
   */
  buildUrl(endpoint: string): string {
    if (endpoint.startsWith('http')) {
      return endpoint;
    }

    if (this.baseUrl) {
      return `${this.baseUrl}/${endpoint.replace(/^\/+/, '')}`;
    }

    return endpoint;
  }

  async get(endpoint: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.request('GET', endpoint, options);
  }

  async post(endpoint: string, options: PostOptions = {}): Promise<HttpResponse> {
    return this.request('POST', endpoint, options);
  }

  /**
   * GET 요청 후 JSON 본문을 반환합니다
   *
   * @throws {HttpClientError} 요청 실패 또는 JSON이 아닌 본문
   */
  async getJson(endpoint: string, options: RequestOptions = {}): Promise<unknown> {
    return this.decodeJson(await this.get(endpoint, options));
  }

  async postJson(endpoint: string, json?: unknown, options: RequestOptions = {}): Promise<unknown> {
    return this.decodeJson(await this.post(endpoint, { ...options, json }));
  }

  /**
   * keep-alive 소켓을 정리합니다
   *
   * 이후의 요청은 HttpClientError로 실패합니다.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private async request(
    method: 'GET' | 'POST',
    endpoint: string,
    options: PostOptions,
  ): Promise<HttpResponse> {
    const url = this.buildUrl(endpoint);

    if (this.closed) {
      throw new HttpClientError(`${method} request failed for ${url}: client is closed`, url);
    }

    const headers: Record<string, string> = { ...options.headers };
    let data: string | undefined;
    if (options.json !== undefined) {
      data = JSON.stringify(options.json);
      headers['Content-Type'] = 'application/json';
    } else if (typeof options.data === 'string') {
      data = options.data;
    } else if (options.data) {
      data = new URLSearchParams(options.data).toString();
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    this.logger.debug(`${method} ${url}`);

    let status: number;
    let body: unknown;
    try {
      const response = await this.client.request({
        method,
        url,
        params: options.params,
        headers,
        data,
        timeout: options.timeoutMs ?? this.timeoutMs,
      });
      status = response.status;
      body = response.data;
    } catch (error) {
      throw new HttpClientError(`${method} request failed for ${url}: ${getErrorMessage(error)}`, url);
    }

    if (status < 200 || status >= 300) {
      throw new HttpClientError(`${method} request failed for ${url}: HTTP ${status}`, url, status);
    }

    return { url, status, body: typeof body === 'string' ? body : '' };
  }

  private decodeJson(response: HttpResponse): unknown {
    try {
      return JSON.parse(response.body);
    } catch (error) {
      throw new HttpClientError(
        `Failed to decode JSON response from ${response.url}: ${getErrorMessage(error)}`,
        response.url,
        response.status,
      );
    }
  }
}
