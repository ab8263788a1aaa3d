import { AxiosAdapter } from 'axios';
import { HttpClientError } from '../errors/news-errors';
import { DEFAULT_HTTP_TIMEOUT_MS, HttpClient } from './http-client';
import { stubAxiosAdapter } from './http-client.testing';

function stubAdapter(status: number, body: string) {
  return stubAxiosAdapter({ status, body });
}

describe('HttpClient', () => {
  describe('construction', () => {
    it('uses default values', () => {
      const client = new HttpClient();

      expect(client.baseUrl).toBe('');
      expect(client.timeoutMs).toBe(DEFAULT_HTTP_TIMEOUT_MS);
      expect(client.headers['User-Agent']).toBe('ticker-news-aggregator/1.0');
      client.close();
    });

    it('merges custom headers over the defaults', () => {
      const client = new HttpClient({
        baseUrl: 'https://api.example.com',
        timeoutMs: 60000,
        headers: { Authorization: 'Bearer test-token' },
      });

      expect(client.baseUrl).toBe('https://api.example.com');
      expect(client.timeoutMs).toBe(60000);
      expect(client.headers).toEqual({
        'Content-Type': 'application/json',
        'User-Agent': 'ticker-news-aggregator/1.0',
        Authorization: 'Bearer test-token',
      });
      client.close();
    });
  });

  describe('buildUrl', () => {
    it('joins relative endpoints to the base url', () => {
      const client = new HttpClient({ baseUrl: 'https://api.example.com/' });

      expect(client.buildUrl('/users')).toBe('https://api.example.com/users');
      expect(client.buildUrl('users')).toBe('https://api.example.com/users');
      client.close();
    });

    it('passes absolute urls through', () => {
      const client = new HttpClient({ baseUrl: 'https://api.example.com' });

      expect(client.buildUrl('https://other.example.com/x')).toBe('https://other.example.com/x');
      client.close();
    });

    it('returns the endpoint as is without a base url', () => {
      const client = new HttpClient();

      expect(client.buildUrl('/users')).toBe('/users');
      client.close();
    });
  });

  describe('requests', () => {
    it('sends GET with params and merged headers', async () => {
      const { adapter, requests } = stubAdapter(200, '{"ok":true}');
      const client = new HttpClient({ baseUrl: 'https://api.example.com', adapter });

      const data = await client.getJson('api/items', {
        params: { ticker: 'AAPL' },
        headers: { 'X-Trace': 'abc' },
      });

      expect(data).toEqual({ ok: true });
      expect(requests).toHaveLength(1);
      expect(requests[0].method).toBe('get');
      expect(requests[0].url).toBe('https://api.example.com/api/items');
      expect(requests[0].params).toEqual({ ticker: 'AAPL' });
      expect(requests[0].headers.get('X-Trace')).toBe('abc');
      expect(requests[0].headers.get('User-Agent')).toBe('ticker-news-aggregator/1.0');
      client.close();
    });

    it('sends a JSON body on postJson', async () => {
      const { adapter, requests } = stubAdapter(201, '{"id":1}');
      const client = new HttpClient({ adapter });

      const data = await client.postJson('https://api.example.com/items', { name: 'x' });

      expect(data).toEqual({ id: 1 });
      expect(requests[0].method).toBe('post');
      expect(requests[0].data).toBe('{"name":"x"}');
      client.close();
    });

    it('form-encodes object data on post', async () => {
      const { adapter, requests } = stubAdapter(200, 'done');
      const client = new HttpClient({ adapter });

      const response = await client.post('https://api.example.com/form', { data: { a: '1', b: 'two' } });

      expect(response.body).toBe('done');
      expect(requests[0].data).toBe('a=1&b=two');
      expect(requests[0].headers.get('Content-Type')).toBe('application/x-www-form-urlencoded');
      client.close();
    });

    it('applies a per-request timeout', async () => {
      const { adapter, requests } = stubAdapter(200, '[]');
      const client = new HttpClient({ adapter, timeoutMs: 5000 });

      await client.get('https://api.example.com/a');
      await client.get('https://api.example.com/b', { timeoutMs: 100 });

      expect(requests[0].timeout).toBe(5000);
      expect(requests[1].timeout).toBe(100);
      client.close();
    });

    it('raises on non-2xx status', async () => {
      const { adapter } = stubAdapter(503, 'unavailable');
      const client = new HttpClient({ baseUrl: 'https://api.example.com', adapter });

      const error = await client.get('down').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HttpClientError);
      expect(error).toMatchObject({
        message: 'GET request failed for https://api.example.com/down: HTTP 503',
        status: 503,
        url: 'https://api.example.com/down',
      });
      client.close();
    });

    it('wraps transport failures', async () => {
      const adapter: AxiosAdapter = async () => {
        throw new Error('socket hang up');
      };
      const client = new HttpClient({ adapter });

      await expect(client.get('https://api.example.com/x')).rejects.toThrow(
        'GET request failed for https://api.example.com/x: socket hang up',
      );
      client.close();
    });

    it('raises when the body is not JSON', async () => {
      const { adapter } = stubAdapter(200, '<html></html>');
      const client = new HttpClient({ adapter });

      await expect(client.getJson('https://api.example.com/page')).rejects.toBeInstanceOf(HttpClientError);
      client.close();
    });

    it('rejects requests after close', async () => {
      const { adapter, requests } = stubAdapter(200, '{}');
      const client = new HttpClient({ adapter });

      client.close();

      expect(client.isClosed).toBe(true);
      await expect(client.get('https://api.example.com/x')).rejects.toThrow('client is closed');
      expect(requests).toHaveLength(0);
    });
  });
});
