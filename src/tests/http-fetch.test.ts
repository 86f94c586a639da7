import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MockAgent } from 'undici';
import { UndiciTransport } from '../core/http-fetch.js';
import { getImpersonationProfile, type ImpersonationProfile } from '../core/user-agents.js';
import { TransportError } from '../types.js';

const ORIGIN = 'https://listings.example.com';

function chromeProfile(): ImpersonationProfile {
  const profile = getImpersonationProfile('chrome136');
  if (!profile) throw new Error('chrome136 profile missing');
  return profile;
}

describe('UndiciTransport', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('returns body and status for a 200', async () => {
    agent.get(ORIGIN).intercept({ path: '/search/office/austin-tx/for-sale/', method: 'GET' }).reply(200, '<html>results</html>');
    const transport = new UndiciTransport({ profile: chromeProfile(), timeoutMs: 1000, dispatcher: agent });

    const response = await transport.get(`${ORIGIN}/search/office/austin-tx/for-sale/`);

    expect(response).toEqual({
      status: 200,
      body: '<html>results</html>',
      url: `${ORIGIN}/search/office/austin-tx/for-sale/`,
    });
  });

  it('returns non-2xx statuses instead of throwing', async () => {
    agent.get(ORIGIN).intercept({ path: '/blocked', method: 'GET' }).reply(403, 'denied');
    const transport = new UndiciTransport({ profile: chromeProfile(), timeoutMs: 1000, dispatcher: agent });

    const response = await transport.get(`${ORIGIN}/blocked`);

    expect(response.status).toBe(403);
    expect(response.body).toBe('denied');
  });

  it('sends the impersonation profile headers', async () => {
    const profile = chromeProfile();
    agent
      .get(ORIGIN)
      .intercept({
        path: '/',
        method: 'GET',
        headers: {
          'user-agent': profile.userAgent,
          'sec-ch-ua': '"Chromium";v="136", "Google Chrome";v="136", "Not.A/Brand";v="24"',
        },
      })
      .reply(200, 'ok');
    const transport = new UndiciTransport({ profile, timeoutMs: 1000, dispatcher: agent });

    await expect(transport.get(`${ORIGIN}/`)).resolves.toMatchObject({ status: 200, body: 'ok' });
  });

  it('sends cookies set by an earlier response', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: '/', method: 'GET' }).reply(200, 'home', { headers: { 'set-cookie': 'session=test-session; Path=/' } });
    pool.intercept({ path: '/Listing/123/', method: 'GET', headers: { cookie: 'session=test-session' } }).reply(200, 'detail');
    const transport = new UndiciTransport({ profile: chromeProfile(), timeoutMs: 1000, dispatcher: agent });

    await transport.get(`${ORIGIN}/`);
    const response = await transport.get(`${ORIGIN}/Listing/123/`);

    expect(response.body).toBe('detail');
  });

  it('follows redirects and keeps cookies set on the redirect hop', async () => {
    const pool = agent.get(ORIGIN);
    pool
      .intercept({ path: '/old', method: 'GET' })
      .reply(302, '', { headers: { location: '/new', 'set-cookie': 'hop=1; Path=/' } });
    pool.intercept({ path: '/new', method: 'GET', headers: { cookie: 'hop=1' } }).reply(200, 'moved here');
    const transport = new UndiciTransport({ profile: chromeProfile(), timeoutMs: 1000, dispatcher: agent });

    const response = await transport.get(`${ORIGIN}/old`);

    expect(response).toEqual({ status: 200, body: 'moved here', url: `${ORIGIN}/new` });
  });

  it('wraps connection failures in TransportError', async () => {
    agent.get(ORIGIN).intercept({ path: '/broken', method: 'GET' }).replyWithError(new Error('socket hang up'));
    const transport = new UndiciTransport({ profile: chromeProfile(), timeoutMs: 1000, dispatcher: agent });

    const failure = transport.get(`${ORIGIN}/broken`);

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toMatchObject({ code: 'TRANSPORT', url: `${ORIGIN}/broken` });
  });

  it('times out slow responses', async () => {
    agent.get(ORIGIN).intercept({ path: '/slow', method: 'GET' }).reply(200, 'late').delay(500);
    const transport = new UndiciTransport({ profile: chromeProfile(), timeoutMs: 50, dispatcher: agent });

    await expect(transport.get(`${ORIGIN}/slow`)).rejects.toThrow(`Request timed out after 50ms for URL: ${ORIGIN}/slow`);
  });

  it('refuses requests after close()', async () => {
    const transport = new UndiciTransport({ profile: chromeProfile(), timeoutMs: 1000, dispatcher: agent });
    await transport.close();
    await transport.close();

    await expect(transport.get(`${ORIGIN}/`)).rejects.toThrow('Transport is closed');
  });
});
