import { describe, it, expect, afterEach } from 'vitest';
import { AppError, ErrorCode } from '@tandem/shared';
import { createGateway, extractCredential, type Gateway } from '../server';
import { createCollaborators } from './helpers';

function buildGateway(): Gateway {
  return createGateway({
    host: '127.0.0.1',
    port: 0,
    wsPath: '/ws',
    maxPayloadBytes: 65_536,
    rateLimitPerSecond: 30,
    outboundChannelCapacity: 16,
    inboundQueueCapacity: 16,
    heartbeatIntervalMs: 30_000,
    idleTimeoutMs: 120_000,
    ...createCollaborators(),
  });
}

describe('extractCredential', () => {
  it('prefers the token query parameter', () => {
    const url = new URL('http://localhost/ws?token=query-token');
    expect(extractCredential(url, 'Bearer header-token')).toBe('query-token');
  });

  it('falls back to a bearer Authorization header', () => {
    const url = new URL('http://localhost/ws');
    expect(extractCredential(url, 'Bearer header-token')).toBe('header-token');
    expect(extractCredential(url, 'bearer  spaced-token ')).toBe('spaced-token');
  });

  it('returns undefined when neither is usable', () => {
    const url = new URL('http://localhost/ws?token=');
    expect(extractCredential(url, undefined)).toBeUndefined();
    expect(extractCredential(url, 'Basic dXNlcjpwYXNz')).toBeUndefined();
  });
});

describe('gateway HTTP routes', () => {
  let gateway: Gateway | null = null;

  afterEach(async () => {
    await gateway?.close();
    gateway = null;
  });

  it('reports health with the live connection count', async () => {
    gateway = buildGateway();
    const res = await gateway.app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe('ok');
    expect(body.connections).toBe(0);
    expect(typeof body.timestamp).toBe('string');
  });

  it('answers unknown routes with a NOT_FOUND body', async () => {
    gateway = buildGateway();
    const res = await gateway.app.inject({ method: 'GET', url: '/nope' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ code: 'NOT_FOUND', message: 'Route not found', path: '/nope' });
  });

  it('maps thrown AppErrors to their HTTP status', async () => {
    gateway = buildGateway();
    gateway.app.get('/forbidden', async () => {
      throw new AppError(ErrorCode.FORBIDDEN, 'Not allowed');
    });
    gateway.app.get('/broken', async () => {
      throw new Error('secret detail');
    });

    const forbidden = await gateway.app.inject({ method: 'GET', url: '/forbidden' });
    const broken = await gateway.app.inject({ method: 'GET', url: '/broken' });

    expect(forbidden.statusCode).toBe(403);
    expect(forbidden.json()).toEqual({ code: 'FORBIDDEN', message: 'Not allowed' });
    expect(broken.statusCode).toBe(500);
    expect(broken.json()).toEqual({ code: 'INTERNAL', message: 'Internal server error' });
  });
});
