/**
 * Tests for AuthorizedSession - task dispatch and challenge interception
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  AuthorizedSession,
  AuthorizationError,
  AuthorizationErrorCode,
  ForwardingSessionDelegate,
  InMemoryAnalyticsMetadataProvider,
  NoAuthorizationProvider,
  TransportError,
  createSessionRequest,
  type TransportSessionOptions,
} from '@session-guard/core';
import {
  FakeAuthorizationProvider,
  FakeTransportSession,
  createMockLogger,
  httpResponse,
} from './test-utils.js';

describe('AuthorizedSession', () => {
  let provider: FakeAuthorizationProvider;
  let analytics: InMemoryAnalyticsMetadataProvider;
  let transport: FakeTransportSession;
  let session: AuthorizedSession;
  let trackingIds: number;

  beforeEach(() => {
    provider = new FakeAuthorizationProvider();
    analytics = new InMemoryAnalyticsMetadataProvider();
    transport = new FakeTransportSession();
    trackingIds = 0;
    session = new AuthorizedSession({
      authorizationProvider: provider,
      analyticsProvider: analytics,
      createTransport: () => transport,
      generateTrackingId: () => `tracking-${++trackingIds}`,
      logger: createMockLogger(),
      env: {},
    });
  });

  describe('task creation', () => {
    it('decorates a data task created from a URL string', () => {
      const task = session.dataTask('https://api.example.com/api/data');

      expect(task).toBe(transport.task(0));
      expect(transport.task(0).request).toEqual({
        url: 'https://api.example.com/api/data',
        method: 'GET',
        headers: { 'x-wl-analytics-tracking-id': 'tracking-1' },
      });
      expect(transport.task(0).completion).toBeUndefined();
      expect(transport.task(0).resumeCount).toBe(0);
    });

    it('accepts URL objects', () => {
      session.dataTask(new URL('https://api.example.com/items?page=2'));

      expect(transport.task(0).request.url).toBe('https://api.example.com/items?page=2');
    });

    it('rejects an unparsable URL', () => {
      expect(() => session.dataTask('not a url')).toThrow(TransportError);
      expect(transport.tasks).toHaveLength(0);
    });

    it('decorates data tasks created from a request', () => {
      provider.token = 'Bearer cached';
      analytics.update({ deviceId: 'device-1' });
      const request = createSessionRequest('https://api.example.com/api/data', {
        headers: { Accept: 'application/json' },
      });

      session.dataTask(request);

      expect(transport.task(0).request.headers).toEqual({
        Accept: 'application/json',
        Authorization: 'Bearer cached',
        'x-wl-analytics-tracking-id': 'tracking-1',
        'x-mfp-analytics-metadata': '{"deviceId":"device-1"}',
      });
      expect(request.headers).toEqual({ Accept: 'application/json' });
    });

    it('decorates upload tasks from data', () => {
      const request = createSessionRequest('https://api.example.com/upload', { method: 'POST' });
      const data = new Uint8Array([104, 105]);

      session.uploadTask(request, data);

      const task = transport.task(0);
      expect(task.source).toEqual({ type: 'data', data });
      expect(task.request.headers).toEqual({ 'x-wl-analytics-tracking-id': 'tracking-1' });
      expect(task.completion).toBeUndefined();
    });

    it('decorates upload tasks without data', () => {
      const request = createSessionRequest('https://api.example.com/upload', { method: 'POST' });

      session.uploadTask(request, undefined, vi.fn());

      expect(transport.task(0).source).toEqual({ type: 'data', data: undefined });
    });

    it('decorates upload tasks from files', () => {
      const request = createSessionRequest('https://api.example.com/upload', { method: 'PUT' });

      session.uploadTaskFromFile(request, '/tmp/report.csv');

      expect(transport.task(0).source).toEqual({ type: 'file', path: '/tmp/report.csv' });
      expect(transport.task(0).request.headers).toEqual({
        'x-wl-analytics-tracking-id': 'tracking-1',
      });
    });
  });

  describe('completion handling', () => {
    it('passes ordinary responses through unchanged', () => {
      const completion = vi.fn();
      session.dataTask('https://api.example.com/api/data', completion);
      const response = httpResponse(200, { 'content-type': 'application/json' });

      transport.task(0).complete(response);

      expect(completion).toHaveBeenCalledTimes(1);
      expect(completion).toHaveBeenCalledWith(response, undefined);
      expect(provider.obtainAuthorization).not.toHaveBeenCalled();
    });

    it('passes transport errors through unchanged', () => {
      const completion = vi.fn();
      session.dataTask('https://api.example.com/api/data', completion);
      const error = TransportError.connectionFailed('socket hang up');

      transport.task(0).complete(undefined, error);

      expect(completion).toHaveBeenCalledWith(undefined, error);
    });

    it('passes a 401 without WWW-Authenticate through unchanged', () => {
      const completion = vi.fn();
      session.dataTask('https://api.example.com/api/data', completion);
      const response = httpResponse(401);

      transport.task(0).complete(response);

      expect(completion).toHaveBeenCalledWith(response, undefined);
      expect(provider.obtainAuthorization).not.toHaveBeenCalled();
    });

    it('passes a challenge the provider declines through unchanged', () => {
      provider.isAuthorizationRequired.mockReturnValue(false);
      const completion = vi.fn();
      session.dataTask('https://api.example.com/api/data', completion);
      const response = httpResponse(401, { 'WWW-Authenticate': 'Basic realm="other"' });

      transport.task(0).complete(response);

      expect(completion).toHaveBeenCalledWith(response, undefined);
    });

    it('retries a challenged request once and delivers the retried response', () => {
      const completion = vi.fn();
      session.dataTask('https://api.example.com/api/data', completion);

      // GET /api/data goes out without a token
      const original = transport.task(0);
      expect(original.request.headers).toEqual({ 'x-wl-analytics-tracking-id': 'tracking-1' });

      original.complete(httpResponse(401, { 'WWW-Authenticate': 'Bearer' }));
      expect(completion).not.toHaveBeenCalled();
      expect(provider.isAuthorizationRequired).toHaveBeenCalledWith(401, 'Bearer');
      expect(provider.obtainAuthorization).toHaveBeenCalledTimes(1);

      provider.grant('Bearer fresh-token');

      // the undecorated original is resubmitted with the fresh token only
      const retry = transport.task(1);
      expect(retry.request).toEqual({
        url: 'https://api.example.com/api/data',
        method: 'GET',
        headers: { Authorization: 'Bearer fresh-token' },
      });
      expect(retry.resumeCount).toBe(1);

      const retried = httpResponse(200);
      retry.complete(retried);

      expect(completion).toHaveBeenCalledTimes(1);
      expect(completion).toHaveBeenCalledWith(retried, undefined);
      expect(transport.tasks).toHaveLength(2);
    });

    it('delivers a rejected retry as final', () => {
      const completion = vi.fn();
      session.dataTask('https://api.example.com/api/data', completion);
      transport.task(0).complete(httpResponse(401, { 'WWW-Authenticate': 'Bearer' }));
      provider.grant('Bearer still-bad');

      const rejected = httpResponse(401, { 'WWW-Authenticate': 'Bearer error="invalid_token"' });
      transport.task(1).complete(rejected);

      expect(completion).toHaveBeenCalledWith(rejected, undefined);
      expect(provider.obtainAuthorization).toHaveBeenCalledTimes(1);
    });

    it('reports a failed reauthorization instead of the challenge response', () => {
      const completion = vi.fn();
      session.dataTask('https://api.example.com/api/data', completion);
      transport.task(0).complete(httpResponse(401, { 'WWW-Authenticate': 'Bearer' }));

      provider.reject(404);

      expect(transport.tasks).toHaveLength(1);
      expect(completion).toHaveBeenCalledTimes(1);
      const [response, error] = completion.mock.calls[0] ?? [];
      expect(response).toBeUndefined();
      expect(error).toBeInstanceOf(AuthorizationError);
      expect(error.code).toBe(AuthorizationErrorCode.AUTHORIZATION_REJECTED);
    });

    it('reports a transport that refuses the retry to the caller', () => {
      const completion = vi.fn();
      const invalidated = TransportError.sessionInvalidated();
      provider.obtainAuthorization.mockImplementation((onComplete) => {
        vi.spyOn(transport, 'dataTask').mockImplementation(() => {
          throw invalidated;
        });
        provider.token = 'Bearer fresh-token';
        onComplete({ statusCode: 200 }, undefined);
      });
      session.dataTask('https://api.example.com/api/data', completion);

      transport.task(0).complete(httpResponse(401, { 'www-authenticate': 'Bearer' }));

      expect(completion).toHaveBeenCalledTimes(1);
      expect(completion).toHaveBeenCalledWith(undefined, invalidated);
    });

    it('retries a challenged upload with its original source', () => {
      const completion = vi.fn();
      const request = createSessionRequest('https://api.example.com/upload', { method: 'POST' });
      const data = new Uint8Array([1, 2, 3]);
      session.uploadTask(request, data, completion);

      transport.task(0).complete(httpResponse(401, { 'WWW-Authenticate': 'Bearer' }));
      provider.grant('Bearer fresh-token');

      const retry = transport.task(1);
      expect(retry.source).toEqual({ type: 'data', data });
      expect(retry.request.headers).toEqual({ Authorization: 'Bearer fresh-token' });

      const created = httpResponse(201);
      retry.complete(created);
      expect(completion).toHaveBeenCalledWith(created, undefined);
    });

    it('retries a challenged file upload with the same file', () => {
      const completion = vi.fn();
      const request = createSessionRequest('https://api.example.com/upload', { method: 'PUT' });
      session.uploadTaskFromFile(request, '/tmp/report.csv', completion);

      transport.task(0).complete(httpResponse(401, { 'WWW-Authenticate': 'Bearer' }));
      provider.grant('Bearer fresh-token');

      expect(transport.task(1).source).toEqual({ type: 'file', path: '/tmp/report.csv' });
    });
  });

  describe('construction', () => {
    it('hands configuration and a wrapped delegate to the transport factory', () => {
      const delegate = { didReceiveData: vi.fn() };
      const createTransport = vi.fn((_options: TransportSessionOptions) => new FakeTransportSession());

      new AuthorizedSession({
        createTransport,
        delegate,
        config: { timeout: 5000, headers: { 'User-Agent': 'session-guard-test' } },
        env: {},
        logger: createMockLogger(),
      });

      expect(createTransport).toHaveBeenCalledTimes(1);
      const options = createTransport.mock.calls[0]?.[0];
      expect(options?.timeout).toBe(5000);
      expect(options?.headers).toEqual({ 'User-Agent': 'session-guard-test' });
      expect(options?.delegate).toBeInstanceOf(ForwardingSessionDelegate);
      expect(options?.delegate).toEqual(expect.objectContaining({ parent: delegate }));
    });

    it('passes no delegate when none is given', () => {
      const createTransport = vi.fn((_options: TransportSessionOptions) => new FakeTransportSession());

      new AuthorizedSession({ createTransport, env: {}, logger: createMockLogger() });

      expect(createTransport.mock.calls[0]?.[0].delegate).toBeUndefined();
      expect(createTransport.mock.calls[0]?.[0].timeout).toBe(30000);
    });

    it('takes the timeout from the environment when not configured', () => {
      const createTransport = vi.fn((_options: TransportSessionOptions) => new FakeTransportSession());

      new AuthorizedSession({
        createTransport,
        env: { SESSION_GUARD_TIMEOUT_MS: '1500' },
        logger: createMockLogger(),
      });

      expect(createTransport.mock.calls[0]?.[0].timeout).toBe(1500);
    });

    it('exposes the transport it built', () => {
      expect(session.transport).toBe(transport);
    });

    it('works without an authorization provider', () => {
      const bare = new AuthorizedSession({
        createTransport: () => transport,
        generateTrackingId: () => 'tracking-bare',
        env: {},
        logger: createMockLogger(),
      });
      const completion = vi.fn();

      bare.dataTask('https://api.example.com/api/data', completion);
      const response = httpResponse(401, { 'WWW-Authenticate': 'Bearer' });
      transport.task(0).complete(response);

      expect(transport.task(0).request.headers).toEqual({
        'x-wl-analytics-tracking-id': 'tracking-bare',
      });
      expect(completion).toHaveBeenCalledWith(response, undefined);
    });
  });
});

describe('NoAuthorizationProvider', () => {
  it('never has a token and never requires authorization', () => {
    const provider = new NoAuthorizationProvider();

    expect(provider.cachedAuthorizationHeader()).toBeUndefined();
    expect(provider.isAuthorizationRequired()).toBe(false);
  });

  it('answers authorization requests with not_supported', () => {
    const onComplete = vi.fn();

    new NoAuthorizationProvider().obtainAuthorization(onComplete);

    expect(onComplete).toHaveBeenCalledTimes(1);
    const [response, error] = onComplete.mock.calls[0] ?? [];
    expect(response).toBeUndefined();
    expect(error.code).toBe(AuthorizationErrorCode.NOT_SUPPORTED);
  });
});
