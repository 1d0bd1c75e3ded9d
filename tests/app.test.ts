import { describe, expect, it } from 'vitest';
import { createApp, requestLogFields, sendOutcome, type JsonResponder, type LoggedRequest } from '../src/app.js';
import { CareerAdvisor } from '../src/services/career-advisor.js';
import { ReferenceDataStore } from '../src/data/store.js';
import { httpStatusFor, toErrorPayload, NotFoundError, ValidationError } from '../src/utils/errors.js';

class RecordingResponse implements JsonResponder {
  statusCode = 200;
  body: unknown;

  status(code: number): RecordingResponse {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): RecordingResponse {
    this.body = body;
    return this;
  }
}

describe('sendOutcome', () => {
  it('should send results with the default status', () => {
    const res = new RecordingResponse();
    sendOutcome(res, { careers: ['Doctor'] });

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ careers: ['Doctor'] });
  });

  it('should map error codes to HTTP statuses', () => {
    const notFound = new RecordingResponse();
    sendOutcome(notFound, { error: "Career 'Pilot' not found", code: 'NOT_FOUND', available: ['Doctor'] });
    expect(notFound.statusCode).toBe(404);
    expect(notFound.body).toEqual({ error: "Career 'Pilot' not found", code: 'NOT_FOUND', available: ['Doctor'] });

    const invalid = new RecordingResponse();
    sendOutcome(invalid, { error: 'career is required', code: 'VALIDATION_ERROR' });
    expect(invalid.statusCode).toBe(400);

    const unexpected = new RecordingResponse();
    sendOutcome(unexpected, { error: 'Internal error', code: 'UNEXPECTED_ERROR' });
    expect(unexpected.statusCode).toBe(500);
  });
});

describe('error payloads', () => {
  it('should carry the available names of a NotFoundError', () => {
    expect(toErrorPayload(new NotFoundError('missing', ['a', 'b']))).toEqual({
      error: 'missing',
      code: 'NOT_FOUND',
      available: ['a', 'b'],
    });
  });

  it('should hide the message of foreign errors', () => {
    expect(toErrorPayload(new TypeError('x is undefined'))).toEqual({ error: 'Internal error', code: 'UNEXPECTED_ERROR' });
    expect(toErrorPayload('thrown string')).toEqual({ error: 'Internal error', code: 'UNEXPECTED_ERROR' });
  });

  it('should treat configuration problems as server errors', () => {
    expect(httpStatusFor({ error: 'x', code: 'REFERENCE_DATA_INVALID' })).toBe(500);
    expect(httpStatusFor(toErrorPayload(new ValidationError('bad')))).toBe(400);
  });
});

describe('requestLogFields', () => {
  const request = (query: Record<string, unknown>, headers: Record<string, string> = {}): LoggedRequest => ({
    ip: '127.0.0.1',
    query,
    get: (name) => headers[name],
  });

  it('should record the status, duration and selected region', () => {
    expect(
      requestLogFields(request({ region: 'india', mode: '' }, { 'user-agent': 'test-agent' }), 404, 1000, 1012)
    ).toEqual({ status: 404, durationMs: 12, ip: '127.0.0.1', userAgent: 'test-agent', region: 'india' });
  });

  it('should skip query values that are not plain strings', () => {
    expect(requestLogFields(request({ region: ['global', 'india'] }), 200, 5, 5)).toEqual({
      status: 200,
      durationMs: 0,
      ip: '127.0.0.1',
    });
  });
});

describe('createApp', () => {
  it('should build an express handler without listening', () => {
    const app = createApp(new CareerAdvisor(ReferenceDataStore.fromPartial()));
    expect(typeof app).toBe('function');
    expect(typeof app.listen).toBe('function');
  });
});
