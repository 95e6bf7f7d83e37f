import { describe, it, expect } from 'vitest';
import {
  interpretResponse,
  serverErrorDetail,
  SubmitResponseSchema,
} from '../../src/core/responses.js';
import { AuthorizationError, DecodeError, RemoteError } from '../../src/core/errors.js';

describe('interpretResponse', () => {
  it('returns the validated payload for a 2xx JSON body', () => {
    const outcome = interpretResponse(
      { statusCode: 202, body: { kind: 'json', value: { source_id: 'abc123', success: true } } },
      SubmitResponseSchema,
      'submitting dataset'
    );
    expect(outcome).toEqual({
      ok: true,
      statusCode: 202,
      data: { source_id: 'abc123', success: true },
    });
  });

  it('reports the server error field for a failing JSON body', () => {
    const outcome = interpretResponse(
      { statusCode: 500, body: { kind: 'json', value: { error: 'db down' } } },
      SubmitResponseSchema,
      'submitting dataset'
    );
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(RemoteError);
    expect(outcome.error.message).toBe('Error 500 submitting dataset: db down');
  });

  it('reports the whole body when there is no error field', () => {
    const outcome = interpretResponse(
      { statusCode: 409, body: { kind: 'json', value: { reason: 'conflict' } } },
      SubmitResponseSchema,
      'submitting dataset'
    );
    if (outcome.ok) throw new Error('expected failure');
    expect(outcome.error.message).toBe('Error 409 submitting dataset: {"reason":"conflict"}');
  });

  it('reports an undecodable 2xx body as a decode error', () => {
    const outcome = interpretResponse(
      { statusCode: 200, body: { kind: 'text', text: '<html>', parseError: 'Unexpected token' } },
      SubmitResponseSchema,
      'submitting dataset'
    );
    if (outcome.ok) throw new Error('expected failure');
    expect(outcome.error).toBeInstanceOf(DecodeError);
    expect(outcome.error.message).toBe('Error decoding 200 response: <html>');
  });

  it('reports an undecodable error body as technical difficulties', () => {
    const outcome = interpretResponse(
      { statusCode: 502, body: { kind: 'text', text: 'Bad Gateway', parseError: 'Unexpected token' } },
      SubmitResponseSchema,
      'submitting dataset'
    );
    if (outcome.ok) throw new Error('expected failure');
    expect(outcome.error).toBeInstanceOf(RemoteError);
    expect(outcome.error.message).toBe(
      'Error 502. The Connect service may be experiencing technical difficulties.'
    );
  });

  it('marks 401 and 403 as authorization errors', () => {
    const outcome = interpretResponse(
      { statusCode: 403, body: { kind: 'json', value: { error: 'Forbidden' } } },
      SubmitResponseSchema,
      'submitting dataset'
    );
    if (outcome.ok) throw new Error('expected failure');
    expect(outcome.error).toBeInstanceOf(AuthorizationError);
    expect(outcome.error.message).toBe('Error 403 submitting dataset: Forbidden');
  });

  it('reports a 2xx body of the wrong shape as a decode error', () => {
    const outcome = interpretResponse(
      { statusCode: 200, body: { kind: 'json', value: { success: true } } },
      SubmitResponseSchema,
      'submitting dataset'
    );
    if (outcome.ok) throw new Error('expected failure');
    expect(outcome.error).toBeInstanceOf(DecodeError);
    expect(outcome.error.message).toMatch(/^Unexpected 200 response while submitting dataset: source_id: /);
  });
});

describe('serverErrorDetail', () => {
  it('stringifies a non-string error field', () => {
    expect(serverErrorDetail({ error: { code: 7 } })).toBe('{"code":7}');
  });
});
