/**
 * Unit tests for error taxonomy functions.
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, createError, classifyHttpError } from './errors.js';

describe('createError', () => {
  it('creates error with defaults for NOT_FOUND', () => {
    const error = createError(ErrorCode.NOT_FOUND, 'No such channel');
    expect(error.code).toBe(ErrorCode.NOT_FOUND);
    expect(error.message).toBe('No such channel');
    expect(error.retryable).toBe(false);
    expect(error.suggestions).toContain('Use list_servers or list_channels to see what is available');
    expect(error).not.toHaveProperty('candidates');
  });

  it('creates retryable errors for transient codes by default', () => {
    for (const code of [
      ErrorCode.RATE_LIMITED,
      ErrorCode.NETWORK_ERROR,
      ErrorCode.TIMEOUT,
      ErrorCode.API_ERROR,
      ErrorCode.NOT_READY,
    ]) {
      expect(createError(code, 'x').retryable).toBe(true);
    }
  });

  it('creates non-retryable errors for caller mistakes by default', () => {
    for (const code of [ErrorCode.INVALID_INPUT, ErrorCode.AMBIGUOUS, ErrorCode.PERMISSION_DENIED, ErrorCode.INTERNAL]) {
      expect(createError(code, 'x').retryable).toBe(false);
    }
  });

  it('allows overriding retryable flag', () => {
    const error = createError(ErrorCode.API_ERROR, 'Bad emoji', { retryable: false });
    expect(error.retryable).toBe(false);
  });

  it('allows custom suggestions', () => {
    const error = createError(ErrorCode.NOT_FOUND, 'Missing', { suggestions: ['Try the ID'] });
    expect(error.suggestions).toEqual(['Try the ID']);
  });

  it('carries candidates for ambiguous matches', () => {
    const error = createError(ErrorCode.AMBIGUOUS, 'Which one?', {
      candidates: ['ServerA → #general', 'ServerB → #general'],
    });
    expect(error.candidates).toEqual(['ServerA → #general', 'ServerB → #general']);
    expect(error.suggestions).toEqual([
      'Resupply the request as ServerName/channel',
      'Or use the channel ID from list_channels',
    ]);
  });
});

describe('classifyHttpError', () => {
  it('classifies 401 and 403 as PERMISSION_DENIED', () => {
    expect(classifyHttpError(401)).toBe(ErrorCode.PERMISSION_DENIED);
    expect(classifyHttpError(403)).toBe(ErrorCode.PERMISSION_DENIED);
  });

  it('classifies 404 as NOT_FOUND', () => {
    expect(classifyHttpError(404)).toBe(ErrorCode.NOT_FOUND);
  });

  it('classifies 429 as RATE_LIMITED', () => {
    expect(classifyHttpError(429)).toBe(ErrorCode.RATE_LIMITED);
  });

  it('classifies 400 and 422 as INVALID_INPUT', () => {
    expect(classifyHttpError(400)).toBe(ErrorCode.INVALID_INPUT);
    expect(classifyHttpError(422)).toBe(ErrorCode.INVALID_INPUT);
  });

  it('classifies 5xx as API_ERROR', () => {
    expect(classifyHttpError(500)).toBe(ErrorCode.API_ERROR);
    expect(classifyHttpError(503)).toBe(ErrorCode.API_ERROR);
  });

  it('falls back to the message for transport failures', () => {
    expect(classifyHttpError(0, 'Request timeout')).toBe(ErrorCode.TIMEOUT);
    expect(classifyHttpError(0, 'network down')).toBe(ErrorCode.NETWORK_ERROR);
    expect(classifyHttpError(0, 'read ECONNRESET')).toBe(ErrorCode.NETWORK_ERROR);
  });

  it('returns UNKNOWN for anything else', () => {
    expect(classifyHttpError(418)).toBe(ErrorCode.UNKNOWN);
    expect(classifyHttpError(0, 'something odd')).toBe(ErrorCode.UNKNOWN);
  });
});
