import { describe, it, expect, vi } from 'vitest';
import type { Response } from 'express';
import { ErrorCode } from '@relayshare/shared';
import { createErrorResponse, sendError, sendInternalError } from '@/shared/utils/error-response';

function createMockResponse() {
  const res = {
    status: vi.fn(),
    json: vi.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
}

describe('error-response', () => {
  it('builds the default body of a code', () => {
    expect(createErrorResponse(ErrorCode.FORBIDDEN)).toEqual({
      statusCode: 403,
      body: { error: 'Forbidden', message: 'Access denied', code: 'FORBIDDEN' },
    });
  });

  it('takes a custom message and details', () => {
    expect(createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Malformed update', { issue: 'Required' })).toEqual({
      statusCode: 400,
      body: {
        error: 'Bad Request',
        message: 'Malformed update',
        code: 'VALIDATION_ERROR',
        details: { issue: 'Required' },
      },
    });
  });

  it('maps relay failures to gateway statuses', () => {
    expect(createErrorResponse(ErrorCode.RELAY_FAILED).statusCode).toBe(502);
    expect(createErrorResponse(ErrorCode.PERSISTENCE_FAILED).body.error).toBe('Service Unavailable');
  });

  it('sends the response', () => {
    const res = createMockResponse();

    sendError(res as unknown as Response, ErrorCode.SHARE_NOT_FOUND);

    expect(res.status).toHaveBeenCalledWith(404);
    expect(res.json).toHaveBeenCalledWith({ error: 'Not Found', message: 'Share not found', code: 'SHARE_NOT_FOUND' });
  });

  it('never exposes internal details', () => {
    const res = createMockResponse();

    sendInternalError(res as unknown as Response);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      code: 'INTERNAL_ERROR',
    });
  });
});
