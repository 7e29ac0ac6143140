import { buildCliErrorEnvelope, isDebugMode } from '../../src/cli/errors';
import { PageFetchError, RequestError } from '../../src/core/errors';

describe('buildCliErrorEnvelope', () => {
  it('includes the status code of a request error', () => {
    const error = new RequestError({
      message: 'GET https://graph.microsoft.com/v1.0/users failed with 403',
      method: 'GET',
      uri: 'https://graph.microsoft.com/v1.0/users',
      statusCode: 403,
      retryable: false,
    });

    expect(buildCliErrorEnvelope('sync-reminder', error, false)).toEqual({
      event: 'run.failed',
      runbook: 'sync-reminder',
      name: 'RequestError',
      message: 'GET https://graph.microsoft.com/v1.0/users failed with 403',
      statusCode: 403,
    });
  });

  it('includes the page of a page failure', () => {
    const error = new PageFetchError({ message: 'Failed to fetch page 2', page: 2, statusCode: 500 });

    expect(buildCliErrorEnvelope('device-category', error, false)).toEqual({
      event: 'run.failed',
      runbook: 'device-category',
      name: 'PageFetchError',
      message: 'Failed to fetch page 2',
      statusCode: 500,
      page: 2,
    });
  });

  it('wraps non-error values and adds the stack in debug mode', () => {
    expect(buildCliErrorEnvelope('sync-reminder', 'boom', false)).toEqual({
      event: 'run.failed',
      runbook: 'sync-reminder',
      name: 'Error',
      message: 'boom',
    });
    expect(buildCliErrorEnvelope('sync-reminder', new Error('boom'), true).stack).toContain('Error: boom');
  });
});

describe('isDebugMode', () => {
  it('reads DEBUG', () => {
    expect(isDebugMode({ DEBUG: 'true' })).toBe(true);
    expect(isDebugMode({ DEBUG: '1' })).toBe(true);
    expect(isDebugMode({})).toBe(false);
  });
});
