import { PageFetchError } from '../../src/core/errors';
import { RunTracker } from '../../src/core/tracker';
import { runDeviceCategory } from '../../src/runbooks/device-category';
import { executeRunbook } from '../../src/runbooks/runner';
import { buildReminder, runSyncReminder } from '../../src/runbooks/sync-reminder';
import type { RunOptions, TokenProvider } from '../../src/types';
import { createFakeFetch, createRecordingSleep, emptyResponse, jsonResponse } from '../helpers/fakes';

const V1 = 'https://graph.microsoft.com/v1.0';
const BETA = 'https://graph.microsoft.com/beta';
const NOW = new Date('2024-06-15T00:00:00.000Z');

const tokenProvider: TokenProvider = { acquireToken: async () => 'test-token' };

const runOptions = (overrides: Partial<RunOptions> = {}): RunOptions => ({
  maxRetries: 2,
  initialBackoffSeconds: 1,
  requestTimeoutSeconds: 100,
  batchSize: 2,
  delayBetweenBatchesSeconds: 10,
  dryRun: false,
  ...overrides,
});

describe('sync-reminder', () => {
  const devicesPage1 = {
    value: [
      {
        id: 'd1',
        deviceName: 'LAPTOP-1',
        operatingSystem: 'Windows',
        lastSyncDateTime: '2024-06-01T00:00:00Z',
        emailAddress: 'a@contoso.test',
      },
      { id: 'd2', deviceName: 'PHONE-2', operatingSystem: 'iOS', lastSyncDateTime: '2024-06-14T00:00:00Z' },
      { id: 'd3', deviceName: 'LAPTOP-3', operatingSystem: 'Windows', lastSyncDateTime: '2024-05-01T00:00:00Z' },
    ],
    '@odata.nextLink': `${V1}/deviceManagement/managedDevices?$skiptoken=abc`,
  };
  const devicesPage2 = {
    value: [
      { id: 'd4', deviceName: 'TABLET-4', operatingSystem: 'Android' },
      {
        id: 'd5',
        deviceName: 'MAC-5',
        operatingSystem: 'macOS',
        lastSyncDateTime: '2024-05-15T00:00:00Z',
        userPrincipalName: 'b@contoso.test',
      },
    ],
  };

  const createGraph = () => {
    let mailCalls = 0;
    return createFakeFetch((url) => {
      if (url.includes('$skiptoken=abc')) return jsonResponse(200, devicesPage2);
      if (url.startsWith(`${V1}/deviceManagement/managedDevices?`)) return jsonResponse(200, devicesPage1);
      if (url === `${V1}/users/noreply%40contoso.test/sendMail`) {
        mailCalls += 1;
        return mailCalls === 1 ? emptyResponse(429, { 'Retry-After': '3' }) : emptyResponse(202);
      }
      return jsonResponse(404, { error: { code: 'NotFound' } });
    });
  };

  it('mails the users of stale devices and skips the rest', async () => {
    const { fetch, calls } = createGraph();
    const { sleep, waits } = createRecordingSleep();
    const tracker = new RunTracker(':memory:');

    const { stats, record } = await executeRunbook(
      'sync-reminder',
      runOptions(),
      (ctx) => runSyncReminder(ctx, { days: 7, sender: 'noreply@contoso.test' }),
      { tokenProvider, tracker, fetch, sleep, now: () => NOW }
    );

    expect(calls[0].url).toBe(
      `${V1}/deviceManagement/managedDevices?$select=id,deviceName,operatingSystem,lastSyncDateTime,userPrincipalName,emailAddress&$top=1000`
    );
    const mails = calls.filter((call) => call.url.endsWith('/sendMail'));
    expect(mails).toHaveLength(3);
    expect(mails[0].body).toEqual({
      message: {
        subject: 'Action required: sync your device LAPTOP-1',
        body: {
          contentType: 'Text',
          content: buildReminder(
            { id: 'd1', deviceName: 'LAPTOP-1', operatingSystem: 'Windows' },
            'a@contoso.test',
            14
          ).body,
        },
        toRecipients: [{ emailAddress: { address: 'a@contoso.test' } }],
      },
      saveToSentItems: false,
    });
    expect(mails[2].body).toMatchObject({
      message: { toRecipients: [{ emailAddress: { address: 'b@contoso.test' } }] },
    });

    expect(waits).toEqual([3000, 10000, 10000]);
    expect(record).toMatchObject({
      runbook: 'sync-reminder',
      dryRun: false,
      processed: 5,
      succeeded: 2,
      skipped: 3,
      errors: 0,
      batches: 3,
      'operatingSystem.Windows': 2,
      'operatingSystem.iOS': 1,
      'operatingSystem.Android': 1,
      'operatingSystem.macOS': 1,
      'skipped.recently-synced': 1,
      'skipped.no-user-email': 1,
      'skipped.invalid-sync-date': 1,
    });
    expect(tracker.getRun(stats.runId)).toMatchObject({ status: 'completed', summary: { processed: 5 } });
    tracker.close();
  });

  it('sends nothing in dry-run mode', async () => {
    const { fetch, calls } = createGraph();
    const { sleep } = createRecordingSleep();

    const { record } = await executeRunbook(
      'sync-reminder',
      runOptions({ dryRun: true }),
      (ctx) => runSyncReminder(ctx, { days: 7, sender: 'noreply@contoso.test' }),
      { tokenProvider, fetch, sleep, now: () => NOW }
    );

    expect(calls.filter((call) => call.method !== 'GET')).toEqual([]);
    expect(record).toMatchObject({ dryRun: true, processed: 5, succeeded: 2, skipped: 3 });
  });

  it('records a failed run when the device list cannot be read', async () => {
    const { fetch } = createFakeFetch(() => jsonResponse(403, { error: { code: 'Forbidden' } }));
    const tracker = new RunTracker(':memory:');

    const error = await executeRunbook(
      'sync-reminder',
      runOptions(),
      (ctx) => runSyncReminder(ctx, { days: 7, sender: 'noreply@contoso.test' }),
      { tokenProvider, tracker, fetch, now: () => NOW }
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PageFetchError);
    const [run] = tracker.getRecentRuns('sync-reminder');
    expect(run).toMatchObject({
      status: 'failed',
      error: `Failed to fetch page 1: GET ${V1}/deviceManagement/managedDevices failed with 403: Forbidden`,
      summary: { processed: 0 },
    });
    tracker.close();
  });

  it('skips devices that carry the never-synced placeholder date', async () => {
    const { fetch, calls } = createFakeFetch(() =>
      jsonResponse(200, {
        value: [
          {
            id: 'd9',
            deviceName: 'KIOSK-9',
            operatingSystem: 'Windows',
            lastSyncDateTime: '0001-01-01T00:00:00Z',
            emailAddress: 'c@contoso.test',
          },
        ],
      })
    );

    const { record } = await executeRunbook(
      'sync-reminder',
      runOptions(),
      (ctx) => runSyncReminder(ctx, { days: 7, sender: 'noreply@contoso.test' }),
      { tokenProvider, fetch, sleep: async () => undefined, now: () => NOW }
    );

    expect(calls).toHaveLength(1);
    expect(record).toMatchObject({ processed: 1, succeeded: 0, skipped: 1, 'skipped.invalid-sync-date': 1 });
  });

  it('fails before any request when no token can be acquired', async () => {
    const { fetch, calls } = createFakeFetch(() => jsonResponse(200, { value: [] }));

    await expect(
      executeRunbook(
        'sync-reminder',
        runOptions(),
        (ctx) => runSyncReminder(ctx, { days: 7, sender: 'noreply@contoso.test' }),
        { tokenProvider: { acquireToken: async () => ' ' }, fetch }
      )
    ).rejects.toThrow('Identity returned an empty access token');
    expect(calls).toEqual([]);
  });
});

describe('device-category', () => {
  const users: Record<string, unknown[]> = {
    'dev-1': [{ id: 'u1', department: 'finance' }],
    'dev-2': [],
    'dev-3': [{ id: 'u3' }],
    'dev-4': [{ id: 'u4', department: 'Legal' }],
    'dev-5': [{ id: 'u5', department: 'Engineering' }],
  };

  const createGraph = () =>
    createFakeFetch((url, init) => {
      if (url === `${V1}/deviceManagement/deviceCategories`) {
        return jsonResponse(200, {
          value: [
            { id: 'cat-fin', displayName: 'Finance' },
            { id: 'cat-eng', displayName: 'Engineering' },
          ],
        });
      }
      if (url.startsWith(`${V1}/deviceManagement/managedDevices?`)) {
        return jsonResponse(200, {
          value: [
            { id: 'dev-1', operatingSystem: 'Windows' },
            { id: 'dev-2', operatingSystem: 'Windows' },
            { id: 'dev-3', operatingSystem: 'iOS' },
            { id: 'dev-4', operatingSystem: 'Windows' },
            { id: 'dev-5', operatingSystem: 'macOS', deviceCategoryDisplayName: 'Engineering' },
            { id: 'dev-6', operatingSystem: 'Windows' },
          ],
        });
      }
      const match = /\/managedDevices\/([^/]+)\/users\?/.exec(url);
      if (match) {
        const value = users[match[1]];
        return value ? jsonResponse(200, { value }) : jsonResponse(500, {});
      }
      if (init.method === 'PUT') return emptyResponse(204);
      return jsonResponse(404, {});
    });

  it("assigns the category matching the primary user's department", async () => {
    const { fetch, calls } = createGraph();
    const { sleep, waits } = createRecordingSleep();

    const { stats, record } = await executeRunbook('device-category', runOptions({ batchSize: 10 }), runDeviceCategory, {
      tokenProvider,
      fetch,
      sleep,
      now: () => NOW,
    });

    expect(calls.filter((call) => call.method === 'PUT')).toEqual([
      {
        url: `${BETA}/deviceManagement/managedDevices/dev-1/deviceCategory/$ref`,
        method: 'PUT',
        headers: {
          Accept: 'application/json',
          Authorization: 'Bearer test-token',
          'Content-Type': 'application/json',
        },
        body: { '@odata.id': `${BETA}/deviceManagement/deviceCategories/cat-fin` },
      },
    ]);
    expect(waits).toEqual([1000, 2000]);
    expect(record).toMatchObject({
      processed: 6,
      succeeded: 1,
      skipped: 4,
      errors: 1,
      batches: 1,
      'department.finance': 1,
      'department.Legal': 1,
      'department.Engineering': 1,
      'skipped.no-primary-user': 1,
      'skipped.no-department': 1,
      'skipped.no-matching-category': 1,
      'skipped.already-categorized': 1,
    });
    expect(stats.errors).toEqual([
      {
        index: 5,
        message: `Failed to fetch page 1: GET ${BETA}/deviceManagement/managedDevices/dev-6/users failed with 500`,
      },
    ]);
  });

  it('changes nothing in dry-run mode', async () => {
    const { fetch, calls } = createGraph();

    const { record } = await executeRunbook(
      'device-category',
      runOptions({ batchSize: 10, dryRun: true, maxRetries: 0 }),
      runDeviceCategory,
      { tokenProvider, fetch, sleep: async () => undefined, now: () => NOW }
    );

    expect(calls.some((call) => call.method === 'PUT')).toBe(false);
    expect(record).toMatchObject({ succeeded: 1, skipped: 4, errors: 1 });
  });
});
