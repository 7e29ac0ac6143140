/**
 * Sync Reminder
 * Mails the users of devices that have not checked in with Intune recently
 */

import { skipped, succeeded } from '../core/batch';
import type { MailMessage } from '../core/graph';
import type { RunStatistics } from '../core/stats';
import type { ManagedDevice } from '../types';
import { logger } from '../utils/logger';
import type { RunbookContext } from './types';

export const SYNC_REMINDER = 'sync-reminder';

const DEVICE_FIELDS = [
  'id',
  'deviceName',
  'operatingSystem',
  'lastSyncDateTime',
  'userPrincipalName',
  'emailAddress',
] as const;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SyncReminderParams {
  /** Devices idle for longer than this many days get a reminder. */
  days: number;
  /** Mailbox the reminders are sent from. */
  sender: string;
}

export function buildReminder(device: ManagedDevice, recipient: string, daysSinceSync: number): MailMessage {
  const name = device.deviceName || device.id;
  return {
    subject: `Action required: sync your device ${name}`,
    body: [
      `Your device ${name} (${device.operatingSystem}) last synced with Intune ${daysSinceSync} days ago.`,
      '',
      'Open the Company Portal app on the device and select "Check status" or "Sync" so it keeps access to company resources.',
    ].join('\n'),
    to: [recipient],
  };
}

export async function runSyncReminder(ctx: RunbookContext, params: SyncReminderParams): Promise<RunStatistics> {
  const { graph, batches, stats, options } = ctx;
  const nowMs = ctx.now().getTime();
  const cutoffMs = nowMs - params.days * DAY_MS;

  const devices = await graph.listManagedDevices(DEVICE_FIELDS);
  logger.info(`Checking ${devices.length} devices for syncs older than ${params.days} days`);

  return batches.processInBatches(
    devices,
    async (device, runStats) => {
      runStats.incrementCategory('operatingSystem', device.operatingSystem);

      const lastSyncMs = device.lastSyncDateTime ? Date.parse(device.lastSyncDateTime) : Number.NaN;
      // Intune reports never-synced devices as 0001-01-01T00:00:00Z
      if (Number.isNaN(lastSyncMs) || lastSyncMs < 0) return skipped('invalid-sync-date');
      if (lastSyncMs >= cutoffMs) return skipped('recently-synced');

      const recipient = device.emailAddress ?? device.userPrincipalName;
      if (!recipient) return skipped('no-user-email');

      const daysSinceSync = Math.floor((nowMs - lastSyncMs) / DAY_MS);
      const message = buildReminder(device, recipient, daysSinceSync);

      if (options.dryRun) {
        logger.info('[DRY RUN] Would send sync reminder', { deviceId: device.id, daysSinceSync });
        return succeeded();
      }

      await graph.sendMail(params.sender, message);
      logger.debug(`Sent sync reminder for ${device.id}`);
      return succeeded();
    },
    stats
  );
}
