/**
 * Device Category
 * Assigns each device the Intune category named after its primary user's department
 */

import { skipped, succeeded } from '../core/batch';
import type { RunStatistics } from '../core/stats';
import type { DeviceCategory } from '../types';
import { logger } from '../utils/logger';
import type { RunbookContext } from './types';

export const DEVICE_CATEGORY = 'device-category';

const DEVICE_FIELDS = ['id', 'deviceName', 'operatingSystem', 'deviceCategoryDisplayName'] as const;

export async function runDeviceCategory(ctx: RunbookContext): Promise<RunStatistics> {
  const { graph, batches, stats, options } = ctx;

  const categories = await graph.listDeviceCategories();
  const byName = new Map<string, DeviceCategory>(
    categories.map((category) => [category.displayName.toLowerCase(), category])
  );
  const devices = await graph.listManagedDevices(DEVICE_FIELDS);
  logger.info(`Matching ${devices.length} devices against ${categories.length} categories`);

  return batches.processInBatches(
    devices,
    async (device, runStats) => {
      const user = await graph.getPrimaryUser(device.id);
      if (!user) return skipped('no-primary-user');

      const department = user.department?.trim();
      if (!department) return skipped('no-department');
      runStats.incrementCategory('department', department);

      const category = byName.get(department.toLowerCase());
      if (!category) return skipped('no-matching-category');

      if (device.deviceCategoryDisplayName?.toLowerCase() === category.displayName.toLowerCase()) {
        return skipped('already-categorized');
      }

      if (options.dryRun) {
        logger.info('[DRY RUN] Would set device category', { deviceId: device.id, category: category.displayName });
        return succeeded();
      }

      await graph.setDeviceCategory(device.id, category.id);
      logger.debug(`Set category ${category.displayName} on ${device.id}`);
      return succeeded();
    },
    stats
  );
}
