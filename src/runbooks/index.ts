export { runSyncReminder, buildReminder, SYNC_REMINDER } from './sync-reminder';
export type { SyncReminderParams } from './sync-reminder';
export { runDeviceCategory, DEVICE_CATEGORY } from './device-category';
export { executeRunbook } from './runner';
export type { RunbookBody, RunDependencies, RunResult } from './runner';
export type { RunbookContext } from './types';
