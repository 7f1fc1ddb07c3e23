import type { CommandRunner } from '../utils/command-runner.js';
import { CrontabScheduler } from './crontab.js';
import { SchtasksScheduler } from './schtasks.js';
import type { Scheduler } from './types.js';

export * from './types.js';
export { CrontabScheduler } from './crontab.js';
export { SchtasksScheduler, parseCsvLine, taskRunLine } from './schtasks.js';

/** Scheduler for the running platform: schtasks on Windows, crontab elsewhere. */
export function createScheduler(platform: NodeJS.Platform = process.platform, runner?: CommandRunner): Scheduler {
  return platform === 'win32' ? new SchtasksScheduler({ runner }) : new CrontabScheduler({ runner });
}
