import { DEFAULT_SCHEDULE, DEFAULT_TASK_NAME, createScheduler, type Scheduler } from '../../index.js';
import { heading, render } from '../logger.js';
import { renewTaskCommand, type GlobalOptions } from '../utils/context.js';

export interface ScheduleCommandOptions extends GlobalOptions {
  name?: string;
  cron?: string;
  /** Executable the task runs instead of node and this CLI */
  executable?: string;
}

export async function handleScheduleInstall(
  options: ScheduleCommandOptions,
  scheduler: Scheduler = createScheduler(),
): Promise<void> {
  const name = options.name ?? DEFAULT_TASK_NAME;
  const cron = options.cron ?? DEFAULT_SCHEDULE;
  await scheduler.install(name, renewTaskCommand(options), cron);
  render.success(`Scheduled task "${name}" installed (${cron})`);
}

export async function handleScheduleRemove(
  options: ScheduleCommandOptions,
  scheduler: Scheduler = createScheduler(),
): Promise<void> {
  const name = options.name ?? DEFAULT_TASK_NAME;
  await scheduler.remove(name);
  render.success(`Scheduled task "${name}" removed`);
}

export async function handleScheduleList(scheduler: Scheduler = createScheduler()): Promise<void> {
  const tasks = await scheduler.list();
  if (tasks.length === 0) {
    render.info('No certsmith tasks scheduled');
    return;
  }
  heading('Scheduled tasks');
  render.line(['NAME'.padEnd(24), 'STATUS'.padEnd(10), 'NEXT RUN'.padEnd(22), 'LAST RUN'].join(''));
  for (const task of tasks) {
    render.line([task.name.padEnd(24), task.status.padEnd(10), task.nextRun.padEnd(22), task.lastRun].join(''));
  }
}
