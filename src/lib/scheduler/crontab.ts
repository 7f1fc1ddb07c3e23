/**
 * crontab(1) scheduler for Linux and macOS
 *
 * Each task is one line of the user's crontab tagged with a trailing
 * `# certsmith:<name>` comment; lines without the tag are left untouched.
 */

import { SchedulerError } from '../errors/lifecycle-errors.js';
import { createLogger } from '../logger.js';
import { CommandError, execRunner, type CommandRunner } from '../utils/command-runner.js';
import {
  formatLocal,
  nextDailyRun,
  parseDailySchedule,
  type ScheduledTask,
  type Scheduler,
  type TaskCommand,
} from './types.js';

const log = createLogger('scheduler');

const TAG_PREFIX = '# certsmith:';

export interface CrontabSchedulerOptions {
  runner?: CommandRunner;
  binary?: string;
  now?: () => Date;
}

function tagOf(line: string): string | undefined {
  const index = line.lastIndexOf(TAG_PREFIX);
  return index === -1 ? undefined : line.slice(index + TAG_PREFIX.length).trim();
}

function shellQuote(value: string): string {
  return /^[\w@%+=:,./-]+$/.test(value) ? value : `'${value.replace(/'/g, `'\\''`)}'`;
}

export class CrontabScheduler implements Scheduler {
  private readonly runner: CommandRunner;
  private readonly binary: string;
  private readonly now: () => Date;

  constructor(options: CrontabSchedulerOptions = {}) {
    this.runner = options.runner ?? execRunner;
    this.binary = options.binary ?? 'crontab';
    this.now = options.now ?? (() => new Date());
  }

  async install(taskName: string, command: TaskCommand, cronExpression: string): Promise<void> {
    try {
      const lines = (await this.read()).filter((line) => tagOf(line) !== taskName);
      const commandLine = [command.program, ...command.args].map(shellQuote).join(' ');
      lines.push(`${cronExpression} ${commandLine} ${TAG_PREFIX}${taskName}`);
      await this.write(lines);
    } catch (e) {
      throw SchedulerError.wrap('install', taskName, e);
    }
    log.info('Installed crontab entry %s (%s)', taskName, cronExpression);
  }

  async remove(taskName: string): Promise<void> {
    try {
      const lines = await this.read();
      const kept = lines.filter((line) => tagOf(line) !== taskName);
      if (kept.length === lines.length) {
        throw new Error('no such task');
      }
      await this.write(kept);
    } catch (e) {
      throw SchedulerError.wrap('remove', taskName, e);
    }
    log.info('Removed crontab entry %s', taskName);
  }

  async list(): Promise<ScheduledTask[]> {
    let lines: string[];
    try {
      lines = await this.read();
    } catch (e) {
      throw SchedulerError.wrap('list', '*', e);
    }

    const tasks: ScheduledTask[] = [];
    for (const line of lines) {
      const name = tagOf(line);
      if (name === undefined || line.trimStart().startsWith('#')) continue;
      const expression = line.trim().split(/\s+/).slice(0, 5).join(' ');
      const daily = parseDailySchedule(expression);
      tasks.push({
        name,
        status: 'active',
        nextRun: daily ? formatLocal(nextDailyRun(daily, this.now())) : expression,
        // cron keeps no run history
        lastRun: 'N/A',
      });
    }
    return tasks;
  }

  private async read(): Promise<string[]> {
    try {
      const { stdout } = await this.runner(this.binary, ['-l']);
      return stdout.split('\n').filter((line) => line.length > 0);
    } catch (e) {
      // an empty crontab is reported as an error
      if (e instanceof CommandError && /no crontab/i.test(e.stderr)) return [];
      throw e;
    }
  }

  private async write(lines: string[]): Promise<void> {
    await this.runner(this.binary, ['-'], lines.length > 0 ? `${lines.join('\n')}\n` : '');
  }
}
