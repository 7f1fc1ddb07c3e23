/**
 * Windows Task Scheduler through schtasks.exe
 */

import { SchedulerError } from '../errors/lifecycle-errors.js';
import { createLogger } from '../logger.js';
import { execRunner, type CommandRunner } from '../utils/command-runner.js';
import { parseDailySchedule, type ScheduledTask, type Scheduler, type TaskCommand } from './types.js';

const log = createLogger('scheduler');

export interface SchtasksSchedulerOptions {
  runner?: CommandRunner;
  binary?: string;
  /** Only tasks whose name contains this text are listed */
  filter?: string;
}

/** Parse one CSV line as written by `schtasks /FO CSV`. */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

/** `/TR` value: the program always quoted, arguments only when they hold spaces. */
export function taskRunLine(command: TaskCommand): string {
  const args = command.args.map((arg) => (/[\s"]/.test(arg) ? `"${arg.replace(/"/g, '\\"')}"` : arg));
  return [`"${command.program}"`, ...args].join(' ');
}

export class SchtasksScheduler implements Scheduler {
  private readonly runner: CommandRunner;
  private readonly binary: string;
  private readonly filter: string;

  constructor(options: SchtasksSchedulerOptions = {}) {
    this.runner = options.runner ?? execRunner;
    this.binary = options.binary ?? 'schtasks.exe';
    this.filter = options.filter ?? 'certsmith';
  }

  async install(taskName: string, command: TaskCommand, cronExpression: string): Promise<void> {
    const daily = parseDailySchedule(cronExpression);
    if (!daily) {
      throw SchedulerError.unsupportedSchedule(cronExpression);
    }
    const startTime = `${String(daily.hour).padStart(2, '0')}:${String(daily.minute).padStart(2, '0')}`;
    try {
      await this.runner(this.binary, [
        '/Create',
        '/TN',
        taskName,
        '/TR',
        taskRunLine(command),
        '/SC',
        'DAILY',
        '/ST',
        startTime,
        '/RL',
        'HIGHEST',
        '/F',
      ]);
    } catch (e) {
      throw SchedulerError.wrap('install', taskName, e);
    }
    log.info('Installed scheduled task %s (daily at %s)', taskName, startTime);
  }

  async remove(taskName: string): Promise<void> {
    try {
      await this.runner(this.binary, ['/Delete', '/TN', taskName, '/F']);
    } catch (e) {
      throw SchedulerError.wrap('remove', taskName, e);
    }
    log.info('Removed scheduled task %s', taskName);
  }

  async list(): Promise<ScheduledTask[]> {
    let stdout: string;
    try {
      ({ stdout } = await this.runner(this.binary, ['/Query', '/FO', 'CSV', '/V']));
    } catch (e) {
      throw SchedulerError.wrap('list', '*', e);
    }

    const rows = stdout
      .split(/\r?\n/)
      .filter((line) => line.trim().length > 0)
      .map(parseCsvLine);
    if (rows.length === 0) return [];

    const header = rows[0];
    const column = (name: string) => header.indexOf(name);
    const nameCol = column('TaskName');
    const nextCol = column('Next Run Time');
    const statusCol = column('Status');
    const lastCol = column('Last Run Time');
    if (nameCol === -1) return [];

    const seen = new Set<string>();
    const tasks: ScheduledTask[] = [];
    for (const row of rows.slice(1)) {
      // the header is repeated once per task folder
      if (row[nameCol] === 'TaskName') continue;
      const name = row[nameCol].replace(/^\\/, '');
      if (!name.includes(this.filter) || seen.has(name)) continue;
      seen.add(name);
      tasks.push({
        name,
        status: row[statusCol] ?? 'unknown',
        nextRun: row[nextCol] ?? 'N/A',
        lastRun: row[lastCol] ?? 'N/A',
      });
    }
    return tasks;
  }
}
