export interface ScheduledTask {
  name: string;
  /** Platform specific status text (e.g. "Ready", "active") */
  status: string;
  nextRun: string;
  lastRun: string;
}

/** Command line a scheduled task runs, e.g. node, the CLI script and `renew`. */
export interface TaskCommand {
  program: string;
  args: readonly string[];
}

/** OS-level registration of the recurring `renew` run. */
export interface Scheduler {
  install(taskName: string, command: TaskCommand, cronExpression: string): Promise<void>;
  remove(taskName: string): Promise<void>;
  list(): Promise<ScheduledTask[]>;
}

export interface DailySchedule {
  minute: number;
  hour: number;
}

/** Parse `M H * * *`; anything else is not a daily schedule. */
export function parseDailySchedule(expression: string): DailySchedule | undefined {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5 || fields.slice(2).some((f) => f !== '*')) return undefined;
  if (!/^\d{1,2}$/.test(fields[0]) || !/^\d{1,2}$/.test(fields[1])) return undefined;
  const minute = Number(fields[0]);
  const hour = Number(fields[1]);
  if (minute > 59 || hour > 23) return undefined;
  return { minute, hour };
}

/** Next local time a daily schedule fires, strictly after `now`. */
export function nextDailyRun(schedule: DailySchedule, now: Date = new Date()): Date {
  const next = new Date(now);
  next.setHours(schedule.hour, schedule.minute, 0, 0);
  if (next.getTime() <= now.getTime()) {
    next.setDate(next.getDate() + 1);
  }
  return next;
}

/** `YYYY-MM-DD HH:MM` in local time. */
export function formatLocal(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}
