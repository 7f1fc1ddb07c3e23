import { describe, it, expect } from '@jest/globals';
import {
  CommandError,
  CrontabScheduler,
  SchedulerError,
  SchtasksScheduler,
  createScheduler,
  formatLocal,
  nextDailyRun,
  parseCsvLine,
  parseDailySchedule,
} from '../../src/index.js';
import { fakeRunner } from '../test-utils.js';

/** In-memory crontab answering `crontab -l` and `crontab -`. */
function fakeCrontab(initial?: string) {
  let content = initial;
  const fake = fakeRunner(({ file, args, input }) => {
    if (args[0] === '-l') {
      if (content === undefined) throw new CommandError(file, args, 1, '', 'no crontab for root\n');
      return { stdout: content, stderr: '' };
    }
    content = input ?? '';
    return { stdout: '', stderr: '' };
  });
  return { ...fake, content: () => content };
}

describe('daily schedules', () => {
  it('parses minute and hour', () => {
    expect(parseDailySchedule('30 3 * * *')).toEqual({ minute: 30, hour: 3 });
    expect(parseDailySchedule(' 0 0 * * * ')).toEqual({ minute: 0, hour: 0 });
  });

  it.each(['*/5 * * * *', '0 3 * * 1', '0 24 * * *', '60 1 * * *', '0 3 * *', '@daily'])(
    'rejects %s',
    (expression) => {
      expect(parseDailySchedule(expression)).toBeUndefined();
    },
  );

  it('fires later the same day or on the next day', () => {
    const schedule = { minute: 30, hour: 3 };
    expect(formatLocal(nextDailyRun(schedule, new Date(2030, 0, 15, 1, 0)))).toBe('2030-01-15 03:30');
    expect(formatLocal(nextDailyRun(schedule, new Date(2030, 0, 15, 3, 30)))).toBe('2030-01-16 03:30');
    expect(formatLocal(nextDailyRun(schedule, new Date(2030, 0, 31, 12, 0)))).toBe('2030-02-01 03:30');
  });
});

describe('CrontabScheduler', () => {
  const now = () => new Date(2030, 0, 15, 12, 0);

  it('treats a missing crontab as empty', async () => {
    const crontab = fakeCrontab();
    const scheduler = new CrontabScheduler({ runner: crontab.runner, now });

    await expect(scheduler.list()).resolves.toEqual([]);
    await scheduler.install(
      'certsmith-renew',
      { program: '/usr/bin/node', args: ['/opt/certsmith/dist/src/cli.js', 'renew', '--cert-dir', '/srv/certs'] },
      '0 3 * * *',
    );
    expect(crontab.content()).toBe(
      '0 3 * * * /usr/bin/node /opt/certsmith/dist/src/cli.js renew --cert-dir /srv/certs # certsmith:certsmith-renew\n',
    );
  });

  it('keeps unrelated entries and replaces its own on reinstall', async () => {
    const crontab = fakeCrontab(
      'MAILTO=ops@example.com\n15 1 * * * /usr/bin/backup\n0 3 * * * /old/certsmith renew # certsmith:certsmith-renew\n',
    );
    const scheduler = new CrontabScheduler({ runner: crontab.runner, now });

    await scheduler.install('certsmith-renew', { program: '/opt/cert smith/bin', args: ['renew'] }, '45 4 * * *');
    expect(crontab.content()).toBe(
      [
        'MAILTO=ops@example.com',
        '15 1 * * * /usr/bin/backup',
        "45 4 * * * '/opt/cert smith/bin' renew # certsmith:certsmith-renew",
        '',
      ].join('\n'),
    );
    expect(crontab.calls[1]).toMatchObject({ file: 'crontab', args: ['-'] });
  });

  it('lists tagged entries with their next run', async () => {
    const crontab = fakeCrontab(
      [
        '15 1 * * * /usr/bin/backup',
        '0 3 * * * certsmith renew # certsmith:nightly',
        '*/30 * * * * certsmith renew # certsmith:frequent',
        '# 0 5 * * * certsmith renew # certsmith:disabled',
      ].join('\n'),
    );
    const scheduler = new CrontabScheduler({ runner: crontab.runner, now });

    await expect(scheduler.list()).resolves.toEqual([
      { name: 'nightly', status: 'active', nextRun: '2030-01-16 03:00', lastRun: 'N/A' },
      { name: 'frequent', status: 'active', nextRun: '*/30 * * * *', lastRun: 'N/A' },
    ]);
  });

  it('removes only the named task', async () => {
    const crontab = fakeCrontab('15 1 * * * /usr/bin/backup\n0 3 * * * certsmith renew # certsmith:nightly\n');
    const scheduler = new CrontabScheduler({ runner: crontab.runner, now });

    await scheduler.remove('nightly');
    expect(crontab.content()).toBe('15 1 * * * /usr/bin/backup\n');
  });

  it('fails to remove a task that does not exist', async () => {
    const scheduler = new CrontabScheduler({ runner: fakeCrontab('').runner, now });

    const error = await scheduler.remove('nightly').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SchedulerError);
    expect(error).toMatchObject({ message: 'Could not remove scheduled task nightly: no such task' });
  });

  it('wraps other crontab failures', async () => {
    const { runner } = fakeRunner(({ file, args }) => {
      throw new CommandError(file, args, 1, '', 'crontab: permission denied');
    });
    const scheduler = new CrontabScheduler({ runner });

    await expect(scheduler.list()).rejects.toThrow(SchedulerError);
  });
});

describe('parseCsvLine', () => {
  it('splits quoted fields', () => {
    expect(parseCsvLine('"a","b, c","say ""hi"""')).toEqual(['a', 'b, c', 'say "hi"']);
    expect(parseCsvLine('x,,y')).toEqual(['x', '', 'y']);
  });
});

describe('SchtasksScheduler', () => {
  it('creates a daily task running renew', async () => {
    const { runner, calls } = fakeRunner();
    const scheduler = new SchtasksScheduler({ runner });

    await scheduler.install(
      'certsmith-renew',
      { program: 'C:\\Tools\\certsmith.exe', args: ['renew', '--cert-dir', 'C:\\Cert Store\\certs'] },
      '5 3 * * *',
    );
    expect(calls).toEqual([
      {
        file: 'schtasks.exe',
        args: [
          '/Create',
          '/TN',
          'certsmith-renew',
          '/TR',
          '"C:\\Tools\\certsmith.exe" renew --cert-dir "C:\\Cert Store\\certs"',
          '/SC',
          'DAILY',
          '/ST',
          '03:05',
          '/RL',
          'HIGHEST',
          '/F',
        ],
      },
    ]);
  });

  it('refuses schedules that are not daily', async () => {
    const { runner, calls } = fakeRunner();
    const scheduler = new SchtasksScheduler({ runner });

    await expect(
      scheduler.install('certsmith-renew', { program: 'certsmith.exe', args: ['renew'] }, '0 */6 * * *'),
    ).rejects.toThrow(
      'Only daily schedules ("M H * * *") are supported, got "0 */6 * * *"',
    );
    expect(calls).toHaveLength(0);
  });

  it('deletes by name', async () => {
    const { runner, calls } = fakeRunner();
    await new SchtasksScheduler({ runner }).remove('certsmith-renew');
    expect(calls[0].args).toEqual(['/Delete', '/TN', 'certsmith-renew', '/F']);
  });

  it('lists matching tasks from the verbose CSV output', async () => {
    const header = '"HostName","TaskName","Next Run Time","Status","Last Run Time"';
    const stdout = [
      header,
      '"WEB01","\\certsmith-renew","1/16/2030 3:05:00 AM","Ready","1/15/2030 3:05:00 AM"',
      '"WEB01","\\OneDrive Update","1/16/2030 9:00:00 AM","Ready","N/A"',
      '',
      header,
      '"WEB01","\\certsmith-renew","1/16/2030 3:05:00 AM","Ready","1/15/2030 3:05:00 AM"',
    ].join('\r\n');
    const { runner } = fakeRunner(() => ({ stdout, stderr: '' }));

    await expect(new SchtasksScheduler({ runner }).list()).resolves.toEqual([
      {
        name: 'certsmith-renew',
        status: 'Ready',
        nextRun: '1/16/2030 3:05:00 AM',
        lastRun: '1/15/2030 3:05:00 AM',
      },
    ]);
  });
});

describe('createScheduler', () => {
  it('picks the platform scheduler', () => {
    expect(createScheduler('win32')).toBeInstanceOf(SchtasksScheduler);
    expect(createScheduler('linux')).toBeInstanceOf(CrontabScheduler);
    expect(createScheduler('darwin')).toBeInstanceOf(CrontabScheduler);
  });
});
