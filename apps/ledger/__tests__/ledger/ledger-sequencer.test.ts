import { describe, expect, it, vi } from 'vitest';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import {
  LEDGER_SLOW_CALL_MS,
  LedgerSequencer,
  resolveSlowCallThreshold,
} from '../../src/ledger/application/ledger-sequencer';

const pause = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('LedgerSequencer', () => {
  it('runs each task only after the previous one settles', async () => {
    const sequencer = new LedgerSequencer();
    const events: string[] = [];

    const slow = sequencer.run('slow', async () => {
      events.push('slow:start');
      await pause(20);
      events.push('slow:end');
      return 1;
    });
    const fast = sequencer.run('fast', async () => {
      events.push('fast:start');
      return 2;
    });

    await expect(Promise.all([slow, fast])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['slow:start', 'slow:end', 'fast:start']);
  });

  it('keeps going after a failed task', async () => {
    const sequencer = new LedgerSequencer();

    const failing = sequencer.run('failing', async () => {
      throw new Error('boom');
    });
    const next = sequencer.run('next', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('warns about calls that exceed the threshold', async () => {
    const warn = vi.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    const sequencer = new LedgerSequencer(1);

    await sequencer.run('revokeMember', () => pause(20));

    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toMatch(/^revokeMember exceeded budget \(\d+\.\dms > 1ms\)$/);
    warn.mockRestore();
  });

  it('takes its threshold from LEDGER_SLOW_CALL_MS through the container', async () => {
    const warn = vi.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    const moduleRef = await Test.createTestingModule({
      providers: [
        LedgerSequencer,
        { provide: ConfigService, useValue: new ConfigService({ LEDGER_SLOW_CALL_MS: '1' }) },
        { provide: LEDGER_SLOW_CALL_MS, useFactory: resolveSlowCallThreshold, inject: [ConfigService] },
      ],
    }).compile();

    await moduleRef.get(LedgerSequencer).run('addMember', () => pause(20));

    expect(String(warn.mock.calls[0]?.[0])).toMatch(/ > 1ms\)$/);
    warn.mockRestore();
  });
});

describe('resolveSlowCallThreshold', () => {
  const resolve = (value?: string) =>
    resolveSlowCallThreshold(new ConfigService(value === undefined ? {} : { LEDGER_SLOW_CALL_MS: value }));

  it('parses the configured milliseconds', () => {
    expect(resolve('40')).toBe(40);
    expect(resolve('0')).toBe(0);
  });

  it('falls back to 250 when unset or invalid', () => {
    expect(resolve()).toBe(250);
    expect(resolve('-5')).toBe(250);
    expect(resolve('soon')).toBe(250);
  });
});
