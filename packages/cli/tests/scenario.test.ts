import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { RegisterBank, TraceLogger } from '@wmreg/core';
import { ConfigurationError, feature } from '@wmreg/shared';
import { loadScenario, parseScenario, runScenario } from '../src/scenario.js';

function makeBank(): RegisterBank {
  return new RegisterBank({
    flags: [{ name: 'goals', flags: ['ready'] }],
    slots: [{ name: 'wm', slots: 2 }],
  });
}

const scenario = parseScenario({
  ticks: [
    {
      flags: { goals: { 'set-ready': 1 } },
      slots: { wm: { commands: { 'write-1': 1 }, selected: { A: 1 } } },
    },
    {
      slots: { wm: { commands: { 'read-1': 1 }, match: { A: 0.5, B: 1 } } },
    },
  ],
});

describe('parseScenario', () => {
  it('fills in missing sections', () => {
    const parsed = parseScenario({ ticks: [{}] });
    expect(parsed.ticks).toEqual([{ flags: {}, slots: {} }]);
  });

  it('rejects a scenario without ticks', () => {
    expect(() => parseScenario({ ticks: [] })).toThrow(ConfigurationError);
    expect(() => parseScenario({})).toThrow(/Invalid scenario: ticks/);
  });

  it('rejects non-numeric weights', () => {
    expect(() => parseScenario({ ticks: [{ slots: { wm: { selected: { A: 'high' } } } }] }))
      .toThrow(/Invalid scenario: ticks\.0\.slots\.wm\.selected\.A/);
  });
});

describe('loadScenario', () => {
  it('reads YAML files', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'wmreg-scenario-'));
    try {
      const path = join(dir, 'scenario.yaml');
      await writeFile(path, [
        'ticks:',
        '  - flags:',
        '      goals:',
        '        set-ready: null',
      ].join('\n'));
      const loaded = await loadScenario(path);
      expect(loaded.ticks[0].flags).toEqual({ goals: { 'set-ready': null } });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('runScenario', () => {
  it('reports every store on every tick', () => {
    const reports = runScenario(makeBank(), scenario);
    expect(reports).toHaveLength(2);

    expect(reports[0].tick).toBe(1);
    expect(reports[0].flags.goals.entries()).toEqual([[feature('ready'), 1]]);
    expect(reports[0].slots.wm.chunks.size).toBe(0);
    expect(reports[0].slots.wm.status.entries()).toEqual([
      [feature('full-1'), 1],
      [feature('full-2'), -1],
    ]);

    expect(reports[1].flags.goals.entries()).toEqual([[feature('ready'), 1]]);
    expect(reports[1].slots.wm.chunks.entries()).toEqual([['A', 1]]);
    expect(reports[1].slots.wm.status.entries()).toEqual([
      [feature('full-1'), 1],
      [feature('full-2'), -1],
      [feature('match-1'), -0.5],
    ]);
  });

  it('rejects ticks that name unknown stores', () => {
    const bad = parseScenario({ ticks: [{ flags: { nope: {} } }] });
    expect(() => runScenario(makeBank(), bad)).toThrow("Configuration error: unknown flag store 'nope'");
  });

  it('records one span per tick with the store events inside', () => {
    const bank = makeBank();
    const logger = new TraceLogger();
    logger.createTrace('t1', 'scenario');
    bank.setTracer(logger.bind('t1'));

    runScenario(bank, scenario, { logger, traceId: 't1' });
    const trace = logger.getTrace('t1');

    expect(trace.spans.map((s) => s.name)).toEqual(['tick-1', 'tick-2']);
    expect(trace.spans[0].events.map((e) => e.type)).toEqual(['flag_update', 'slot_write']);
    expect(trace.spans[1].events.map((e) => e.type)).toEqual(['slot_read']);
    expect(trace.spans.every((s) => s.endTime !== undefined)).toBe(true);
  });
});
