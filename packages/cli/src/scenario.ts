import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  type Chunk,
  type Feature,
  ConfigurationError,
  chunkKind,
  feature,
  featureKind,
} from '@wmreg/shared';
import { WeightedMap, type RegisterBank, type TraceLogger } from '@wmreg/core';

const commandsSchema = z.record(z.string(), z.union([z.number(), z.string(), z.null()]));
const weightsSchema = z.record(z.string(), z.number().finite());

const slotTickSchema = z.object({
  commands: commandsSchema.default({}),
  selected: weightsSchema.default({}),
  match: weightsSchema.default({}),
});

const tickSchema = z.object({
  flags: z.record(z.string(), commandsSchema).default({}),
  slots: z.record(z.string(), slotTickSchema).default({}),
});

export const scenarioSchema = z.object({
  ticks: z.array(tickSchema).min(1),
});

export type Scenario = z.infer<typeof scenarioSchema>;
export type ScenarioTick = z.infer<typeof tickSchema>;

export interface SlotReport {
  chunks: WeightedMap<Chunk>;
  status: WeightedMap<Feature>;
}

export interface TickReport {
  tick: number;
  flags: Record<string, WeightedMap<Feature>>;
  slots: Record<string, SlotReport>;
}

export interface ScenarioTrace {
  logger: TraceLogger;
  traceId: string;
}

export function parseScenario(raw: unknown): Scenario {
  const result = scenarioSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid scenario: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }
  return result.data;
}

export async function loadScenario(path: string): Promise<Scenario> {
  const content = await readFile(path, 'utf-8');
  return parseScenario(path.endsWith('.json') ? JSON.parse(content) : parseYaml(content));
}

/**
 * Steps every store of the bank once per scenario tick, in declaration
 * order. Stores a tick does not mention still step, with empty inputs.
 */
export function runScenario(bank: RegisterBank, scenario: Scenario, trace?: ScenarioTrace): TickReport[] {
  const reports: TickReport[] = [];

  scenario.ticks.forEach((tick, index) => {
    checkStoreNames(bank, tick);
    const spanId = trace ? trace.logger.startSpan(trace.traceId, `tick-${index + 1}`) : undefined;

    const report: TickReport = { tick: index + 1, flags: {}, slots: {} };
    for (const name of bank.flagStoreNames) {
      report.flags[name] = bank.flags(name).step(toCommands(tick.flags[name] ?? {}));
    }
    for (const name of bank.slotStoreNames) {
      const input = tick.slots[name];
      const [chunks, status] = bank.slots(name).step(
        toCommands(input?.commands ?? {}),
        toChunks(input?.selected ?? {}),
        toChunks(input?.match ?? {}),
      );
      report.slots[name] = { chunks, status };
    }

    if (trace && spanId) trace.logger.endSpan(trace.traceId, spanId);
    reports.push(report);
  });

  return reports;
}

function checkStoreNames(bank: RegisterBank, tick: ScenarioTick): void {
  for (const name of Object.keys(tick.flags)) bank.flags(name);
  for (const name of Object.keys(tick.slots)) bank.slots(name);
}

function toCommands(record: Record<string, number | string | null>): WeightedMap<Feature> {
  return WeightedMap.of(
    featureKind,
    Object.entries(record).map(([dim, value]): [Feature, number] => [feature(dim, value), 1]),
  );
}

function toChunks(record: Record<string, number>): WeightedMap<Chunk> {
  return WeightedMap.of(chunkKind, Object.entries(record));
}
