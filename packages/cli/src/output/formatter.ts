import type { WeightedMap, StoreVocabulary } from '@wmreg/core';
import type { ExecutionTrace } from '@wmreg/shared';
import type { TickReport } from '../scenario.js';

export function formatWeight(w: number): string {
  const text = Number.isInteger(w) ? String(w) : String(Number(w.toFixed(3)));
  return w > 0 ? `+${text}` : text;
}

export function formatWeightedMap<K>(map: WeightedMap<K>): string {
  const parts = map.entries().map(([key, w]) => `${map.kind.label(key)}: ${formatWeight(w)}`);
  const body = parts.length > 0 ? parts.join(', ') : '(empty)';
  return map.c !== 0 ? `${body} [default ${formatWeight(map.c)}]` : body;
}

export function formatTickReport(report: TickReport): string {
  const lines: string[] = [];
  lines.push(`--- Tick ${report.tick} ---`);
  for (const [name, flags] of Object.entries(report.flags)) {
    lines.push(`${name}: ${formatWeightedMap(flags)}`);
  }
  for (const [name, slots] of Object.entries(report.slots)) {
    lines.push(`${name}.chunks: ${formatWeightedMap(slots.chunks)}`);
    lines.push(`${name}.status: ${formatWeightedMap(slots.status)}`);
  }
  return lines.join('\n');
}

export function formatVocabulary(vocabulary: StoreVocabulary[]): string {
  if (vocabulary.length === 0) return 'No stores configured.';
  const list = (items: string[]) => (items.length > 0 ? items.join(', ') : '(none)');
  return vocabulary
    .map((v) => [
      `${v.store} (${v.type})`,
      `  cmds:  ${list(v.cmds)}`,
      `  nops:  ${list(v.nops)}`,
      `  flags: ${list(v.flags)}`,
    ].join('\n'))
    .join('\n\n');
}

export function formatTrace(trace: ExecutionTrace): string {
  return JSON.stringify(trace, null, 2);
}
