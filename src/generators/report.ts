import type { RecordKind } from '../types';

const RECORD_KINDS: readonly RecordKind[] = [
  'datacenter',
  'pod',
  'row',
  'rack',
  'device',
  'interface',
  'cable',
  'name_claim',
  'pool',
  'allocation',
];

export type KindCounts = Partial<Record<RecordKind, number>>;

export interface GenerationReport {
  /** Hierarchy node the run was bound to. */
  node: string;
  created: KindCounts;
  existing: KindCounts;
}

export function createReport(node: string): GenerationReport {
  return { node, created: {}, existing: {} };
}

function bump(counts: KindCounts, kind: RecordKind, by: number): void {
  if (by > 0) counts[kind] = (counts[kind] ?? 0) + by;
}

export function tally(
  report: GenerationReport,
  kind: RecordKind,
  results: readonly { status: 'created' | 'existing' }[]
): void {
  bump(report.created, kind, results.filter((result) => result.status === 'created').length);
  bump(report.existing, kind, results.filter((result) => result.status === 'existing').length);
}

export function mergeReport(target: GenerationReport, source: GenerationReport): GenerationReport {
  for (const [kind, count] of entries(source.created)) bump(target.created, kind, count);
  for (const [kind, count] of entries(source.existing)) bump(target.existing, kind, count);
  return target;
}

function entries(counts: KindCounts): [RecordKind, number][] {
  const result: [RecordKind, number][] = [];
  for (const kind of RECORD_KINDS) {
    const count = counts[kind];
    if (count) result.push([kind, count]);
  }
  return result;
}

export function totalCreated(report: GenerationReport): number {
  return entries(report.created).reduce((sum, [, count]) => sum + count, 0);
}

/** "device: 4 created, 0 existing; interface: ..." */
export function formatReport(report: GenerationReport): string {
  const parts = RECORD_KINDS.filter((kind) => report.created[kind] || report.existing[kind]).map(
    (kind) => `${kind}: ${report.created[kind] ?? 0} created, ${report.existing[kind] ?? 0} existing`
  );
  return `${report.node}: ${parts.length > 0 ? parts.join('; ') : 'nothing to do'}`;
}
