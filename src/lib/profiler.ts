/**
 * Stage timings for pipeline and collection runs. Labels are
 * `<group>:<stage>` (`pipeline:clean`, `collect:fiverr`); the summary lists
 * each group by total time with its stages under it.
 */

export type TimingMeta = Record<string, number | string>;

export interface StageTiming {
  label: string;
  durationMs: number;
  meta?: TimingMeta;
}

export class StageProfiler {
  private finished: StageTiming[] = [];
  private running = new Map<string, number>();

  constructor(private readonly clock: () => number = Date.now) {}

  start(label: string): void {
    this.running.set(label, this.clock());
  }

  stop(label: string, meta?: TimingMeta): number {
    const startedAt = this.running.get(label);
    if (startedAt === undefined) {
      console.warn(`[profiler] "${label}" was never started`);
      return 0;
    }
    this.running.delete(label);
    const durationMs = this.clock() - startedAt;
    this.finished.push(meta ? { label, durationMs, meta } : { label, durationMs });
    return durationMs;
  }

  async time<T>(label: string, fn: () => Promise<T>): Promise<T> {
    this.start(label);
    let failed = true;
    try {
      const result = await fn();
      failed = false;
      return result;
    } finally {
      this.stop(label, failed ? { error: "failed" } : undefined);
    }
  }

  timeSync<T>(label: string, fn: () => T): T {
    this.start(label);
    let failed = true;
    try {
      const result = fn();
      failed = false;
      return result;
    } finally {
      this.stop(label, failed ? { error: "failed" } : undefined);
    }
  }

  /** Finished timings in completion order */
  timings(): StageTiming[] {
    return [...this.finished];
  }

  summaryLines(): string[] {
    if (this.finished.length === 0) return [];

    const groups = new Map<string, StageTiming[]>();
    for (const timing of this.finished) {
      const group = timing.label.split(":")[0];
      groups.set(group, [...(groups.get(group) ?? []), timing]);
    }

    const lines = ["=== Pipeline Profile ==="];
    const ranked = [...groups.entries()]
      .map(([group, stages]) => ({ group, stages, total: stages.reduce((sum, s) => sum + s.durationMs, 0) }))
      .sort((a, b) => b.total - a.total || a.group.localeCompare(b.group));
    for (const { group, stages, total } of ranked) {
      lines.push(formatLine(group, total, undefined, 0));
      for (const stage of [...stages].sort((a, b) => b.durationMs - a.durationMs)) {
        lines.push(formatLine(stage.label, stage.durationMs, stage.meta, 1));
      }
    }
    return lines;
  }

  printSummary(): void {
    const lines = this.summaryLines();
    if (lines.length === 0) return;
    console.log(["", ...lines, ""].join("\n"));
  }

  reset(): void {
    this.finished = [];
    this.running.clear();
  }
}

function formatLine(label: string, durationMs: number, meta: TimingMeta | undefined, indent: number): string {
  const pad = "  ".repeat(indent);
  const metaText = meta
    ? "  " + Object.entries(meta).map(([k, v]) => `${k}=${v}`).join(", ")
    : "";
  return `${pad}${label.padEnd(40 - indent * 2)} ${`${durationMs}ms`.padStart(8)}${metaText}`;
}

export const profiler = new StageProfiler();
