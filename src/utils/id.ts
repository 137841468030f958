/**
 * Per-process task ids that sort by creation: `t-20261019-001`, `t-20261019-002`, ... The
 * sequence restarts each UTC day and widens past three digits rather than wrapping.
 */
export class TaskIdGenerator {
  private day: string | null = null;
  private seq = 0;

  next(now: Date = new Date()): string {
    const day = utcDay(now);
    if (this.day !== day) {
      this.day = day;
      this.seq = 0;
    }
    this.seq += 1;
    return `t-${day}-${String(this.seq).padStart(3, '0')}`;
  }
}

function utcDay(d: Date): string {
  return d.toISOString().slice(0, 10).replaceAll('-', '');
}
