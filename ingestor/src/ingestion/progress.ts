import { EventEmitter } from "node:events";

export type ProgressEvent = {
  symbol: string;
  done: number;
  total: number;
  failed: boolean;
  filesWritten: number;
  rowsWritten: number;
};

/**
 * Symbol-granular progress for one ingestion run. Each symbol advances the
 * counter once, however many batches it produced. Emits `progress`.
 */
export class ProgressTracker extends EventEmitter {
  private readonly seen = new Set<string>();
  private _total = 0;
  private filesWritten = 0;
  private rowsWritten = 0;

  get total(): number {
    return this._total;
  }

  get done(): number {
    return this.seen.size;
  }

  start(total: number): void {
    this.seen.clear();
    this._total = total;
    this.filesWritten = 0;
    this.rowsWritten = 0;
  }

  recordWrite(rows: number): void {
    this.filesWritten++;
    this.rowsWritten += rows;
  }

  /** Returns false when the symbol was already counted. */
  mark(symbol: string, failed = false): boolean {
    if (this.seen.has(symbol)) return false;
    this.seen.add(symbol);
    const event: ProgressEvent = {
      symbol,
      done: this.seen.size,
      total: this._total,
      failed,
      filesWritten: this.filesWritten,
      rowsWritten: this.rowsWritten,
    };
    this.emit("progress", event);
    return true;
  }
}
