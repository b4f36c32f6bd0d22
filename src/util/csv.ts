import fs from "fs";
import { CsvValue } from "./types";

type CsvWriterOpts = {
  // rows buffered between writes to the descriptor
  flushEvery?: number;
};

/**
 * CSV writer over a single file descriptor. The file is created (or truncated)
 * on construction and the header goes out with the first flush. Rows are
 * serialized strictly in `columns` order.
 */
export class CsvWriter<R extends Record<keyof R, CsvValue>> {
  private fd: number;
  private columns: readonly (keyof R & string)[];
  private pending: string[] = [];
  private flushEvery: number;
  private closed = false;

  rows = 0;

  constructor(readonly file: string, columns: readonly (keyof R & string)[], opts: CsvWriterOpts = {}) {
    this.columns = columns;
    this.flushEvery = Math.max(1, opts.flushEvery ?? 1024);
    this.fd = fs.openSync(file, "w");
    this.pending.push(columns.map((c) => this.esc(c)).join(","));
  }

  private esc(x: CsvValue) {
    const s = String(x);
    return /[",\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
  }

  write(row: R) {
    if (this.closed) throw new Error(`CsvWriter: write after close (${this.file})`);
    this.pending.push(this.columns.map((k) => this.esc(row[k])).join(","));
    this.rows++;
    if (this.pending.length >= this.flushEvery) this.flush();
  }

  flush() {
    if (this.pending.length === 0) return;
    const buf = Buffer.from(this.pending.join("\n") + "\n", "utf8");
    // writeSync may take only part of the buffer (e.g. disk nearly full)
    for (let off = 0; off < buf.length; ) {
      const n = fs.writeSync(this.fd, buf, off, buf.length - off);
      if (n <= 0) throw new Error(`CsvWriter: short write to ${this.file}`);
      off += n;
    }
    this.pending = [];
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    try {
      this.flush();
    } finally {
      fs.closeSync(this.fd);
    }
  }
}

/** Writes every row to `file` and always releases the descriptor. Returns the row count. */
export function writeCsv<R extends Record<keyof R, CsvValue>>(file: string, columns: readonly (keyof R & string)[], rows: Iterable<R>, opts?: CsvWriterOpts): number {
  const out = new CsvWriter<R>(file, columns, opts);
  try {
    for (const row of rows) out.write(row);
  } finally {
    out.close();
  }
  return out.rows;
}
