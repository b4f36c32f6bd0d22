import fs from "fs";
import os from "os";
import path from "path";

import { RNG } from "../src/util/rng";

/** RNG whose uniform() replays a fixed script, cycling when exhausted. */
export class ScriptedRNG extends RNG {
  private i = 0;

  constructor(private script: number[]) {
    super("scripted");
    if (script.length === 0) throw new Error("ScriptedRNG: empty script");
  }

  uniform(): number {
    const v = this.script[this.i % this.script.length] ?? 0;
    this.i++;
    return v;
  }

  get draws(): number {
    return this.i;
  }
}

export function tempDir(prefix = "market-fixtures-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** header + data rows, trailing newline dropped */
export function readCsv(file: string): { header: string[]; rows: string[][] } {
  const lines = fs.readFileSync(file, "utf8").split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  const [head = "", ...body] = lines;
  return { header: head.split(","), rows: body.map((l) => l.split(",")) };
}

export function take<T>(it: Iterable<T>, n = Infinity): T[] {
  const out: T[] = [];
  for (const x of it) {
    out.push(x);
    if (out.length >= n) break;
  }
  return out;
}
