/**
 * Output destinations
 */

import { promises as fs } from "node:fs";
import path from "node:path";

export interface OutputDestination<R> {
  readonly location: string;
  write(rows: R[]): Promise<void>;
}

/**
 * Writes the whole document at once: to a temp file beside the target,
 * then renamed over it, so readers never observe a half-written file.
 */
export class FileDestination<R> implements OutputDestination<R> {
  constructor(
    public readonly location: string,
    private readonly serialize: (rows: R[]) => string = (rows) =>
      `${JSON.stringify(rows, null, 2)}\n`,
  ) {}

  async write(rows: R[]): Promise<void> {
    const dir = path.dirname(this.location);
    await fs.mkdir(dir, { recursive: true });
    const tmp = path.join(
      dir,
      `.${path.basename(this.location)}.${process.pid}.tmp`,
    );
    await fs.writeFile(tmp, this.serialize(rows), "utf8");
    try {
      await fs.rename(tmp, this.location);
    } catch (e) {
      await fs.rm(tmp, { force: true });
      throw e;
    }
  }
}

/** Keeps the last written document in memory */
export class MemoryDestination<R> implements OutputDestination<R> {
  readonly location = "memory";
  rows: R[] | null = null;
  writes = 0;

  async write(rows: R[]): Promise<void> {
    this.rows = rows;
    this.writes++;
  }
}
