import * as path from 'path';
import { type Command } from './command.js';
import { type PublishFileSystem, withTimeout } from '../io/publish-fs.js';
import { isErrnoException } from '../pipeline-errors.js';

let tempCounter = 0;

/**
 * Copies one file into the publish area.
 *
 * The copy goes to a hidden temporary name in the destination directory and
 * is renamed into place, so a reader never sees a partial destination. An
 * existing destination is never overwritten.
 */
export class CopyFileCommand implements Command {
  readonly label: string;
  readonly tempPath: string;
  private copying: Promise<void> | null = null;
  private renaming: Promise<void> | null = null;
  private createdDir: string | undefined;
  private _committed = false;
  private _placed = false;

  constructor(
    readonly source: string,
    readonly destination: string,
    private readonly fs: PublishFileSystem,
    private readonly timeoutMs: number,
  ) {
    this.label = `copy ${source} -> ${destination}`;
    tempCounter++;
    this.tempPath = path.join(
      path.dirname(destination),
      `.${path.basename(destination)}.${String(process.pid)}-${String(tempCounter)}.partial`,
    );
  }

  /** Whether the destination has been written by this command and not yet removed. */
  get committed(): boolean {
    return this._committed;
  }

  /** Whether the destination was ever written, even by a rename that settled after its timeout. */
  get placed(): boolean {
    return this._placed;
  }

  async execute(): Promise<void> {
    if (await this.bounded(this.fs.exists(this.destination), 'check destination')) {
      throw new Error(`Destination already exists: ${this.destination}`);
    }
    this.createdDir = await this.bounded(this.fs.mkdir(path.dirname(this.destination)), 'create directory');

    this.copying = this.fs.copyFile(this.source, this.tempPath);
    await this.bounded(this.copying, 'copy');

    if (await this.bounded(this.fs.exists(this.destination), 'check destination')) {
      throw new Error(`Destination already exists: ${this.destination}`);
    }
    this.renaming = this.fs.rename(this.tempPath, this.destination).then(() => {
      this._placed = true;
      this._committed = true;
    });
    await this.bounded(this.renaming, 'rename');
  }

  /**
   * Waits for a timed-out copy or rename still in flight, then removes what it wrote.
   */
  async undo(): Promise<void> {
    const inFlight = [this.copying, this.renaming].filter((call): call is Promise<void> => call !== null);
    await Promise.allSettled(inFlight);
    await this.bounded(this.fs.rm(this.tempPath), 'remove temp file');
    if (this._committed) {
      await this.bounded(this.fs.rm(this.destination), 'remove destination');
      this._committed = false;
    }
  }

  /**
   * Removes the directories execute created, deepest first, while they are empty.
   */
  async cleanup(): Promise<void> {
    if (this.createdDir === undefined) return;
    const top = this.createdDir;

    let dir = path.dirname(this.destination);
    for (;;) {
      try {
        await this.bounded(this.fs.rmdir(dir), 'remove directory');
      } catch (e: unknown) {
        if (!isErrnoException(e)) throw e;
        if (e.code === 'ENOTEMPTY' || e.code === 'EEXIST') return;
        if (e.code !== 'ENOENT') throw e;
      }
      const parent = path.dirname(dir);
      if (dir === top || parent === dir) return;
      dir = parent;
    }
  }

  private bounded<T>(promise: Promise<T>, step: string): Promise<T> {
    return withTimeout(promise, this.timeoutMs, `${step} (${this.destination})`);
  }
}
