/**
 * Command interface for publish rollback.
 *
 * `execute()` applies one filesystem change; `undo()` removes whatever
 * execute created, including the partial output of an execute that failed.
 * `cleanup()` runs once every command in the history has been undone.
 */
export interface Command {
  readonly label: string;
  execute(): Promise<void>;
  undo(): Promise<void>;
  cleanup?(): Promise<void>;
}

export interface CommandFailure {
  command: Command;
  error: unknown;
}

/**
 * Records executed commands so a failed operation can be unwound.
 *
 * A command is recorded before it executes, so a failed execute is still
 * undone. `rollback()` undoes newest first and keeps going past failures.
 */
export class CommandHistory {
  private _stack: Command[] = [];

  async push(cmd: Command): Promise<void> {
    this._stack.push(cmd);
    await cmd.execute();
  }

  /**
   * Executes commands concurrently and waits for every one to settle.
   * @returns The commands that failed, in the order given.
   */
  async pushAll(cmds: Command[]): Promise<CommandFailure[]> {
    this._stack.push(...cmds);
    const results = await Promise.allSettled(cmds.map(cmd => cmd.execute()));
    return results.flatMap((result, i) =>
      result.status === 'rejected' ? [{ command: cmds[i], error: result.reason }] : [],
    );
  }

  /**
   * Undoes every recorded command, then runs cleanups, and empties the history.
   * @returns The undo and cleanup steps that failed.
   */
  async rollback(): Promise<CommandFailure[]> {
    const undone = [...this._stack].reverse();
    this._stack = [];

    const failures: CommandFailure[] = [];
    for (const cmd of undone) {
      try {
        await cmd.undo();
      } catch (error: unknown) {
        failures.push({ command: cmd, error });
      }
    }
    for (const cmd of undone) {
      if (cmd.cleanup === undefined) continue;
      try {
        await cmd.cleanup();
      } catch (error: unknown) {
        failures.push({ command: cmd, error });
      }
    }
    return failures;
  }

  get depth(): number {
    return this._stack.length;
  }

  clear(): void {
    this._stack = [];
  }
}
