/**
 * @module command-history
 * Bounded undo/redo log for layer edits.
 *
 * Steps live in one array and `cursor` counts how many of them are applied.
 * Steps past the cursor are redoable until a new edit cuts them off. Once
 * the log holds `maxDepth` steps, recording another drops the oldest.
 */

import type { Command, CommandHistory } from '@eink-composer/types';

/** Default number of undoable steps. */
export const DEFAULT_HISTORY_DEPTH = 50;

export class CommandHistoryImpl implements CommandHistory {
  readonly maxDepth: number;

  private steps: Command[] = [];
  private cursor = 0;

  /** @throws {RangeError} When maxDepth is not an integer of at least 1. */
  constructor(maxDepth: number = DEFAULT_HISTORY_DEPTH) {
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new RangeError('maxDepth must be an integer of at least 1');
    }
    this.maxDepth = maxDepth;
  }

  get canUndo(): boolean {
    return this.cursor > 0;
  }

  get canRedo(): boolean {
    return this.cursor < this.steps.length;
  }

  get undoDescription(): string | null {
    return this.canUndo ? this.steps[this.cursor - 1].description : null;
  }

  get redoDescription(): string | null {
    return this.canRedo ? this.steps[this.cursor].description : null;
  }

  execute(command: Command): void {
    command.execute();
    this.steps.length = this.cursor;
    this.steps.push(command);
    if (this.steps.length > this.maxDepth) {
      this.steps.shift();
    }
    this.cursor = this.steps.length;
  }

  undo(): boolean {
    if (!this.canUndo) return false;
    // Move the cursor only once the step has been reversed.
    this.steps[this.cursor - 1].undo();
    this.cursor--;
    return true;
  }

  redo(): boolean {
    if (!this.canRedo) return false;
    this.steps[this.cursor].execute();
    this.cursor++;
    return true;
  }

  clear(): void {
    this.steps = [];
    this.cursor = 0;
  }
}
