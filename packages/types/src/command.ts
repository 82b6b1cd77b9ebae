/**
 * @module command
 * Command pattern types for undo/redo support.
 * Each layer edit is represented as a Command that can be executed and reversed.
 */

/** A reversible command that modifies a composition. */
export interface Command {
  /** Human-readable description, e.g. `Remove layer "title"`. */
  readonly description: string;
  /** Execute the command (apply the change). */
  execute(): void;
  /** Reverse the command (undo the change). */
  undo(): void;
}

/** Manages a stack of commands for undo/redo functionality. */
export interface CommandHistory {
  /** Maximum number of commands to keep in history. */
  readonly maxDepth: number;
  /** Whether there are commands that can be undone. */
  readonly canUndo: boolean;
  /** Whether there are commands that can be redone. */
  readonly canRedo: boolean;
  /** Description of the next command to undo, or null. */
  readonly undoDescription: string | null;
  /** Description of the next command to redo, or null. */
  readonly redoDescription: string | null;

  /** Execute a command and push it onto the undo stack. Clears the redo stack. */
  execute(command: Command): void;
  /** Undo the most recent command. Returns false when there is nothing to undo. */
  undo(): boolean;
  /** Redo the most recently undone command. Returns false when there is nothing to redo. */
  redo(): boolean;
  /** Clear all history. */
  clear(): void;
}
