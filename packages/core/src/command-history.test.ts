import { describe, it, expect, vi } from 'vitest';
import { CommandHistoryImpl, DEFAULT_HISTORY_DEPTH } from './command-history';
import type { Command } from '@eink-composer/types';

/** A command whose execute/undo calls are recorded in `log`. */
function loggedCommand(name: string, log: string[]): Command {
  return {
    description: name,
    execute: () => {
      log.push(`do ${name}`);
    },
    undo: () => {
      log.push(`undo ${name}`);
    },
  };
}

describe('CommandHistoryImpl', () => {
  it('starts empty with the default depth', () => {
    const history = new CommandHistoryImpl();
    expect(history.maxDepth).toBe(DEFAULT_HISTORY_DEPTH);
    expect(history.maxDepth).toBe(50);
    expect(history.canUndo).toBe(false);
    expect(history.canRedo).toBe(false);
    expect(history.undoDescription).toBeNull();
    expect(history.redoDescription).toBeNull();
  });

  it('rejects depths below 1 and fractional depths', () => {
    expect(() => new CommandHistoryImpl(0)).toThrow(RangeError);
    expect(() => new CommandHistoryImpl(-3)).toThrow(RangeError);
    expect(() => new CommandHistoryImpl(2.5)).toThrow(RangeError);
  });

  it('executes a command once when it is pushed', () => {
    const history = new CommandHistoryImpl();
    const cmd: Command = { description: 'x', execute: vi.fn(), undo: vi.fn() };
    history.execute(cmd);
    expect(cmd.execute).toHaveBeenCalledOnce();
    expect(cmd.undo).not.toHaveBeenCalled();
    expect(history.undoDescription).toBe('x');
  });

  it('undoes in LIFO order and reports success', () => {
    const log: string[] = [];
    const history = new CommandHistoryImpl();
    history.execute(loggedCommand('A', log));
    history.execute(loggedCommand('B', log));

    expect(history.undo()).toBe(true);
    expect(history.undo()).toBe(true);
    expect(history.undo()).toBe(false);
    expect(log).toEqual(['do A', 'do B', 'undo B', 'undo A']);
    expect(history.redoDescription).toBe('A');
  });

  it('redo re-executes the last undone command', () => {
    const log: string[] = [];
    const history = new CommandHistoryImpl();
    history.execute(loggedCommand('A', log));
    history.undo();

    expect(history.redo()).toBe(true);
    expect(history.redo()).toBe(false);
    expect(log).toEqual(['do A', 'undo A', 'do A']);
    expect(history.canRedo).toBe(false);
    expect(history.undoDescription).toBe('A');
  });

  it('drops the redo stack when a new command is executed', () => {
    const log: string[] = [];
    const history = new CommandHistoryImpl();
    history.execute(loggedCommand('A', log));
    history.undo();
    history.execute(loggedCommand('B', log));

    expect(history.canRedo).toBe(false);
    expect(history.redo()).toBe(false);
  });

  it('cuts off every undone step when a new command is executed', () => {
    const log: string[] = [];
    const history = new CommandHistoryImpl();
    for (const name of ['A', 'B', 'C']) history.execute(loggedCommand(name, log));
    history.undo();
    history.undo();
    history.execute(loggedCommand('D', log));

    expect(history.undoDescription).toBe('D');
    expect(history.redoDescription).toBeNull();
    history.undo();
    history.undo();
    expect(history.undo()).toBe(false);
    expect(log.slice(-2)).toEqual(['undo D', 'undo A']);
  });

  it('evicts the oldest command beyond maxDepth', () => {
    const log: string[] = [];
    const history = new CommandHistoryImpl(2);
    history.execute(loggedCommand('first', log));
    history.execute(loggedCommand('second', log));
    history.execute(loggedCommand('third', log));

    history.undo();
    history.undo();
    expect(history.canUndo).toBe(false);
    expect(log).not.toContain('undo first');
  });

  it('clear() empties both stacks', () => {
    const log: string[] = [];
    const history = new CommandHistoryImpl();
    history.execute(loggedCommand('A', log));
    history.execute(loggedCommand('B', log));
    history.undo();

    history.clear();
    expect(history.canUndo).toBe(false);
    expect(history.canRedo).toBe(false);
  });
});
