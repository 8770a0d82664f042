import { describe, it, expect } from 'vitest';
import { createLogAction, createRunAction, runCommand } from '../../src/application/actions.js';
import { BuiltinArgumentError } from '../../src/domain/errors.js';
import { NIL, int, str } from '../../src/domain/value.js';
import { fakeLogger } from '../helpers.js';

describe('log action', () => {
  it('writes its message and returns nil', async () => {
    const log = fakeLogger();
    const action = createLogAction(log);

    expect(await action.call([str('door opened')])).toEqual(NIL);
    expect(log.info).toHaveBeenCalledWith('door opened');
  });

  it('takes exactly one argument', async () => {
    const action = createLogAction(fakeLogger());

    await expect(action.call([])).rejects.toMatchObject({
      builtin: 'log',
      reason: 'count',
      message: 'log takes exactly one argument',
    });
    await expect(action.call([str('a'), str('b')])).rejects.toBeInstanceOf(BuiltinArgumentError);
  });

  it('takes a string only', async () => {
    const action = createLogAction(fakeLogger());

    await expect(action.call([int(1)])).rejects.toMatchObject({
      reason: 'type',
      message: 'log takes a string argument',
    });
  });
});

describe('run action', () => {
  it('needs a command', async () => {
    const action = createRunAction(fakeLogger());

    await expect(action.call([])).rejects.toMatchObject({
      builtin: 'run',
      reason: 'count',
      message: 'run takes at least one argument',
    });
  });

  it('takes strings only', async () => {
    const action = createRunAction(fakeLogger());

    await expect(action.call([str('echo'), int(1)])).rejects.toMatchObject({
      reason: 'type',
      message: 'run only takes string arguments',
    });
  });

  it('runs the command to completion and returns nil', async () => {
    const log = fakeLogger();
    const action = createRunAction(log);

    const result = await action.call([str(process.execPath), str('-e'), str('')]);

    expect(result).toEqual(NIL);
    expect(log.debug).toHaveBeenCalledWith(
      { command: process.execPath, args: ['-e', ''] },
      'Command finished',
    );
    expect(log.warn).not.toHaveBeenCalled();
  });
});

describe('runCommand', () => {
  it('warns when the command cannot be started', async () => {
    const log = fakeLogger();

    await runCommand(log, 'ruleloop-no-such-command', ['x']);

    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ command: 'ruleloop-no-such-command', args: ['x'] }),
      'Failed to start command',
    );
  });

  it('warns when the command exits unsuccessfully', async () => {
    const log = fakeLogger();

    await runCommand(log, process.execPath, ['-e', 'process.exit(3)']);

    expect(log.warn).toHaveBeenCalledWith(
      { command: process.execPath, args: ['-e', 'process.exit(3)'], code: 3, signal: null },
      'Command exited unsuccessfully',
    );
  });
});
