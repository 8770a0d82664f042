import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import type { Logger } from 'pino';
import { NIL } from '../domain/value.js';
import { BuiltinArgumentError } from '../domain/errors.js';
import type { NativeFunction, RuntimeValue } from '../language/index.js';

/**
 * Starts `command` without a shell and waits for it to exit.
 *
 * Never rejects: a command that cannot be started or exits unsuccessfully
 * is logged as a warning, so a broken command never aborts a rule.
 */
export function runCommand(log: Logger, command: string, args: readonly string[]): Promise<void> {
  return new Promise((resolve) => {
    let settled = false;
    const finish = (): void => {
      settled = true;
      resolve();
    };

    let child: ChildProcess;
    try {
      child = spawn(command, args, { stdio: 'ignore' });
    } catch (err: unknown) {
      log.warn({ err, command, args }, 'Failed to start command');
      finish();
      return;
    }

    child.once('error', (err: Error) => {
      if (settled) return;
      log.warn({ err, command, args }, 'Failed to start command');
      finish();
    });

    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      if (code === 0) {
        log.debug({ command, args }, 'Command finished');
      } else {
        log.warn({ command, args, code, signal }, 'Command exited unsuccessfully');
      }
      finish();
    });
  });
}

function stringArgs(builtin: string, args: readonly RuntimeValue[], message: string): string[] {
  return args.map((arg) => {
    if (arg.kind !== 'string') {
      throw new BuiltinArgumentError(builtin, 'type', message);
    }
    return arg.value;
  });
}

/** `(run "program" "arg"...)` runs an external program, returns nil. */
export function createRunAction(log: Logger): NativeFunction {
  return {
    kind: 'function',
    name: 'run',
    async call(args) {
      const argv = stringArgs('run', args, 'run only takes string arguments');
      const [command, ...rest] = argv;
      if (command === undefined) {
        throw new BuiltinArgumentError('run', 'count', 'run takes at least one argument');
      }
      await runCommand(log, command, rest);
      return NIL;
    },
  };
}

/** `(log "message")` writes one line through the rule's logger, returns nil. */
export function createLogAction(log: Logger): NativeFunction {
  return {
    kind: 'function',
    name: 'log',
    async call(args) {
      if (args.length !== 1) {
        throw new BuiltinArgumentError('log', 'count', 'log takes exactly one argument');
      }
      const [message] = stringArgs('log', args, 'log takes a string argument');
      log.info(message ?? '');
      return NIL;
    },
  };
}

/** Actions injected into every rule evaluation. */
export function createActions(log: Logger): readonly NativeFunction[] {
  return [createRunAction(log), createLogAction(log)];
}
