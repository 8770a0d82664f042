import type { Logger } from 'pino';
import type { Program, Scope } from '../language/index.js';
import { parse } from '../language/index.js';
import { createActions } from './actions.js';
import { GlobalScope } from './global-scope.js';
import type { VariableManager } from './variable-manager.js';

export interface RuleDeps {
  variables: VariableManager;
  log: Logger;
}

/**
 * A parsed rule bound to its own global scope.
 *
 * Parsed once; every trigger re-evaluates the same program.
 */
export class Rule {
  private constructor(
    readonly name: string,
    private readonly program: Program,
    private readonly scope: Scope,
  ) {}

  /** @throws ParseError; a rule that does not parse is never constructed. */
  static fromSource(name: string, source: string, deps: RuleDeps): Rule {
    const program = parse(name, source);
    const scope = new GlobalScope(deps.variables, createActions(deps.log.child({ rule: name })));
    return new Rule(name, program, scope);
  }

  /** Errors from evaluation propagate unchanged. */
  async run(): Promise<void> {
    await this.scope.eval(this.program);
  }
}
