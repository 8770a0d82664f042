import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Rule } from '../../application/rule.js';
import type { RuleDeps } from '../../application/rule.js';

export const DEFAULT_RULE_EXTENSION = '.rule';

/**
 * Lists rule files in `dir`: regular files ending in `extension`, sorted
 * by file name so the load order is stable across runs.
 */
export async function discoverRuleFiles(dir: string, extension: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.endsWith(extension))
    .map((e) => e.name)
    .sort();
}

/**
 * Loads every rule file in `dir`.
 *
 * A file that cannot be read or parsed is logged and skipped; loading
 * continues with the next one. A missing directory yields no rules.
 */
export async function loadRules(
  dir: string,
  extension: string,
  deps: RuleDeps,
): Promise<Rule[]> {
  let files: string[];
  try {
    files = await discoverRuleFiles(dir, extension);
  } catch (err: unknown) {
    deps.log.warn({ err, dir }, 'Cannot read rules directory, no rules loaded');
    return [];
  }

  const rules: Rule[] = [];
  for (const file of files) {
    let source: string;
    try {
      source = await readFile(join(dir, file), 'utf-8');
    } catch (err: unknown) {
      deps.log.warn({ err, file }, 'Failed to read rule file, skipping');
      continue;
    }

    try {
      rules.push(Rule.fromSource(file, source, deps));
    } catch (err: unknown) {
      deps.log.warn({ err, file }, 'Failed to parse rule file, skipping');
    }
  }

  deps.log.info(
    { ruleCount: rules.length, rules: rules.map((r) => r.name), dir },
    'Rules loaded',
  );
  return rules;
}
