import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { glob } from 'glob';
import yaml from 'js-yaml';
import { SuiteFileSchema, type SuiteFile } from '../types/index.js';
import { interpolateAssertions } from './interpolate.js';

export interface LoadSuiteResult {
  suite: SuiteFile;
  filePath: string;
}

/**
 * Load and validate a single suite file.
 * ${VAR} placeholders in assertion params are resolved from the suite's vars.
 */
export function loadSuiteFile(filePath: string): LoadSuiteResult {
  if (!existsSync(filePath)) {
    throw new Error(`Suite file not found: ${filePath}`);
  }

  const content = readFileSync(filePath, 'utf-8');
  const raw = yaml.load(content);

  const result = SuiteFileSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Invalid suite file ${filePath}:\n${errors}`);
  }

  const suite = result.data;
  const vars = suite.vars ?? {};
  return {
    suite: {
      ...suite,
      assert: interpolateAssertions(suite.assert, vars),
      turns: suite.turns.map((turn) => ({
        ...turn,
        assert: interpolateAssertions(turn.assert, vars),
      })),
      conversation_assert: interpolateAssertions(suite.conversation_assert, vars),
    },
    filePath,
  };
}

/**
 * Find suite files matching glob patterns
 */
export async function findSuiteFiles(
  patterns: string[],
  cwd: string
): Promise<string[]> {
  const files: string[] = [];

  for (const pattern of patterns) {
    const matches = await glob(pattern, { cwd, nodir: true, ignore: ['**/node_modules/**'] });
    for (const match of matches) {
      files.push(resolve(cwd, match));
    }
  }

  return [...new Set(files)].sort();
}

/**
 * Default suite file patterns
 */
export const DEFAULT_SUITE_PATTERNS = ['**/*.check.yaml', '**/*.check.yml'];
