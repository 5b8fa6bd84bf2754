import { readFile, readdir } from 'node:fs/promises';
import { join, extname } from 'node:path';
import yaml from 'js-yaml';
import { ValidationError } from '../shared/errors.js';
import { validateWithSchema } from '../shared/schema-validator.js';
import { RULE_VERSION_SCHEMA } from './rule-version.schema.js';
import type { RuleVersion } from './types.js';
import type { RuleVersionRegistry } from './rule-registry.js';

const RULE_FILE_EXTENSIONS = new Set(['.yaml', '.yml', '.json']);

/**
 * Load one rule version from a YAML or JSON file.
 */
export async function loadRuleVersionFile(filePath: string): Promise<RuleVersion> {
  const content = await readFile(filePath, 'utf-8');
  const ext = extname(filePath).toLowerCase();

  let parsed: unknown;
  if (ext === '.yaml' || ext === '.yml') {
    parsed = yaml.load(content);
  } else if (ext === '.json') {
    parsed = JSON.parse(content);
  } else {
    throw new ValidationError(
      `Unsupported rule file format: ${ext} (expected .yaml, .yml, or .json)`,
      'file',
    );
  }

  return validateWithSchema<RuleVersion>(RULE_VERSION_SCHEMA, parsed, `Rule file ${filePath}`);
}

/**
 * Load every rule file in a directory, in file name order.
 */
export async function loadRuleVersionsFromDirectory(dirPath: string): Promise<RuleVersion[]> {
  const files = (await readdir(dirPath))
    .filter((f) => RULE_FILE_EXTENSIONS.has(extname(f).toLowerCase()))
    .sort();

  const versions: RuleVersion[] = [];
  for (const file of files) {
    versions.push(await loadRuleVersionFile(join(dirPath, file)));
  }
  return versions;
}

/**
 * Register every rule version found in `dirPath`. Versions already present in the
 * registry are skipped only when identical; a changed definition is a conflict.
 */
export async function registerRuleVersionsFromDirectory(
  registry: RuleVersionRegistry,
  dirPath: string,
): Promise<string[]> {
  const registered: string[] = [];
  for (const ruleVersion of await loadRuleVersionsFromDirectory(dirPath)) {
    if (registry.has(ruleVersion.version)) {
      if (JSON.stringify(registry.get(ruleVersion.version)) === JSON.stringify(ruleVersion)) continue;
    }
    registry.register(ruleVersion);
    registered.push(ruleVersion.version);
  }
  return registered;
}
