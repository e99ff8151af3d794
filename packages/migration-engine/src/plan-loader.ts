import * as fs from 'fs';
import yaml from 'js-yaml';
import { ConfigurationError, errorMessage } from './errors';
import { MigrationPlan, validateMigrationPlan } from './plan';

/**
 * Parse and validate a YAML (or JSON) plan document.
 *
 * Scalars are read with the failsafe schema so versions such as `8.0` stay
 * the string "8.0" instead of becoming the number 8.
 */
export function parsePlan(raw: string, source = '<inline>'): MigrationPlan {
  if (!raw || raw.trim().length === 0) {
    throw new ConfigurationError(`Plan file is empty: ${source}`);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw, { schema: yaml.FAILSAFE_SCHEMA, filename: source });
  } catch (error) {
    throw new ConfigurationError(`Plan file is not valid YAML: ${source}: ${errorMessage(error)}`);
  }
  if (!doc || typeof doc !== 'object') {
    throw new ConfigurationError(`Plan file is not a valid YAML object: ${source}`);
  }

  return validateMigrationPlan(doc);
}

export function loadPlan(planPath: string): MigrationPlan {
  if (!planPath || planPath.trim() === '') {
    throw new ConfigurationError('plan path is required');
  }
  if (!fs.existsSync(planPath)) {
    throw new ConfigurationError(`Plan file missing: ${planPath}`);
  }

  let raw: string;
  try {
    raw = fs.readFileSync(planPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`cannot read plan file ${planPath}: ${errorMessage(error)}`);
  }
  return parsePlan(raw, planPath);
}
