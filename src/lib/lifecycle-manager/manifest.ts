import { createIsolationRequirements, isIsolationLevel } from '../isolation';
import type { IsolationRequirements } from '../isolation';
import { isRecord } from '../type-guards';
import { ComponentError } from './component-error';
import { InvalidManifestError } from './errors';
import type { ComponentManifest } from './types';

const COMPONENT_ID_PATTERN = /^[a-z][a-z0-9-]*(\.[a-z][a-z0-9-]*)*$/;
const VERSION_PATTERN = /^\d+\.\d+\.\d+(-[a-zA-Z0-9-]+)?$/;

export function isValidComponentId(id: string): boolean {
  return COMPONENT_ID_PATTERN.test(id);
}

export function isValidVersion(version: string): boolean {
  return VERSION_PATTERN.test(version);
}

/**
 * Manifest with defaults filled in and lists copied
 */
export interface NormalizedManifest extends ComponentManifest {
  dependencies: string[];
  references: string[];
  tags: string[];
}

export type ManifestValidationResult =
  | {
      valid: true;
      manifest: NormalizedManifest;
      requirements: IsolationRequirements;
      warnings: ComponentError[];
    }
  | {
      valid: false;
      error: ComponentError;
      warnings: ComponentError[];
    };

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim().length === 0;
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Checks a manifest and builds its isolation requirements. Problems are
 * collected into one critical `invalid_manifest` error; a missing vendor is
 * only a warning.
 */
export function validateManifest(manifest: ComponentManifest): ManifestValidationResult {
  const problems: string[] = [];
  const warnings: ComponentError[] = [];
  const id = manifest.id;

  if (typeof id !== 'string' || !isValidComponentId(id)) {
    problems.push(`id "${id}" is not a valid component id`);
  }

  if (isBlank(manifest.name)) {
    problems.push('name is required');
  }

  if (typeof manifest.version !== 'string' || !isValidVersion(manifest.version)) {
    problems.push(`version "${manifest.version}" is not major.minor.patch`);
  }

  if (isBlank(manifest.entry)) {
    problems.push('entry is required');
  }

  const lists = {
    dependencies: manifest.dependencies ?? [],
    references: manifest.references ?? [],
    tags: manifest.tags ?? [],
  };

  for (const [field, value] of Object.entries(lists)) {
    if (!isStringList(value)) {
      problems.push(`${field} must be a list of strings`);
    }
  }

  const isolation = manifest.isolation ?? {};
  if (!isRecord(isolation)) {
    problems.push('isolation must be an object');
  } else if (isolation.level !== undefined && !isIsolationLevel(isolation.level)) {
    problems.push(`isolation level "${String(isolation.level)}" is unknown`);
  }

  if (isBlank(manifest.vendor)) {
    warnings.push(
      ComponentError.warning(id, 'invalid_manifest', `Component "${id}" has no vendor`),
    );
  }

  if (problems.length > 0) {
    const cause = new InvalidManifestError({ id, problems });

    return {
      valid: false,
      error: ComponentError.critical(id, 'invalid_manifest', cause.message, cause),
      warnings,
    };
  }

  return {
    valid: true,
    manifest: {
      ...manifest,
      dependencies: [...new Set(lists.dependencies)],
      references: [...lists.references],
      tags: [...lists.tags],
    },
    requirements: createIsolationRequirements(isolation),
    warnings,
  };
}
