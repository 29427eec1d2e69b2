import stringWidth from 'string-width';
import { EOL, INDENT } from './constants';
import { isRecord } from './type-guards';

type Row = [key: string, value: string];

/**
 * Normalizes anything thrown into an Error instance.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }

  return new Error(safeStringify(value));
}

function safeStringify(value: unknown): string {
  if (value === null || value === undefined) {
    return String(value);
  }

  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(value);
    case 'function':
      return '[Function]';
    case 'symbol':
      return value.toString();
    default:
      try {
        return JSON.stringify(value) ?? String(value);
      } catch {
        return '[Unserializable]';
      }
  }
}

function padKey(key: string, width: number): string {
  return key + ' '.repeat(Math.max(0, width - stringWidth(key)));
}

function collectRows(error: Record<string, unknown>): Row[] {
  const rows: Row[] = [];
  const add = (key: string, value: unknown): void => {
    if (value !== undefined && value !== null && value !== '') {
      rows.push([key, safeStringify(value)]);
    }
  };

  add('Name', error['name']);
  add('Message', error['message']);
  add('Code', error['code']);
  add('Prefix', error['errPrefix']);
  add('errType', error['errType']);
  add('errCode', error['errCode']);

  const additionalInfo = error['additionalInfo'];
  const sensitive = error['sensitiveFieldNames'];
  const sensitiveFieldNames = Array.isArray(sensitive) ? sensitive : [];

  if (isRecord(additionalInfo)) {
    for (const [key, value] of Object.entries(additionalInfo)) {
      if (sensitiveFieldNames.includes(key)) {
        rows.push([`AdditionalInfo.${key}`, '***']);
      } else if (value instanceof Error) {
        rows.push([`AdditionalInfo.${key}`, `${value.name}: ${value.message}`]);
      } else {
        add(`AdditionalInfo.${key}`, value);
      }
    }
  }

  return rows;
}

/**
 * Renders an error (or anything thrown) as an aligned key/value block,
 * followed by its stack and, indented, its `cause` chain.
 *
 * ```text
 * Name                    UnknownDependencyError
 * Message                 Component "api" depends on "db", which is not part of the set
 * Prefix                  DependencyResolverErr
 * errCode                 UnknownDependency
 * AdditionalInfo.id       api
 * ```
 */
export function errorToString(error: unknown, depth = 0): string {
  if (!isRecord(error) && !(error instanceof Error)) {
    return safeStringify(error);
  }

  const record: Record<string, unknown> = { ...(isRecord(error) ? error : {}) };

  // Error own properties like message/stack are not enumerable, read them directly
  if (error instanceof Error) {
    record['name'] = error.name;
    record['message'] = error.message;
  }

  const rows = collectRows(record);
  const width = rows.reduce((max, [key]) => Math.max(max, stringWidth(key)), 0);
  const lines = rows.map(([key, value]) => `${padKey(key, width)}  ${value}`);

  if (error instanceof Error && error.stack && depth === 0) {
    lines.push('', error.stack);
  }

  if (error instanceof Error && error.cause !== undefined && depth < 5) {
    const nested = errorToString(error.cause, depth + 1)
      .split(EOL)
      .map((line) => INDENT + line);
    lines.push('', 'Cause:', ...nested);
  }

  return lines.join(EOL);
}
