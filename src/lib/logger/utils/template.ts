const PLACEHOLDER = /(\\)?{{\s*([\w.]+)\s*}}/g;

function lookup(params: Record<string, unknown>, path: string): unknown {
  let current: unknown = params;

  for (const part of path.split('.')) {
    if (
      current === null ||
      typeof current !== 'object' ||
      !(part in current)
    ) {
      return undefined;
    }

    current = Reflect.get(current, part);
  }

  return current;
}

/**
 * Replaces `{{key}}` and `{{nested.key}}` placeholders with values from
 * `params`. Missing values render as `fallback`; `\{{key}}` is left literal
 * (without the backslash).
 *
 * ```typescript
 * renderTemplate('Component {{id}} failed', { id: 'api' }); // 'Component api failed'
 * ```
 */
export function renderTemplate(
  template: string,
  params: Record<string, unknown>,
  fallback = '(null)',
): string {
  if (!template.includes('{{')) {
    return template;
  }

  return template.replace(
    PLACEHOLDER,
    (match: string, escape: string | undefined, key: string) => {
      if (escape) {
        return match.slice(1);
      }

      const value = lookup(params, key);

      if (value === undefined || value === null) {
        return fallback;
      }

      if (value instanceof Error) {
        return value.message;
      }

      return typeof value === 'object' ? JSON.stringify(value) : String(value);
    },
  );
}
