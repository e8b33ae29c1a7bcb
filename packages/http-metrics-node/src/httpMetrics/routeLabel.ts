import type { RouteLabelInput, RouteParams, UnmatchedRoutePolicy } from './types.js';

export type RouteTemplateSegment =
  | { kind: 'literal'; text: string }
  | { kind: 'param'; name: string; text: string };

const paramNameChar = /[A-Za-z0-9_]/;

function readParamName(template: string, from: number): number {
  let end = from;
  while (end < template.length && paramNameChar.test(template[end])) {
    end++;
  }
  return end;
}

// Returns the index after the `)` closing the constraint that opens at `from`.
function skipConstraint(template: string, from: number): number {
  let depth = 0;
  for (let i = from; i < template.length; i++) {
    const char = template[i];
    if (char === '\\') {
      i++;
    } else if (char === '(') {
      depth++;
    } else if (char === ')' && --depth === 0) {
      return i + 1;
    }
  }
  return template.length;
}

/**
 * Splits a route template into literal text and named placeholders. Both the
 * Fastify form (`:name`, `:name(regex)`, `:name?`, with `::` as an escaped
 * colon) and the brace form (`{name}`, `{name:regex}`) are recognised.
 */
export function parseRouteTemplate(template: string): RouteTemplateSegment[] {
  const segments: RouteTemplateSegment[] = [];
  let literal = '';
  let i = 0;

  const pushParam = (name: string, end: number) => {
    if (literal) {
      segments.push({ kind: 'literal', text: literal });
      literal = '';
    }
    segments.push({ kind: 'param', name, text: template.slice(i, end) });
    i = end;
  };

  while (i < template.length) {
    const char = template[i];

    if (char === ':' && template[i + 1] === ':') {
      literal += '::';
      i += 2;
      continue;
    }

    if (char === ':') {
      const nameEnd = readParamName(template, i + 1);
      if (nameEnd > i + 1) {
        let end = template[nameEnd] === '(' ? skipConstraint(template, nameEnd) : nameEnd;
        if (template[end] === '?') {
          end++;
        }
        pushParam(template.slice(i + 1, nameEnd), end);
        continue;
      }
    }

    if (char === '{') {
      const close = template.indexOf('}', i);
      const nameEnd = readParamName(template, i + 1);
      const terminator = template[nameEnd];
      if (close !== -1 && nameEnd > i + 1 && (terminator === '}' || terminator === ':')) {
        pushParam(template.slice(i + 1, nameEnd), close + 1);
        continue;
      }
    }

    literal += char;
    i++;
  }

  if (literal) {
    segments.push({ kind: 'literal', text: literal });
  }

  return segments;
}

/**
 * Replaces the placeholders named in `keepParams` with their matched values.
 * Names the template does not contain, and names without a matched value,
 * leave the template untouched.
 */
export function substituteRouteParams(
  template: string,
  params: RouteParams,
  keepParams: readonly string[],
): string {
  const kept = new Set(keepParams);

  return parseRouteTemplate(template)
    .map((segment) => {
      if (segment.kind === 'literal' || !kept.has(segment.name)) {
        return segment.text;
      }
      const value: string | undefined = params[segment.name];
      return value ?? segment.text;
    })
    .join('');
}

/**
 * Route as seen before masking: the raw path when nothing matched, otherwise
 * the template with kept parameters substituted. Exclusions match against it.
 */
export function resolveUnmaskedRoute(input: RouteLabelInput): string {
  if (input.routeTemplate === undefined) {
    return input.path;
  }

  const keepParams = input.extension?.cardinalityKeepParams ?? [];
  if (keepParams.length === 0) {
    return input.routeTemplate;
  }

  return substituteRouteParams(input.routeTemplate, input.params ?? {}, keepParams);
}

/**
 * Label value for the `http.route` label. Kept parameters are dropped when
 * the response is 404 or 405, so values the server rejected never become
 * label values.
 */
export function resolveRouteLabel(input: RouteLabelInput, policy: UnmatchedRoutePolicy): string {
  if (input.routeTemplate === undefined) {
    return policy.kind === 'mask' ? policy.label : input.path;
  }

  if (input.statusCode === 404 || input.statusCode === 405) {
    return input.routeTemplate;
  }

  return resolveUnmaskedRoute(input);
}
