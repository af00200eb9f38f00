const SINGLE_PARAMETER_ARROW = /^(?:async\s+)?([A-Za-z_$][\w$]*)\s*=>/;

/**
 * Parameter names of a function, read from its source. Native functions
 * only expose their arity, so they get `arg0`, `arg1`, ...
 */
export function parameterNames(fn: object): string[] {
  const source = Function.prototype.toString.call(fn);

  if (source.includes('[native code]')) {
    const arity: unknown = Reflect.get(fn, 'length');
    const count = typeof arity === 'number' ? arity : 0;
    return Array.from({ length: count }, (_, index) => `arg${index}`);
  }

  if (/^class\b/.test(source)) {
    return [];
  }

  const arrow = SINGLE_PARAMETER_ARROW.exec(source);
  if (arrow) {
    return [arrow[1]];
  }

  const open = source.indexOf('(');
  if (open === -1) {
    return [];
  }

  const list = parameterList(source, open);
  return splitTopLevel(list)
    .map(parameter => stripDefault(parameter).trim())
    .filter(parameter => parameter !== '');
}

// Text between the parenthesis at `open` and its partner
function parameterList(source: string, open: number): string {
  let depth = 0;
  let quote = '';
  for (let i = open; i < source.length; i++) {
    const ch = source[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = '';
      continue;
    }
    if (ch === '"' || ch === "'" || ch === '`') {
      quote = ch;
    } else if (ch === '(' || ch === '[' || ch === '{') {
      depth++;
    } else if (ch === ')' || ch === ']' || ch === '}') {
      depth--;
      if (depth === 0) {
        return source.slice(open + 1, i);
      }
    }
  }
  return source.slice(open + 1);
}

function splitTopLevel(list: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < list.length; i++) {
    const ch = list[i];
    if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') depth--;
    else if (ch === ',' && depth === 0) {
      parts.push(list.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(list.slice(start));
  return parts;
}

function stripDefault(parameter: string): string {
  let depth = 0;
  for (let i = 0; i < parameter.length; i++) {
    const ch = parameter[i];
    if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') depth--;
    else if (ch === '=' && depth === 0) return parameter.slice(0, i);
  }
  return parameter;
}
