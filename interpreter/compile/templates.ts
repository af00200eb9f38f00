import { RESULT_SLOT } from '@core/types/session';

/** Members of a namespace bound as globals by `using` */
export interface NamespaceBinding {
  namespace: string;
  members: readonly string[];
}

/** A module loaded with `/r`, bound under `alias` */
export interface ReferenceBinding {
  specifier: string;
  alias: string;
}

export interface UsesSection {
  namespaces: readonly NamespaceBinding[];
  references: readonly ReferenceBinding[];
}

export const EMPTY_USES: UsesSection = { namespaces: [], references: [] };

export function frameAsResult(body: string): string {
  return `V[${JSON.stringify(RESULT_SLOT)}] = ${body}`;
}

export function renderUses(uses: UsesSection): string {
  const lines: string[] = [];
  for (const binding of uses.namespaces) {
    lines.push(`// using ${binding.namespace}`);
    for (const member of binding.members) {
      lines.push(`declare var ${member}: any;`);
    }
  }
  for (const reference of uses.references) {
    lines.push(`// reference ${reference.specifier}`);
    lines.push(`declare var ${reference.alias}: any;`);
  }
  return lines.length > 0 ? lines.join('\n') + '\n' : '';
}

/**
 * Script whose completion value is a function running the fragment body.
 */
export function renderFragmentSource(uses: UsesSection, body: string): string {
  return `${renderUses(uses)}(function () {\n${body}\n});\n`;
}

/**
 * Script declaring the class that holds a function fragment as a method.
 */
export function renderUnitSource(uses: UsesSection, className: string, method: string): string {
  return `${renderUses(uses)}class ${className} {\n  public ${method}\n}\n`;
}
