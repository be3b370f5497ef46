import type { GeneratedUnit, ImportDecl, NamedUnit } from './generated-unit.js';

export const GENERATED_HEADER = '// Code generated by idlgen. DO NOT EDIT.';

export function renderImport(decl: ImportDecl): string {
  switch (decl.style) {
    case 'namespace':
      return `import * as ${decl.alias} from '${decl.from}';`;
    case 'default':
      return `import ${decl.alias} from '${decl.from}';`;
    case 'named':
      return `import { ${decl.names.join(', ')} } from '${decl.from}';`;
  }
}

/** Source text of one module: header, imports, then declarations in order */
export function renderUnit(unit: GeneratedUnit): string {
  const header = unit.doc ? `${GENERATED_HEADER}\n// ${unit.doc}` : GENERATED_HEADER;
  const sections = [header];
  if (unit.imports.length > 0) {
    sections.push(unit.imports.map(renderImport).join('\n'));
  }
  for (const declaration of unit.body) {
    sections.push(declaration.source);
  }
  return `${sections.join('\n\n')}\n`;
}

/** Every module of a stream in one string, each under a `// <name>` banner */
export function renderModules(modules: readonly NamedUnit[]): string {
  return modules
    .map(({ name, unit }) => `// ---- ${name} ----\n${renderUnit(unit)}`)
    .join('\n');
}
