/**
 * Output-name transforms
 *
 * Output names are dotted module names (`Acme.Tutorial.Point`). Everything
 * that turns one into something else (a file path, an import specifier, an
 * identifier) lives here so the transforms stay consistent.
 */

import path from 'node:path';

/** `foo_bar` → `FooBar`; existing capitals are kept (`FOO` → `FOO`) */
export function camelize(name: string): string {
  return name
    .split('_')
    .filter((part) => part.length > 0)
    .map((part) => upperFirst(part))
    .join('');
}

/** `FooBar` → `foo_bar`, `HTTPServer` → `http_server` */
export function underscore(name: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .toLowerCase();
}

export function upperFirst(name: string): string {
  return name.length === 0 ? name : name.charAt(0).toUpperCase() + name.slice(1);
}

/** First character upper-cased, the rest lower-cased: `userId` → `Userid` */
export function capitalize(name: string): string {
  return name.length === 0
    ? name
    : name.charAt(0).toUpperCase() + name.slice(1).toLowerCase();
}

export function qualify(namespace: string | undefined, name: string): string {
  return namespace ? `${namespace}.${name}` : name;
}

/** Last dotted segment: the exported identifier of a data module */
export function localName(outputName: string): string {
  const segments = outputName.split('.');
  return segments[segments.length - 1] ?? outputName;
}

export function testDataModuleName(outputName: string, suffix: string): string {
  return `${outputName}.${suffix}`;
}

/**
 * Relative file path a module is written to:
 * `Acme.Tutorial.Point` → `acme/tutorial/point.ts`
 */
export function targetPath(outputName: string): string {
  return `${outputName.split('.').map(underscore).join('/')}.ts`;
}

/** Identifier a module is imported under: `Acme.Point` → `$Acme_Point` */
export function importAlias(outputName: string): string {
  return `$${outputName.replace(/\./g, '_')}`;
}

export interface ModuleLocation {
  /** Output stream root directory */
  root: string;
  name: string;
}

/**
 * ESM specifier (with `.js` suffix) that `from` uses to import `to`
 */
export function importSpecifier(from: ModuleLocation, to: ModuleLocation): string {
  const fromFile = path.posix.join(from.root, targetPath(from.name));
  const toFile = path.posix.join(to.root, targetPath(to.name)).replace(/\.ts$/, '.js');
  const relative = path.posix.relative(path.posix.dirname(fromFile), toFile);
  return relative.startsWith('.') ? relative : `./${relative}`;
}
