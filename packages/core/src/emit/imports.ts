/**
 * Per-unit import bookkeeping. Emitters ask for a reference to an exported
 * name of another module and get back the qualified expression; the
 * collector remembers which modules that pulled in.
 */

import type { ImportDecl } from '../units/generated-unit.js';
import { type ModuleLocation, importAlias, importSpecifier } from '../naming/names.js';

export class ImportCollector {
  readonly #libraries = new Map<string, ImportDecl>();
  readonly #modules = new Map<string, ImportDecl>();

  constructor(readonly self: ModuleLocation) {}

  /** `import alias from 'specifier'` */
  library(alias: string, specifier: string): string {
    this.#libraries.set(`default:${alias}`, { style: 'default', alias, from: specifier });
    return alias;
  }

  /** `import * as alias from 'specifier'` */
  libraryNamespace(alias: string, specifier: string): string {
    this.#libraries.set(`namespace:${alias}`, { style: 'namespace', alias, from: specifier });
    return alias;
  }

  /**
   * Expression naming `exported` in the module at `target`. Names in the
   * unit's own module are left unqualified.
   */
  ref(target: ModuleLocation, exported: string): string {
    if (target.name === this.self.name && target.root === this.self.root) {
      return exported;
    }
    const from = importSpecifier(this.self, target);
    const alias = importAlias(target.name);
    if (!this.#modules.has(from)) {
      this.#modules.set(from, { style: 'namespace', alias, from });
    }
    return `${alias}.${exported}`;
  }

  /** Libraries first, then generated modules, each in first-use order */
  list(): ImportDecl[] {
    return [...this.#libraries.values(), ...this.#modules.values()];
  }
}
