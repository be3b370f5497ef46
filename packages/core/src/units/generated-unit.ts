/**
 * Generated units
 *
 * One unit is the emitted code of one entity (or of all constants of a
 * schema): ordered top-level declarations plus the imports they need. The
 * `kind` tag exists for collision resolution only; it is not rendered.
 */

export type TypeGeneratorKind =
  | 'struct'
  | 'union'
  | 'exception'
  | 'enum'
  | 'service'
  | 'behaviour'
  | 'testData';

export type GeneratorKind = TypeGeneratorKind | 'constant';

export type ImportDecl =
  | { readonly style: 'namespace'; readonly alias: string; readonly from: string }
  | { readonly style: 'default'; readonly alias: string; readonly from: string }
  | { readonly style: 'named'; readonly names: readonly string[]; readonly from: string };

/** One top-level block of emitted source */
export interface UnitDeclaration {
  /** Identifier the block declares, used for diagnostics and tests */
  readonly name: string;
  readonly source: string;
  /** Declares a type only; a value of the same name may sit beside it */
  readonly typeOnly?: boolean;
}

interface UnitBase {
  readonly imports: readonly ImportDecl[];
  readonly body: readonly UnitDeclaration[];
  /** Module header comment */
  readonly doc?: string;
}

export interface TypeUnit extends UnitBase {
  readonly kind: 'type';
  readonly generator: TypeGeneratorKind;
}

export interface ConstantUnit extends UnitBase {
  readonly kind: 'constant';
  readonly generator: 'constant';
}

export type GeneratedUnit = TypeUnit | ConstantUnit;

export interface NamedUnit {
  readonly name: string;
  readonly unit: GeneratedUnit;
}

export function typeUnit(
  generator: TypeGeneratorKind,
  imports: readonly ImportDecl[],
  body: readonly UnitDeclaration[],
  doc?: string
): TypeUnit {
  return Object.freeze({
    kind: 'type',
    generator,
    imports: Object.freeze([...imports]),
    body: Object.freeze([...body]),
    doc,
  });
}

export function constantUnit(
  imports: readonly ImportDecl[],
  body: readonly UnitDeclaration[],
  doc?: string
): ConstantUnit {
  return Object.freeze({
    kind: 'constant',
    generator: 'constant',
    imports: Object.freeze([...imports]),
    body: Object.freeze([...body]),
    doc,
  });
}

export function importKey(decl: ImportDecl): string {
  switch (decl.style) {
    case 'namespace':
    case 'default':
      return `${decl.style}:${decl.alias}:${decl.from}`;
    case 'named':
      return `named:${decl.names.join(',')}:${decl.from}`;
  }
}

/** Union of import lists, first occurrence wins, order kept */
export function mergeImports(
  ...lists: readonly (readonly ImportDecl[])[]
): ImportDecl[] {
  const seen = new Set<string>();
  const merged: ImportDecl[] = [];
  for (const list of lists) {
    for (const decl of list) {
      const key = importKey(decl);
      if (!seen.has(key)) {
        seen.add(key);
        merged.push(decl);
      }
    }
  }
  return merged;
}
