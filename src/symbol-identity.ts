import { uriToPath } from './utils.js';
import { type DocumentSymbol, type Position, type Range, type SymbolInformation, SymbolKind, type WorkspaceSymbol } from './types.js';

// rust-analyzer reports traits as Interface and impl blocks as Object.
const KIND_NAMES: Record<SymbolKind, string> = {
  [SymbolKind.File]: 'file',
  [SymbolKind.Module]: 'module',
  [SymbolKind.Namespace]: 'namespace',
  [SymbolKind.Package]: 'package',
  [SymbolKind.Class]: 'class',
  [SymbolKind.Method]: 'method',
  [SymbolKind.Property]: 'property',
  [SymbolKind.Field]: 'field',
  [SymbolKind.Constructor]: 'constructor',
  [SymbolKind.Enum]: 'enum',
  [SymbolKind.Interface]: 'trait',
  [SymbolKind.Function]: 'function',
  [SymbolKind.Variable]: 'variable',
  [SymbolKind.Constant]: 'constant',
  [SymbolKind.String]: 'string',
  [SymbolKind.Number]: 'number',
  [SymbolKind.Boolean]: 'boolean',
  [SymbolKind.Array]: 'array',
  [SymbolKind.Object]: 'impl',
  [SymbolKind.Key]: 'key',
  [SymbolKind.Null]: 'null',
  [SymbolKind.EnumMember]: 'enum_member',
  [SymbolKind.Struct]: 'struct',
  [SymbolKind.Event]: 'event',
  [SymbolKind.Operator]: 'operator',
  [SymbolKind.TypeParameter]: 'type_parameter',
};

export function symbolKindToString(kind: SymbolKind): string {
  return KIND_NAMES[kind] ?? 'unknown';
}

export type ItemKind = 'free_function' | 'method' | 'trait' | 'impl' | 'unknown';

export interface SymbolPathSegment {
  name: string;
  kind: SymbolKind;
}

/** Where a symbol lives: `crate::module::path::item`. */
export interface SymbolIdentity {
  crateName: string;
  modulePath: string[];
  itemName: string;
  kind: ItemKind;
}

export interface OutlineEntry {
  name: string;
  kind: string;
  detail?: string;
  depth: number;
  container?: string;
  range: Range;
  selectionRange: Range;
}

function isImplName(name: string | null | undefined): boolean {
  return name?.trimStart().startsWith('impl ') ?? false;
}

function itemKind(kind: SymbolKind, containerHint: string | null | undefined): ItemKind {
  switch (kind) {
    case SymbolKind.Method:
      return 'method';
    case SymbolKind.Interface:
      return 'trait';
    case SymbolKind.Object:
      return 'impl';
    case SymbolKind.Function:
      return isImplName(containerHint) ? 'impl' : 'free_function';
    default:
      return isImplName(containerHint) ? 'impl' : 'unknown';
  }
}

function pathSegments(filePath: string): string[] {
  return filePath.split(/[\\/]+/).filter((segment) => segment.length > 0);
}

/** The directory above `src/`, which is the package directory in a Cargo layout. */
export function crateNameFromUri(uri: string): string | undefined {
  const segments = pathSegments(uriToPath(uri));
  const srcIndex = segments.lastIndexOf('src');
  if (srcIndex >= 1) return segments[srcIndex - 1];
  return segments.at(-2);
}

/** Module path implied by the file's location under `src/`; `mod.rs` adds nothing. */
export function modulePathFromUri(uri: string): string[] {
  const segments = pathSegments(uriToPath(uri));
  const srcIndex = segments.lastIndexOf('src');
  if (srcIndex === -1) return [];
  const modules = segments.slice(srcIndex + 1);
  const last = modules.pop();
  if (last) {
    const stem = last.replace(/\.rs$/, '');
    if (stem !== 'mod' && stem !== 'lib' && stem !== 'main') modules.push(stem);
  }
  return modules;
}

function containerSegments(container: string): string[] {
  return container
    .trim()
    .replace(/^impl\s+/, '')
    .replace(/^::/, '')
    .split('::')
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
}

/**
 * Identity for a `workspace/symbol` hit. rust-analyzer's `containerName`
 * carries the crate and module path when it has one; otherwise both come from
 * the file location.
 */
export function identityFromWorkspaceSymbol(symbol: SymbolInformation | WorkspaceSymbol): SymbolIdentity {
  const uri = symbol.location.uri;
  const container = symbol.containerName ?? undefined;
  const segments = container ? containerSegments(container) : [];
  const [crateSegment, ...moduleSegments] = segments;

  return {
    crateName: crateSegment ?? crateNameFromUri(uri) ?? 'unknown',
    modulePath: moduleSegments.length > 0 ? moduleSegments : modulePathFromUri(uri),
    itemName: symbol.name,
    kind: itemKind(symbol.kind, container),
  };
}

/** `impl Display for Config` and `impl Config` both live under `Config`. */
function pathName(segment: SymbolPathSegment): string {
  const match = /^impl(?:<[^>]*>)?\s+(?:.+\s+for\s+)?(.+)$/.exec(segment.name.trim());
  return match?.[1] ?? segment.name;
}

export function identityFromDefinition(uri: string, symbolPath: SymbolPathSegment[]): SymbolIdentity | undefined {
  const item = symbolPath.at(-1);
  if (!item) return undefined;
  const parent = symbolPath.at(-2);
  return {
    crateName: crateNameFromUri(uri) ?? 'unknown',
    modulePath: [...modulePathFromUri(uri), ...symbolPath.slice(0, -1).map(pathName)],
    itemName: item.name,
    kind: itemKind(item.kind, parent?.name),
  };
}

export function formatIdentity(identity: SymbolIdentity): string {
  return [identity.crateName, ...identity.modulePath, identity.itemName].join('::');
}

export function positionInRange(range: Range, position: Position): boolean {
  const startsBefore =
    range.start.line < position.line ||
    (range.start.line === position.line && range.start.character <= position.character);
  const endsAfter =
    range.end.line > position.line ||
    (range.end.line === position.line && range.end.character >= position.character);
  return startsBefore && endsAfter;
}

/** Names from the outermost symbol down to the one whose name is at `position`. */
export function symbolPathAt(symbols: DocumentSymbol[], position: Position): SymbolPathSegment[] {
  for (const symbol of symbols) {
    if (positionInRange(symbol.range, position)) {
      const inner = symbolPathAt(symbol.children ?? [], position);
      if (inner.length > 0 || positionInRange(symbol.selectionRange, position)) {
        return [{ name: symbol.name, kind: symbol.kind }, ...inner];
      }
    }
  }
  return [];
}

/** Innermost symbol whose full range covers `position`. */
export function innermostSymbolAt(symbols: DocumentSymbol[], position: Position): DocumentSymbol | undefined {
  for (const symbol of symbols) {
    if (positionInRange(symbol.range, position)) {
      return innermostSymbolAt(symbol.children ?? [], position) ?? symbol;
    }
  }
  return undefined;
}

/** The sibling list that holds the symbol named at `position`, plus that symbol. */
export function scopeOf(
  symbols: DocumentSymbol[],
  position: Position
): { siblings: DocumentSymbol[]; symbol: DocumentSymbol } | undefined {
  for (const symbol of symbols) {
    if (positionInRange(symbol.selectionRange, position)) return { siblings: symbols, symbol };
    if (positionInRange(symbol.range, position)) {
      const inner = scopeOf(symbol.children ?? [], position);
      if (inner) return inner;
    }
  }
  return undefined;
}

export function flattenOutline(symbols: DocumentSymbol[], depth = 0, container?: string): OutlineEntry[] {
  const entries: OutlineEntry[] = [];
  for (const symbol of symbols) {
    entries.push({
      name: symbol.name,
      kind: symbolKindToString(symbol.kind),
      detail: symbol.detail,
      depth,
      container,
      range: symbol.range,
      selectionRange: symbol.selectionRange,
    });
    entries.push(...flattenOutline(symbol.children ?? [], depth + 1, symbol.name));
  }
  return entries;
}
