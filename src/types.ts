// Subset of the Language Server Protocol used to talk to rust-analyzer, plus the
// bridge's own result model.

export interface Position {
  line: number;
  character: number;
}

export interface Range {
  start: Position;
  end: Position;
}

export interface Location {
  uri: string;
  range: Range;
}

export interface LocationLink {
  originSelectionRange?: Range;
  targetUri: string;
  targetRange: Range;
  targetSelectionRange: Range;
}

export interface LSPError {
  code: number;
  message: string;
  data?: unknown;
}

export interface LSPMessage {
  jsonrpc: '2.0';
  id?: number | string | null;
  method?: string;
  params?: unknown;
  result?: unknown;
  error?: LSPError;
}

export type PositionEncoding = 'utf-8' | 'utf-16' | 'utf-32';

export enum SymbolKind {
  File = 1,
  Module = 2,
  Namespace = 3,
  Package = 4,
  Class = 5,
  Method = 6,
  Property = 7,
  Field = 8,
  Constructor = 9,
  Enum = 10,
  Interface = 11,
  Function = 12,
  Variable = 13,
  Constant = 14,
  String = 15,
  Number = 16,
  Boolean = 17,
  Array = 18,
  Object = 19,
  Key = 20,
  Null = 21,
  EnumMember = 22,
  Struct = 23,
  Event = 24,
  Operator = 25,
  TypeParameter = 26,
}

export interface DocumentSymbol {
  name: string;
  detail?: string;
  kind: SymbolKind;
  range: Range;
  selectionRange: Range;
  children?: DocumentSymbol[];
}

export interface SymbolInformation {
  name: string;
  kind: SymbolKind;
  location: Location;
  containerName?: string | null;
}

export interface WorkspaceSymbol {
  name: string;
  kind: SymbolKind;
  location: Location | { uri: string };
  containerName?: string | null;
}

export interface MarkupContent {
  kind: 'plaintext' | 'markdown';
  value: string;
}

export type MarkedString = string | { language: string; value: string };

export interface Hover {
  contents: MarkupContent | MarkedString | MarkedString[];
  range?: Range;
}

export interface TextEdit {
  range: Range;
  newText: string;
}

export interface TextDocumentEdit {
  textDocument: { uri: string; version?: number | null };
  edits: TextEdit[];
}

export interface WorkspaceEdit {
  changes?: Record<string, TextEdit[]>;
  documentChanges?: Array<TextDocumentEdit | { kind: string }>;
}

export interface CodeAction {
  title: string;
  kind?: string;
  edit?: WorkspaceEdit;
  data?: unknown;
  isPreferred?: boolean;
  disabled?: { reason: string };
}

export interface TypeHierarchyItem {
  name: string;
  kind: SymbolKind;
  detail?: string;
  uri: string;
  range: Range;
  selectionRange: Range;
  data?: unknown;
}

export interface LSPDiagnostic {
  range: Range;
  severity?: 1 | 2 | 3 | 4;
  code?: number | string;
  source?: string;
  message: string;
  relatedInformation?: Array<{ location: Location; message: string }>;
}

export type DocumentDiagnosticReport =
  | { kind: 'full'; resultId?: string; items: LSPDiagnostic[] }
  | { kind: 'unchanged'; resultId: string };

// ---------------------------------------------------------------------------
// Bridge result model
// ---------------------------------------------------------------------------

export type Severity = 'error' | 'warning' | 'info' | 'hint';

export interface FileLocation {
  file: string;
  range: Range;
}

export interface RelatedLocation extends FileLocation {
  message: string;
}

/** Diagnostic shape shared by live analyzer results and cargo output. */
export interface Diagnostic {
  severity: Severity;
  message: string;
  file: string;
  range: Range;
  code?: string;
  source?: string;
  related: RelatedLocation[];
}

export type Locator =
  | { kind: 'exact'; filePath: string; line: number; character: number }
  | { kind: 'fuzzy'; filePath: string; codeBlock: string; symbol: string; occurrence: number };

export interface Coordinate {
  filePath: string;
  position: Position;
}

export type OutputMode = 'text' | 'json';

export interface ToolFailure {
  kind: string;
  message: string;
  partial?: unknown;
}

export type ToolResult<T = unknown> =
  | { ok: true; tool: string; data: T; warnings: string[] }
  | { ok: false; tool: string; error: ToolFailure };
