/**
 * Syntax tree for rule programs.
 *
 * Every node remembers where it came from so evaluation errors can point
 * at the offending form.
 */

export interface Position {
  readonly file: string;
  readonly line: number;
  readonly column: number;
}

export type Node =
  | { readonly type: 'int'; readonly value: number; readonly pos: Position }
  | { readonly type: 'float'; readonly value: number; readonly pos: Position }
  | { readonly type: 'string'; readonly value: string; readonly pos: Position }
  | { readonly type: 'symbol'; readonly name: string; readonly pos: Position }
  | { readonly type: 'list'; readonly items: readonly Node[]; readonly pos: Position };

/** A parsed source file: its top-level forms, evaluated in order. */
export interface Program {
  readonly type: 'program';
  readonly file: string;
  readonly body: readonly Node[];
}

export function formatPosition(pos: Position): string {
  return `${pos.file}:${pos.line}:${pos.column}`;
}
