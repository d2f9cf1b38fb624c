/**
 * Node kinds and field names of the NESFab grammar that the index relies on
 */

export const NodeKind = {
  FUNCTION_DEFINITION: 'function_definition',
  ASM_FUNCTION_DEFINITION: 'asm_function_definition',
  VARIABLE_DEFINITION: 'variable_definition',
  VARS_BLOCK: 'vars',
  COMMENT: 'comment',
  IDENTIFIER: 'identifier',
  CALL: 'call',
} as const;

export const FieldName = {
  SIGNATURE: 'signature',
  NAME: 'name',
} as const;

const FUNCTION_DEFINITION_KINDS: ReadonlySet<string> = new Set([
  NodeKind.FUNCTION_DEFINITION,
  NodeKind.ASM_FUNCTION_DEFINITION,
]);

export function isFunctionDefinition(kind: string | null): boolean {
  return kind !== null && FUNCTION_DEFINITION_KINDS.has(kind);
}
