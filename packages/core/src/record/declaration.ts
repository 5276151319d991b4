import type { FieldTypeTag } from '../fields/field-kinds';
import type { FieldDeclaration, FieldSlot, TypeParameter } from './record-type';

const TS_TYPE_BY_TAG: Record<FieldTypeTag, string> = {
  integer: 'number',
  'list-of-integer': 'number[]',
  timestamp: 'string',
};

export function renderSlot(slot: FieldSlot): string {
  return slot.kind === 'parameter' ? slot.name : TS_TYPE_BY_TAG[slot.tag];
}

function renderParameters(parameters: readonly TypeParameter[]): string {
  return parameters.length > 0
    ? `<${parameters.map((p) => p.name).join(', ')}>`
    : '';
}

/**
 * Render a record type as an interface declaration, e.g.
 * `interface HypRecord<T2> { a: number; b?: T2 }`.
 */
export function renderDeclaration(view: {
  name: string;
  parameters: readonly TypeParameter[];
  ownFields: readonly FieldDeclaration[];
  base?: { name: string; parameters: readonly TypeParameter[] };
}): string {
  const head =
    `interface ${view.name}${renderParameters(view.parameters)}` +
    (view.base
      ? ` extends ${view.base.name}${renderParameters(view.base.parameters)}`
      : '');
  if (view.ownFields.length === 0) {
    return `${head} {}`;
  }
  const members = view.ownFields.map(
    (field) =>
      `${field.name}${field.required ? '' : '?'}: ${renderSlot(field.slot)}`
  );
  return `${head} { ${members.join('; ')} }`;
}
