import { isClass, readClassName, readFieldDeclarations } from '../loader/session';
import type { ClassLike, SymbolTable } from '../types';

export type FieldDescriptor =
  | { state: 'resolved'; type: ClassLike }
  | { state: 'forward'; name: string }
  | { state: 'invalid'; declared: unknown };

export type OptionSchemaEntry = {
  field: string;
  descriptor: FieldDescriptor;
};

export type OptionSchema = OptionSchemaEntry[];

export type ResolvedOptionField =
  | { field: string; typeName: string; type: ClassLike }
  | { field: string; typeName: string; type: null; reason: string };

/**
 * First pass: records the declared fields verbatim, forward-reference
 * names included. Returns `null` when the class declares no `fields`.
 */
export function collectOptionSchema(optionsCls: ClassLike): OptionSchema | null {
  const fields = readFieldDeclarations(optionsCls);
  if (!fields) {
    return null;
  }
  return Object.entries(fields).map(([field, declared]): OptionSchemaEntry => {
    if (typeof declared === 'string') {
      return { field, descriptor: { state: 'forward', name: declared } };
    }
    if (isClass(declared)) {
      return { field, descriptor: { state: 'resolved', type: declared } };
    }
    return { field, descriptor: { state: 'invalid', declared } };
  });
}

/**
 * Second pass: resolves every forward name against the symbol table of the
 * load that produced the schema, and nothing else.
 */
export function resolveOptionSchema(schema: OptionSchema, symbols: SymbolTable): ResolvedOptionField[] {
  return schema.map(({ field, descriptor }): ResolvedOptionField => {
    switch (descriptor.state) {
      case 'resolved':
        return { field, typeName: readClassName(descriptor.type, field), type: descriptor.type };
      case 'forward': {
        const candidate = symbols.get(descriptor.name);
        if (isClass(candidate)) {
          return { field, typeName: readClassName(candidate, descriptor.name), type: candidate };
        }
        const reason =
          candidate === undefined
            ? `'${descriptor.name}' is not defined in the plugin module`
            : `'${descriptor.name}' is not a class`;
        return { field, typeName: descriptor.name, type: null, reason };
      }
      case 'invalid':
        return {
          field,
          typeName: field,
          type: null,
          reason: `field type must be a class or a class name, got ${typeof descriptor.declared}`
        };
    }
  });
}
