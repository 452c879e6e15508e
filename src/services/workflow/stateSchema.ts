import { GraphDefinitionError } from './errors';
import { Reducer } from './reducers';

export type UpdatePolicy = 'overwrite' | 'reduce';

export type ReducerMap<S> = { [K in keyof S]?: Reducer<S[K]> };

/**
 * Declares the fields of a workflow state. The keys returned by `defaults`
 * are the declared fields; fields listed in `reducers` are merged, every
 * other field is overwritten.
 */
export interface StateDefinition<S extends object> {
  defaults: () => S;
  reducers: ReducerMap<S>;
}

export function defineState<S extends object>(
  defaults: () => S,
  reducers: ReducerMap<S> = {},
): StateDefinition<S> {
  const fields = new Set(Object.keys(defaults()));
  for (const field of Object.keys(reducers)) {
    if (!fields.has(field)) {
      throw new GraphDefinitionError(`Reducer declared for field "${field}" that has no default`, {
        field,
      });
    }
  }
  return { defaults, reducers };
}

export function fieldNames<S extends object>(definition: StateDefinition<S>): string[] {
  return Object.keys(definition.defaults());
}

export function policyOf<S extends object>(
  definition: StateDefinition<S>,
  field: keyof S,
): UpdatePolicy {
  return definition.reducers[field] ? 'reduce' : 'overwrite';
}
