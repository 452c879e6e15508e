import { UnknownFieldError } from './errors';
import { StateDefinition, UpdatePolicy, policyOf } from './stateSchema';
import { DeepReadonly, StateView } from './types';

const frozenTrees = new WeakSet<object>();

/** Freeze a value and everything reachable from it, in place. */
function freezeTree(value: unknown): void {
  if (typeof value !== 'object' || value === null || frozenTrees.has(value)) return;
  frozenTrees.add(value);
  for (const child of Object.values(value)) {
    freezeTree(child);
  }
  Object.freeze(value);
}

function deepFrozen<T>(value: T): DeepReadonly<T>;
function deepFrozen(value: unknown): unknown {
  freezeTree(value);
  return value;
}

/**
 * Holds one run's state. Each apply replaces the record with a new object
 * and freezes it together with every array and record stored in it, so
 * snapshots handed to nodes never change underneath them. Values written
 * into the container are frozen in place.
 */
export class StateContainer<S extends object> {
  private readonly definition: StateDefinition<S>;
  private readonly fields: ReadonlySet<string>;
  private values: S;

  constructor(definition: StateDefinition<S>, initial: Partial<S> = {}) {
    this.definition = definition;
    const defaults = definition.defaults();
    this.fields = new Set(Object.keys(defaults));
    this.assertDeclared(initial, 'initial state');

    const seeded: S = { ...defaults };
    for (const key of Object.keys(initial)) {
      if (this.isField(key)) {
        this.seedField(seeded, key, initial[key]);
      }
    }
    freezeTree(seeded);
    this.values = seeded;
  }

  get<K extends keyof S>(field: K): S[K] {
    return this.values[field];
  }

  has(field: string): boolean {
    return this.fields.has(field);
  }

  policy(field: keyof S): UpdatePolicy {
    return policyOf(this.definition, field);
  }

  snapshot(): Readonly<S> {
    return this.values;
  }

  /** The same record as `snapshot`, typed as deeply readonly. */
  view(): StateView<S> {
    return deepFrozen<S>(this.values);
  }

  /**
   * Merge a partial update. Unknown keys are rejected before anything is
   * written; undefined values are ignored.
   */
  apply(update: Partial<S>, source?: string): this {
    this.assertDeclared(update, source);

    const next: S = { ...this.values };
    for (const key of Object.keys(update)) {
      if (this.isField(key)) {
        this.mergeField(next, key, update[key]);
      }
    }
    freezeTree(next);
    this.values = next;
    return this;
  }

  private assertDeclared(update: object, source?: string): void {
    for (const key of Object.keys(update)) {
      if (!this.fields.has(key)) {
        throw new UnknownFieldError(key, source);
      }
    }
  }

  private isField(key: string): key is Extract<keyof S, string> {
    return this.fields.has(key);
  }

  private seedField<K extends keyof S>(target: S, key: K, value: S[K] | undefined): void {
    if (value !== undefined) {
      target[key] = value;
    }
  }

  private mergeField<K extends keyof S>(target: S, key: K, incoming: S[K] | undefined): void {
    if (incoming === undefined) return;
    const reducer = this.definition.reducers[key];
    target[key] = reducer ? reducer(target[key], incoming) : incoming;
  }
}
