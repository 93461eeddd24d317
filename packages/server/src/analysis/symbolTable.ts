import {
  comparePositions,
  compareRanges,
  containsPosition,
  type Position,
  type Range,
} from "../range";

export type DestructureSource =
  | { type: "EnvObject"; object: string }
  | { type: "Binding"; name: string };

export type BindingKind =
  | { type: "DirectEnvAccess"; name: string }
  | { type: "ObjectAlias"; object: string }
  | { type: "Destructured"; key: string; source: DestructureSource }
  | { type: "Reassignment"; target: string }
  /** Bound to something unrelated to the environment; still shadows. */
  | { type: "Opaque" };

export interface Binding {
  id: number;
  name: string;
  nameRange: Range;
  /** Key inside a destructuring pattern, when it differs from the name. */
  keyRange?: Range;
  kind: BindingKind;
  scope: number;
  /** Earlier binding of the same name in the same scope. */
  shadows?: number;
}

export interface Scope {
  id: number;
  type: string;
  range: Range;
  parent?: number;
  /** Latest binding per name. */
  bindings: Map<string, number>;
}

/**
 * Scopes and bindings of one document, stored in arenas indexed by id.
 * Parents are referenced by id and only used for lookup.
 */
export class SymbolTable {
  readonly scopes: Scope[] = [];
  readonly bindings: Binding[] = [];

  constructor(rootType: string, rootRange: Range) {
    this.scopes.push({ id: 0, type: rootType, range: rootRange, bindings: new Map() });
  }

  /**
   * Add a nested scope. Enclosing scopes must be added first; the parent is
   * the smallest existing scope containing the new one.
   */
  addScope(type: string, range: Range): number {
    let parent = 0;
    for (const scope of this.scopes) {
      if (
        comparePositions(scope.range.start, range.start) <= 0 &&
        comparePositions(range.end, scope.range.end) <= 0 &&
        compareRanges(scope.range, this.scopes[parent].range) <= 0
      ) {
        parent = scope.id;
      }
    }
    const id = this.scopes.length;
    this.scopes.push({ id, type, range, parent, bindings: new Map() });
    return id;
  }

  /** Innermost scope containing the position; the root when none does. */
  scopeAt(pos: Position): Scope {
    let best = this.scopes[0];
    for (const scope of this.scopes) {
      if (
        containsPosition(scope.range, pos) &&
        compareRanges(scope.range, best.range) <= 0
      ) {
        best = scope;
      }
    }
    return best;
  }

  /**
   * Declare a binding in the scope enclosing its name. Declarations must
   * arrive in document order.
   */
  declare(
    name: string,
    nameRange: Range,
    kind: BindingKind,
    keyRange?: Range,
  ): Binding {
    const scope = this.scopeAt(nameRange.start);
    const binding: Binding = {
      id: this.bindings.length,
      name,
      nameRange,
      keyRange,
      kind,
      scope: scope.id,
      shadows: scope.bindings.get(name),
    };
    this.bindings.push(binding);
    scope.bindings.set(name, binding.id);
    return binding;
  }

  get(id: number): Binding | undefined {
    return this.bindings[id];
  }

  /**
   * Lexical lookup: innermost scope first, then ancestors. Within a scope
   * the latest binding declared before `pos` wins.
   */
  lookup(name: string, pos: Position): Binding | undefined {
    let scope: Scope | undefined = this.scopeAt(pos);
    while (scope) {
      let id = scope.bindings.get(name);
      while (id !== undefined) {
        const binding: Binding = this.bindings[id];
        if (comparePositions(binding.nameRange.start, pos) < 0) {
          return binding;
        }
        id = binding.shadows;
      }
      scope = scope.parent === undefined ? undefined : this.scopes[scope.parent];
    }
    return undefined;
  }

  /** Binding whose declared name or destructured key contains the position. */
  bindingAt(pos: Position): Binding | undefined {
    for (const binding of this.bindings) {
      if (
        containsPosition(binding.nameRange, pos) ||
        (binding.keyRange && containsPosition(binding.keyRange, pos))
      ) {
        return binding;
      }
    }
    return undefined;
  }
}
