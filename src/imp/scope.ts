import { type ImpType, type Shape } from './types.js';

export interface VariableBinding {
  name: string;
  type: ImpType;
  shape: Shape;
  depth: number;
}

export interface FunctionParam {
  type: ImpType;
  name: string;
}

export interface FunctionSignature {
  name: string;
  params: FunctionParam[];
  returnType: ImpType;
  defined: boolean;
}

export type DeclareResult = 'ok' | 'already-declared';

/**
 * What the AST layer needs from a symbol store. Scope nesting is driven by the
 * caller; constructors only declare and look up.
 */
export interface SymbolScope {
  declare(name: string, type: ImpType, shape?: Shape): DeclareResult;
  lookup(name: string): VariableBinding | undefined;
  declareFunction(name: string, params: FunctionParam[], returnType: ImpType): DeclareResult;
  lookupFunction(name: string): FunctionSignature | undefined;
  markDefined(name: string): void;
}

/**
 * Lexically nested variable store with a single function namespace.
 * Inner scopes may shadow outer bindings; redeclaring inside the same scope is refused.
 */
export class ScopeStack implements SymbolScope {
  private scopes: Array<Map<string, VariableBinding>> = [new Map()];
  private functions = new Map<string, FunctionSignature>();

  get depth(): number {
    return this.scopes.length - 1;
  }

  enterScope(): void {
    this.scopes.push(new Map());
  }

  exitScope(): void {
    if (this.scopes.length === 1) {
      throw new Error('Cannot exit the global scope');
    }
    this.scopes.pop();
  }

  declare(name: string, type: ImpType, shape: Shape = 'scalar'): DeclareResult {
    const current = this.scopes[this.scopes.length - 1];
    if (current.has(name)) return 'already-declared';
    current.set(name, { name, type, shape, depth: this.depth });
    return 'ok';
  }

  lookup(name: string): VariableBinding | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const binding = this.scopes[i].get(name);
      if (binding) return binding;
    }
    return undefined;
  }

  declareFunction(name: string, params: FunctionParam[], returnType: ImpType): DeclareResult {
    if (this.functions.has(name)) return 'already-declared';
    this.functions.set(name, { name, params: [...params], returnType, defined: false });
    return 'ok';
  }

  lookupFunction(name: string): FunctionSignature | undefined {
    return this.functions.get(name);
  }

  markDefined(name: string): void {
    const signature = this.functions.get(name);
    if (signature) signature.defined = true;
  }

  getFunctions(): FunctionSignature[] {
    return Array.from(this.functions.values());
  }
}
