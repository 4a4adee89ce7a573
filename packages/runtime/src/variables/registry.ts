// Variable registry - live values and dependency order for every declared variable
//
// The registry is the single shared mutable structure of an experiment. Only the
// scheduler writes to it: knob values from routine writes, meter values from
// reads, and expression values from refreshExpressions().

import type {
  VariableDefinition,
  KnobVariable,
  MeterVariable,
  ExpressionVariable,
  SnapshotValues,
} from '@runcard/protocol';
import {
  CyclicDependencyError,
  DuplicateNameError,
  ExpressionError,
  UndefinedVariableError,
  UnknownReferenceError,
} from '../errors.js';
import { compileExpression, type CompiledExpression } from '../expressions/index.js';

type RegistryEntry = {
  definition: VariableDefinition;
  value: number | undefined;
  compiled?: CompiledExpression;
};

export class VariableRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private resolved: ExpressionVariable[] | null = null;

  /**
   * Register a variable.
   *
   * Expression formulas are compiled here, so syntax errors and symbols without
   * a definition fail at registration rather than on a tick.
   *
   * @throws DuplicateNameError if the name is taken
   * @throws CyclicDependencyError if the variable closes a cycle between expressions
   * @throws ExpressionError if the formula does not compile
   */
  register(definition: VariableDefinition): void {
    if (this.entries.has(definition.name)) {
      throw new DuplicateNameError(definition.name);
    }

    const entry: RegistryEntry = { definition, value: undefined };

    if (definition.kind === 'expression') {
      entry.compiled = compileExpression(definition.expression);
      for (const symbol of entry.compiled.symbols) {
        if (!Object.hasOwn(definition.definitions, symbol)) {
          throw new ExpressionError(
            definition.expression,
            `unknown symbol "${symbol}" (not listed in the definitions of "${definition.name}")`
          );
        }
      }
    }

    this.entries.set(definition.name, entry);
    this.resolved = null;

    if (definition.kind === 'expression') {
      const cycle = this.findCycleThrough(definition.name);
      if (cycle) {
        this.entries.delete(definition.name);
        throw new CyclicDependencyError(cycle);
      }
    }
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * Registered names in registration order
   */
  names(): string[] {
    return Array.from(this.entries.keys());
  }

  definition(name: string): VariableDefinition {
    return this.entry(name).definition;
  }

  knobs(): KnobVariable[] {
    return this.definitions().filter((d): d is KnobVariable => d.kind === 'knob');
  }

  meters(): MeterVariable[] {
    return this.definitions().filter((d): d is MeterVariable => d.kind === 'meter');
  }

  expressions(): ExpressionVariable[] {
    return this.definitions().filter((d): d is ExpressionVariable => d.kind === 'expression');
  }

  /**
   * Get the current value of a variable.
   *
   * @throws UndefinedVariableError if the variable is unknown or was never set
   */
  get(name: string): number {
    const value = this.entry(name).value;
    if (value === undefined) {
      throw new UndefinedVariableError(name);
    }
    return value;
  }

  /**
   * Get the current value of a variable, or undefined if it has none yet.
   */
  peek(name: string): number | undefined {
    return this.entries.get(name)?.value;
  }

  set(name: string, value: number): void {
    this.entry(name).value = value;
  }

  /**
   * Expression variables ordered so that every expression comes after the
   * expressions it depends on. Ties keep registration order.
   *
   * @throws UnknownReferenceError if a definition names an unregistered variable
   * @throws CyclicDependencyError if expressions depend on each other in a cycle
   */
  resolveOrder(): ExpressionVariable[] {
    if (this.resolved) {
      return [...this.resolved];
    }

    const order: ExpressionVariable[] = [];
    const done = new Set<string>();
    const visiting: string[] = [];

    const visit = (variable: ExpressionVariable): void => {
      if (done.has(variable.name)) {
        return;
      }
      const index = visiting.indexOf(variable.name);
      if (index !== -1) {
        throw new CyclicDependencyError([...visiting.slice(index), variable.name]);
      }

      visiting.push(variable.name);
      for (const reference of Object.values(variable.definitions)) {
        const target = this.entries.get(reference);
        if (!target) {
          throw new UnknownReferenceError(variable.name, reference);
        }
        if (target.definition.kind === 'expression') {
          visit(target.definition);
        }
      }
      visiting.pop();

      done.add(variable.name);
      order.push(variable);
    };

    for (const variable of this.expressions()) {
      visit(variable);
    }

    this.resolved = order;
    return [...order];
  }

  /**
   * Symbol -> value bindings for an expression, or null while any input is undefined.
   */
  bindingsFor(variable: ExpressionVariable): Record<string, number> | null {
    const bindings: Record<string, number> = {};
    for (const [symbol, reference] of Object.entries(variable.definitions)) {
      const value = this.peek(reference);
      if (value === undefined) {
        return null;
      }
      bindings[symbol] = value;
    }
    return bindings;
  }

  /**
   * Recompute every expression in dependency order from the current values.
   * An expression whose inputs are not all defined stays undefined.
   *
   * @throws ExpressionError if a formula fails on the current values
   */
  refreshExpressions(): void {
    for (const variable of this.resolveOrder()) {
      const entry = this.entry(variable.name);
      const bindings = this.bindingsFor(variable);
      entry.value = bindings && entry.compiled ? entry.compiled.evaluate(bindings) : undefined;
    }
  }

  /**
   * Immutable copy of every value, in registration order
   */
  values(): SnapshotValues {
    const values: Record<string, number | null> = {};
    for (const [name, entry] of this.entries) {
      values[name] = entry.value ?? null;
    }
    return Object.freeze(values);
  }

  private definitions(): VariableDefinition[] {
    return Array.from(this.entries.values(), (entry) => entry.definition);
  }

  private entry(name: string): RegistryEntry {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new UndefinedVariableError(name, 'is not registered');
    }
    return entry;
  }

  /**
   * Depth-first search for a path of expression references leading back to `start`.
   */
  private findCycleThrough(start: string): string[] | null {
    const seen = new Set<string>();

    const walk = (name: string, path: string[]): string[] | null => {
      const entry = this.entries.get(name);
      if (!entry || entry.definition.kind !== 'expression') {
        return null;
      }

      for (const reference of Object.values(entry.definition.definitions)) {
        if (reference === start) {
          return [...path, reference];
        }
        if (!seen.has(reference)) {
          seen.add(reference);
          const cycle = walk(reference, [...path, reference]);
          if (cycle) {
            return cycle;
          }
        }
      }
      return null;
    };

    return walk(start, [start]);
  }
}
