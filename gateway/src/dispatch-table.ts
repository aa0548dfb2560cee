/**
 * Dispatch table: method name → definition. Built once from the
 * collaborator's definitions and frozen; lookups need no coordination.
 */

import {
  GatewayError,
  type Definition,
  type MethodDefinition,
  type NativeObject,
  type StreamDefinition,
} from "@walletgate/core";

export class DispatchTable<TObject extends NativeObject> {
  private readonly methods: ReadonlyMap<string, MethodDefinition<TObject>>;
  private readonly streams: ReadonlyMap<string, StreamDefinition<TObject>>;

  private constructor(
    methods: Map<string, MethodDefinition<TObject>>,
    streams: Map<string, StreamDefinition<TObject>>
  ) {
    this.methods = methods;
    this.streams = streams;
    Object.freeze(this);
  }

  /**
   * Build the table. Throws on duplicate names, including a method and a
   * stream sharing one.
   */
  static build<TObject extends NativeObject>(definitions: Iterable<Definition<TObject>>): DispatchTable<TObject> {
    const methods = new Map<string, MethodDefinition<TObject>>();
    const streams = new Map<string, StreamDefinition<TObject>>();
    for (const def of definitions) {
      if (methods.has(def.name) || streams.has(def.name)) {
        throw new Error(`DispatchTable.build: duplicate definition "${def.name}"`);
      }
      if (def.type === "method") methods.set(def.name, def);
      else streams.set(def.name, def);
    }
    return new DispatchTable(methods, streams);
  }

  /** Request/response method; fails with UnknownMethod. */
  method(name: string): MethodDefinition<TObject> {
    const def = this.methods.get(name);
    if (!def) {
      throw new GatewayError({
        kind: "UnknownMethod",
        message: this.streams.has(name)
          ? `${name} is a stream; use subscribe`
          : `Unknown method: ${name}`,
      });
    }
    return def;
  }

  /** Stream definition; fails with UnknownMethod. */
  stream(name: string): StreamDefinition<TObject> {
    const def = this.streams.get(name);
    if (!def) {
      throw new GatewayError({
        kind: "UnknownMethod",
        message: this.methods.has(name)
          ? `${name} is not a stream; use dispatch`
          : `Unknown stream: ${name}`,
      });
    }
    return def;
  }

  methodNames(): string[] {
    return [...this.methods.keys()];
  }

  streamNames(): string[] {
    return [...this.streams.keys()];
  }
}
