import { bytesToHex, hexToBytes } from '../ByteStream';
import { compile } from '../compiler/CompiledConstruct';
import type { CompileOptions } from '../compiler/Compiler';
import type { Construct } from '../constructs/Construct';
import { SchemaBuilder, SchemaNode } from './SchemaBuilder';
import type { SchemaRegistry } from './SchemaRegistry';

export interface SchemaCodecOptions {
  /** Run through the compiler instead of the interpreter. */
  compiled?: boolean;
  /** Passed to the compiler when `compiled` is set. */
  onFallback?: CompileOptions['onFallback'];
  /** Registry that `$ref` nodes in the schema resolve through. */
  registry?: SchemaRegistry;
}

/**
 * High-level codec that wraps a schema definition.
 * Encodes values to Uint8Array and decodes Uint8Array back to values.
 */
export class SchemaCodec {
  private readonly _construct: Construct;

  constructor(schema: SchemaNode | Construct, options: SchemaCodecOptions = {}) {
    const construct = 'type' in schema ? SchemaBuilder.build(schema, options.registry) : schema;
    this._construct = options.compiled ? compile(construct, { onFallback: options.onFallback }) : construct;
  }

  /** Codec for one entry of a registry. */
  static fromRegistry(registry: SchemaRegistry, name: string, options: SchemaCodecOptions = {}): SchemaCodec {
    return new SchemaCodec(registry.get(name), options);
  }

  /** Encode a value to a Uint8Array. */
  encode(value: unknown, entries?: Record<string, unknown>): Uint8Array {
    return this._construct.build(value, entries);
  }

  /** Encode a value and return hex string. */
  encodeToHex(value: unknown, entries?: Record<string, unknown>): string {
    return bytesToHex(this.encode(value, entries));
  }

  /** Decode a Uint8Array back to a value. */
  decode(data: Uint8Array, entries?: Record<string, unknown>): unknown {
    return this._construct.parse(data, entries);
  }

  /** Decode a hex string back to a value. */
  decodeFromHex(hex: string, entries?: Record<string, unknown>): unknown {
    return this.decode(hexToBytes(hex), entries);
  }

  sizeof(entries?: Record<string, unknown>): number {
    return this._construct.sizeof(entries);
  }

  /** Access the underlying construct (compiled when requested). */
  get construct(): Construct {
    return this._construct;
  }
}
