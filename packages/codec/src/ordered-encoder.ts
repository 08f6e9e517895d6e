import {
  DEFAULT_NON_CONFORMING_FLOATS,
  stringifyJson,
  type JsonObject,
  type JsonValue,
  type NonConformingFloats,
} from "./json-value.js";
import { silentLogger, type Logger } from "./logger.js";
import type { FieldDescriptor } from "./types.js";

export interface OrderedEncoderOptions {
  /** When false, members keep the order they were written in. */
  readonly orderKeys?: boolean;
  readonly indent?: number;
  readonly nonConformingFloats?: NonConformingFloats;
  readonly logger?: Logger;
}

/**
 * Encoder with a deterministic member order.
 *
 * Each object is ordered once, when its members are assembled: keys with a
 * descriptor by ascending ordinal, then the remaining keys in the order they
 * were written. `stringify` then writes the tree in a single pass.
 */
export class OrderedEncoder {
  readonly orderKeys: boolean;
  readonly indent: number;
  readonly nonConformingFloats: NonConformingFloats;
  private readonly logger: Logger;

  constructor(options: OrderedEncoderOptions = {}) {
    this.orderKeys = options.orderKeys ?? true;
    this.indent = options.indent ?? 0;
    this.nonConformingFloats = options.nonConformingFloats ?? DEFAULT_NON_CONFORMING_FLOATS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Order the members of an object of type `typeName`. Without descriptors
   * the native order is kept.
   */
  orderMembers(
    members: ReadonlyMap<string, JsonValue>,
    descriptors: ReadonlyArray<FieldDescriptor> | undefined,
    typeName: string
  ): JsonObject {
    if (!this.orderKeys) {
      return { kind: "object", members };
    }
    if (descriptors === undefined) {
      this.logger.debug(`${typeName} has no field metadata; keeping native member order`);
      return { kind: "object", members };
    }

    const ordinals = new Map<string, number>();
    for (const descriptor of descriptors) {
      ordinals.set(descriptor.wireKey, descriptor.ordinal);
    }

    const known: [string, JsonValue, number][] = [];
    const unknown: [string, JsonValue][] = [];
    for (const [key, value] of members) {
      const ordinal = ordinals.get(key);
      if (ordinal === undefined) unknown.push([key, value]);
      else known.push([key, value, ordinal]);
    }
    known.sort((a, b) => a[2] - b[2]);

    const ordered = new Map<string, JsonValue>();
    for (const [key, value] of known) ordered.set(key, value);
    for (const [key, value] of unknown) ordered.set(key, value);
    return { kind: "object", members: ordered };
  }

  stringify(value: JsonValue): string {
    return stringifyJson(value, {
      indent: this.indent,
      nonConformingFloats: this.nonConformingFloats,
    });
  }
}
