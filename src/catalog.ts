// src/catalog.ts

import { DuplicateTagError, InvalidTagError } from "./errors";

/**
 * Lowest tag a payload may use. Envelope fields 1-5 carry headers.
 */
export const MIN_PAYLOAD_TAG = 6;

/**
 * Highest protobuf field number, and so the highest payload tag.
 */
export const MAX_PAYLOAD_TAG = 536_870_911;

export type PayloadDecoder<T> = (data: Uint8Array) => T;
export type PayloadEncoder<T> = (payload: T) => Uint8Array;

/**
 * Describes one payload kind: the tag it travels under and how to turn it
 * into bytes and back.
 */
export interface PayloadDescriptor<T> {
  readonly tag: number;
  readonly name: string;
  decode(data: Uint8Array): T;
  encode(payload: T): Uint8Array;
}

export function isValidTag(tag: number): boolean {
  return Number.isInteger(tag) && tag >= MIN_PAYLOAD_TAG && tag <= MAX_PAYLOAD_TAG;
}

/**
 * Registry of known payload kinds, keyed by tag.
 *
 * Entries are registered explicitly at startup; nothing is discovered at
 * runtime. Tags that are not registered still decode, as opaque bytes.
 *
 * @example
 * ```typescript
 * const catalog = new MessageCatalog();
 * const ping = catalog.register(
 *   100,
 *   (data) => new TextDecoder().decode(data),
 *   (text: string) => new TextEncoder().encode(text),
 *   "Ping",
 * );
 * ```
 */
export class MessageCatalog {
  private readonly entries = new Map<number, PayloadDescriptor<unknown>>();

  /**
   * Registers a decode/encode pair for a tag and returns its descriptor.
   */
  register<T>(
    tag: number,
    decode: PayloadDecoder<T>,
    encode: PayloadEncoder<T>,
    name = `payload#${tag}`,
  ): PayloadDescriptor<T> {
    return this.define({ tag, name, decode, encode });
  }

  /**
   * Registers a prebuilt descriptor.
   */
  define<T>(descriptor: PayloadDescriptor<T>): PayloadDescriptor<T> {
    if (!isValidTag(descriptor.tag)) {
      throw new InvalidTagError(descriptor.tag);
    }

    const existing = this.entries.get(descriptor.tag);
    if (existing) {
      throw new DuplicateTagError(descriptor.tag, existing.name);
    }

    this.entries.set(descriptor.tag, descriptor);
    return descriptor;
  }

  get(tag: number): PayloadDescriptor<unknown> | undefined {
    return this.entries.get(tag);
  }

  has(tag: number): boolean {
    return this.entries.has(tag);
  }

  /**
   * Registered tags in ascending order.
   */
  tags(): number[] {
    return Array.from(this.entries.keys()).sort((a, b) => a - b);
  }

  get size(): number {
    return this.entries.size;
  }
}
