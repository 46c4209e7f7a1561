// src/envelope.ts

import { Reader, Writer } from "protobufjs";
import { MessageCatalog, PayloadDescriptor, isValidTag } from "./catalog";
import {
  InvalidTagError,
  MalformedPayloadError,
  MuxError,
  UnknownTagError,
} from "./errors";

/**
 * Envelope field holding the request/response correlation identifier.
 */
export const IDENTIFIER_FIELD = 2;

const WIRE_LENGTH_DELIMITED = 2;

/**
 * A single payload wrapped with the tag that identifies its kind.
 */
export interface Envelope {
  tag: number;
  payload: Uint8Array;
  identifier?: string;
}

/**
 * A payload whose tag the catalog knows, decoded by its registered decoder.
 */
export interface TypedMessage<T> {
  kind: "typed";
  tag: number;
  name: string;
  payload: T;
  descriptor: PayloadDescriptor<T>;
  identifier?: string;
}

/**
 * A payload whose tag the catalog does not know. Kept as raw bytes so it
 * can be forwarded unchanged.
 */
export interface OpaqueMessage {
  kind: "opaque";
  tag: number;
  data: Uint8Array;
  identifier?: string;
}

export type DecodedMessage = TypedMessage<unknown> | OpaqueMessage;

export interface EncodeOptions {
  /** Allow an unregistered tag; the payload must then be raw bytes. */
  opaque?: boolean;
  identifier?: string;
}

/**
 * Narrows a decoded message to the payload type of `descriptor`.
 */
export function isPayload<T>(
  message: DecodedMessage,
  descriptor: PayloadDescriptor<T>,
): message is TypedMessage<T> {
  return message.kind === "typed" && message.descriptor === descriptor;
}

/**
 * Encode an envelope to its protobuf wire form.
 *
 * Layout: optional field 2 (identifier, string), then the payload as a
 * length-delimited field numbered by its tag. No message-type header
 * (field 1) is written; the payload's field number alone names its kind.
 */
export function encodeEnvelope(envelope: Envelope): Uint8Array {
  if (!isValidTag(envelope.tag)) {
    throw new InvalidTagError(envelope.tag);
  }

  const writer = Writer.create();
  if (envelope.identifier !== undefined) {
    writer
      .uint32((IDENTIFIER_FIELD << 3) | WIRE_LENGTH_DELIMITED)
      .string(envelope.identifier);
  }
  writer
    .uint32(envelope.tag * 8 + WIRE_LENGTH_DELIMITED)
    .bytes(envelope.payload);

  return writer.finish();
}

/**
 * Decode wire bytes to an envelope. Header fields other than the
 * identifier are skipped.
 */
export function decodeEnvelope(data: Uint8Array): Envelope {
  let identifier: string | undefined;
  let tag: number | undefined;
  let payload: Uint8Array | undefined;

  try {
    const reader = Reader.create(data);
    while (reader.pos < reader.len) {
      const key = reader.uint32();
      const field = key >>> 3;
      const wireType = key & 7;

      if (field === IDENTIFIER_FIELD && wireType === WIRE_LENGTH_DELIMITED) {
        identifier = reader.string();
      } else if (isValidTag(field) && wireType === WIRE_LENGTH_DELIMITED) {
        if (tag !== undefined && tag !== field) {
          throw new MalformedPayloadError(
            "envelope",
            `carries payloads for both tag ${tag} and tag ${field}`,
          );
        }
        tag = field;
        payload = new Uint8Array(reader.bytes());
      } else {
        reader.skipType(wireType);
      }
    }
  } catch (err) {
    if (err instanceof MuxError) {
      throw err;
    }
    const cause = err instanceof Error ? err : new Error(String(err));
    throw new MalformedPayloadError("envelope", cause.message, cause);
  }

  if (tag === undefined || payload === undefined) {
    throw new MalformedPayloadError("envelope", "no payload field");
  }

  return identifier === undefined
    ? { tag, payload }
    : { tag, payload, identifier };
}

/**
 * Turns typed payloads into envelopes and back, using a catalog to resolve
 * tags. Holds no state besides the catalog.
 */
export class EnvelopeCodec {
  constructor(readonly catalog: MessageCatalog) {}

  /**
   * Wraps a payload for `tag`. Unregistered tags fail with UnknownTagError
   * unless `opaque` is set and the payload is raw bytes.
   */
  encode(tag: number, payload: unknown, options: EncodeOptions = {}): Envelope {
    const descriptor = this.catalog.get(tag);

    if (!descriptor) {
      if (!options.opaque) {
        throw new UnknownTagError(tag);
      }
      if (!(payload instanceof Uint8Array)) {
        throw new MalformedPayloadError(
          `payload#${tag}`,
          "opaque payloads must be raw bytes",
        );
      }
      return this.wrap(tag, payload, options.identifier);
    }

    return this.wrap(tag, this.runEncoder(descriptor, payload), options.identifier);
  }

  /**
   * Typed counterpart of `encode` for a known descriptor.
   */
  encodeMessage<T>(
    descriptor: PayloadDescriptor<T>,
    payload: T,
    identifier?: string,
  ): Envelope {
    return this.encode(descriptor.tag, payload, { identifier });
  }

  /**
   * Unwraps an envelope. A registered tag yields a typed message, an
   * unregistered one an opaque message; only a decoder failure throws.
   */
  decode(envelope: Envelope): DecodedMessage {
    const descriptor = this.catalog.get(envelope.tag);

    if (!descriptor) {
      const opaque: OpaqueMessage = {
        kind: "opaque",
        tag: envelope.tag,
        data: envelope.payload,
      };
      if (envelope.identifier !== undefined) {
        opaque.identifier = envelope.identifier;
      }
      return opaque;
    }

    let payload: unknown;
    try {
      payload = descriptor.decode(envelope.payload);
    } catch (err) {
      throw this.asMalformed(descriptor.name, err);
    }

    const typed: TypedMessage<unknown> = {
      kind: "typed",
      tag: envelope.tag,
      name: descriptor.name,
      payload,
      descriptor,
    };
    if (envelope.identifier !== undefined) {
      typed.identifier = envelope.identifier;
    }
    return typed;
  }

  /**
   * Wire bytes straight to a decoded message.
   */
  decodeBytes(data: Uint8Array): DecodedMessage {
    return this.decode(decodeEnvelope(data));
  }

  /**
   * Typed payload straight to wire bytes.
   */
  encodeBytes(tag: number, payload: unknown, options: EncodeOptions = {}): Uint8Array {
    return encodeEnvelope(this.encode(tag, payload, options));
  }

  private wrap(tag: number, payload: Uint8Array, identifier?: string): Envelope {
    return identifier === undefined ? { tag, payload } : { tag, payload, identifier };
  }

  private runEncoder(descriptor: PayloadDescriptor<unknown>, payload: unknown): Uint8Array {
    try {
      return descriptor.encode(payload);
    } catch (err) {
      throw this.asMalformed(descriptor.name, err);
    }
  }

  private asMalformed(name: string, err: unknown): MalformedPayloadError {
    if (err instanceof MalformedPayloadError) {
      return err;
    }
    const cause = err instanceof Error ? err : new Error(String(err));
    return new MalformedPayloadError(name, cause.message, cause);
  }
}
