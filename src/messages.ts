// src/messages.ts

import * as path from "path";
import { loadSync, Type } from "protobufjs";
import { MessageCatalog, PayloadDescriptor } from "./catalog";
import { MalformedPayloadError } from "./errors";
import type { TransactionKey } from "./reassembler";

/**
 * Tags of the payload kinds the multiplexer routes itself.
 */
export const TAGS = {
  clientUpdatesConfig: 21,
  transaction: 38,
  setVolume: 55,
  volumeDidChange: 56,
  modifyOutputContextRequest: 74,
} as const;

export const PROTO_PATH = path.resolve(__dirname, "..", "proto", "messages.proto");

const root = loadSync(PROTO_PATH);

/**
 * Which push updates a peer wants. Absent fields leave the current
 * setting untouched.
 */
export type ClientUpdatesConfigMessage = {
  artworkUpdates?: boolean;
  nowPlayingUpdates?: boolean;
  volumeUpdates?: boolean;
  keyboardUpdates?: boolean;
  outputDeviceUpdates?: boolean;
};

export enum ModifyOutputContextRequestType {
  SharedAudioPresentation = 1,
}

export type ModifyOutputContextRequestMessage = {
  type?: ModifyOutputContextRequestType;
  addingDevices?: string[];
  removingDevices?: string[];
  settingDevices?: string[];
  clusterAwareAddingDevices?: string[];
  clusterAwareRemovingDevices?: string[];
  clusterAwareSettingDevices?: string[];
};

export type TransactionPacket = {
  key: TransactionKey;
  packetData: Uint8Array;
  identifier?: string;
  totalLength: number;
  totalWritePosition: number;
};

export type TransactionMessage = {
  name?: number;
  packets: TransactionPacket[];
};

export type VolumeMessage = {
  volume: number;
  outputDeviceUID?: string;
};

type WireObject = Record<string, unknown>;

function isWireObject(value: unknown): value is WireObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalBoolean(obj: WireObject, field: string): boolean | undefined {
  const value = obj[field];
  return typeof value === "boolean" ? value : undefined;
}

function optionalString(obj: WireObject, field: string): string | undefined {
  const value = obj[field];
  return typeof value === "string" ? value : undefined;
}

function optionalNumber(obj: WireObject, field: string): number | undefined {
  const value = obj[field];
  return typeof value === "number" ? value : undefined;
}

function optionalBytes(obj: WireObject, field: string): Uint8Array | undefined {
  const value = obj[field];
  return value instanceof Uint8Array ? new Uint8Array(value) : undefined;
}

// Repeated fields cannot signal presence on the wire; empty means absent.
function optionalStrings(obj: WireObject, field: string): string[] | undefined {
  const value = obj[field];
  if (!Array.isArray(value) || value.length === 0) {
    return undefined;
  }
  return value.filter((item): item is string => typeof item === "string");
}

function assign<T extends object, K extends keyof T>(
  target: T,
  field: K,
  value: T[K] | undefined,
): void {
  if (value !== undefined) {
    target[field] = value;
  }
}

function decodeWire(type: Type, data: Uint8Array): WireObject {
  const message = type.decode(data);
  const problem = type.verify(message);
  if (problem) {
    throw new MalformedPayloadError(type.name, problem);
  }
  return type.toObject(message, { longs: Number });
}

function encodeWire(type: Type, obj: WireObject): Uint8Array {
  const problem = type.verify(obj);
  if (problem) {
    throw new MalformedPayloadError(type.name, problem);
  }
  return type.encode(type.fromObject(obj)).finish();
}

/**
 * Builds a descriptor backed by a message type from `messages.proto`.
 */
function protoDescriptor<T>(
  tag: number,
  typeName: string,
  fromWire: (obj: WireObject) => T,
  toWire: (payload: T) => WireObject,
): PayloadDescriptor<T> {
  const type = root.lookupType(typeName);
  return {
    tag,
    name: typeName,
    decode: (data) => fromWire(decodeWire(type, data)),
    encode: (payload) => {
      if (!isWireObject(payload)) {
        throw new MalformedPayloadError(typeName, "payload must be an object");
      }
      return encodeWire(type, toWire(payload));
    },
  };
}

const UPDATE_FLAGS = [
  "artworkUpdates",
  "nowPlayingUpdates",
  "volumeUpdates",
  "keyboardUpdates",
  "outputDeviceUpdates",
] as const;

export const CLIENT_UPDATES_CONFIG = protoDescriptor<ClientUpdatesConfigMessage>(
  TAGS.clientUpdatesConfig,
  "ClientUpdatesConfigMessage",
  (obj) => {
    const message: ClientUpdatesConfigMessage = {};
    for (const flag of UPDATE_FLAGS) {
      assign(message, flag, optionalBoolean(obj, flag));
    }
    return message;
  },
  (payload) => ({ ...payload }),
);

const DEVICE_LISTS = [
  "addingDevices",
  "removingDevices",
  "settingDevices",
  "clusterAwareAddingDevices",
  "clusterAwareRemovingDevices",
  "clusterAwareSettingDevices",
] as const;

export const MODIFY_OUTPUT_CONTEXT_REQUEST =
  protoDescriptor<ModifyOutputContextRequestMessage>(
    TAGS.modifyOutputContextRequest,
    "ModifyOutputContextRequestMessage",
    (obj) => {
      const message: ModifyOutputContextRequestMessage = {};
      const type = optionalNumber(obj, "type");
      if (type === ModifyOutputContextRequestType.SharedAudioPresentation) {
        message.type = type;
      }
      for (const list of DEVICE_LISTS) {
        assign(message, list, optionalStrings(obj, list));
      }
      return message;
    },
    (payload) => ({ ...payload }),
  );

function packetFromWire(obj: unknown, index: number): TransactionPacket {
  const where = `packet ${index}`;
  if (!isWireObject(obj) || !isWireObject(obj.key)) {
    throw new MalformedPayloadError("TransactionMessage", `${where} has no key`);
  }

  const identifier = optionalString(obj.key, "identifier");
  if (identifier === undefined) {
    throw new MalformedPayloadError(
      "TransactionMessage",
      `${where} key has no identifier`,
    );
  }

  const totalLength = optionalNumber(obj, "totalLength");
  if (totalLength === undefined) {
    throw new MalformedPayloadError(
      "TransactionMessage",
      `${where} has no totalLength`,
    );
  }

  const packet: TransactionPacket = {
    key: {
      identifier,
      userData: optionalBytes(obj.key, "userData") ?? new Uint8Array(0),
    },
    packetData: optionalBytes(obj, "packetData") ?? new Uint8Array(0),
    totalLength,
    totalWritePosition: optionalNumber(obj, "totalWritePosition") ?? 0,
  };
  assign(packet, "identifier", optionalString(obj, "identifier"));
  return packet;
}

export const TRANSACTION = protoDescriptor<TransactionMessage>(
  TAGS.transaction,
  "TransactionMessage",
  (obj) => {
    const container = obj.packets;
    const packets =
      isWireObject(container) && Array.isArray(container.packets)
        ? container.packets
        : [];
    const message: TransactionMessage = {
      packets: packets.map((packet, index) => packetFromWire(packet, index)),
    };
    assign(message, "name", optionalNumber(obj, "name"));
    return message;
  },
  (payload) => ({
    ...(payload.name !== undefined ? { name: payload.name } : {}),
    packets: {
      packets: payload.packets.map((packet) => ({
        key: {
          identifier: packet.key.identifier,
          userData: packet.key.userData,
        },
        packetData: packet.packetData,
        ...(packet.identifier !== undefined
          ? { identifier: packet.identifier }
          : {}),
        totalLength: packet.totalLength,
        totalWritePosition: packet.totalWritePosition,
      })),
    },
  }),
);

function volumeFromWire(typeName: string): (obj: WireObject) => VolumeMessage {
  return (obj) => {
    const volume = optionalNumber(obj, "volume");
    if (volume === undefined) {
      throw new MalformedPayloadError(typeName, "volume is required");
    }
    const message: VolumeMessage = { volume };
    assign(message, "outputDeviceUID", optionalString(obj, "outputDeviceUID"));
    return message;
  };
}

export const SET_VOLUME = protoDescriptor<VolumeMessage>(
  TAGS.setVolume,
  "SetVolumeMessage",
  volumeFromWire("SetVolumeMessage"),
  (payload) => ({ ...payload }),
);

export const VOLUME_DID_CHANGE = protoDescriptor<VolumeMessage>(
  TAGS.volumeDidChange,
  "VolumeDidChangeMessage",
  volumeFromWire("VolumeDidChangeMessage"),
  (payload) => ({ ...payload }),
);

/**
 * Every built-in descriptor, in tag order.
 */
export const BUILTIN_DESCRIPTORS = [
  CLIENT_UPDATES_CONFIG,
  TRANSACTION,
  SET_VOLUME,
  VOLUME_DID_CHANGE,
  MODIFY_OUTPUT_CONTEXT_REQUEST,
] as const;

/**
 * A catalog holding the built-in payload kinds. Applications register
 * their own kinds on top of it.
 */
export function createDefaultCatalog(): MessageCatalog {
  const catalog = new MessageCatalog();
  for (const descriptor of BUILTIN_DESCRIPTORS) {
    catalog.define<unknown>(descriptor);
  }
  return catalog;
}
