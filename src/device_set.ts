// src/device_set.ts

import type { ModifyOutputContextRequestMessage } from "./messages";

/**
 * Changes to one or both device views. Within a view the replacement is
 * applied first, then additions, then removals.
 */
/** Device identifiers, as a list or a set. */
export type DeviceIds = readonly string[] | ReadonlySet<string>;

export interface DeviceSetRequest {
  adding?: DeviceIds;
  removing?: DeviceIds;
  setting?: DeviceIds;
  clusterAwareAdding?: DeviceIds;
  clusterAwareRemoving?: DeviceIds;
  clusterAwareSetting?: DeviceIds;
}

export interface DeviceSetDelta {
  /** Whether the view was replaced before additions and removals. */
  replaced: boolean;
  /** Identifiers present afterwards that were not present after the replacement. */
  added: string[];
  /** Identifiers present after the replacement that are gone afterwards. */
  removed: string[];
}

export interface DeviceSetResult {
  devices: string[];
  delta: DeviceSetDelta;
  clusterDevices: string[];
  clusterDelta: DeviceSetDelta;
}

interface ViewChange {
  adding?: DeviceIds;
  removing?: DeviceIds;
  setting?: DeviceIds;
}

function applyToView(view: Set<string>, change: ViewChange): [Set<string>, DeviceSetDelta] {
  const base = change.setting !== undefined ? new Set(change.setting) : new Set(view);
  const next = new Set(base);

  for (const device of change.adding ?? []) {
    next.add(device);
  }
  for (const device of change.removing ?? []) {
    next.delete(device);
  }

  return [
    next,
    {
      replaced: change.setting !== undefined,
      added: Array.from(next).filter((device) => !base.has(device)),
      removed: Array.from(base).filter((device) => !next.has(device)),
    },
  ];
}

function isEmptyDelta(delta: DeviceSetDelta): boolean {
  return !delta.replaced && delta.added.length === 0 && delta.removed.length === 0;
}

/**
 * Output devices taking part in a peer's playback, kept as two views: the
 * addressed endpoint and the endpoint's whole cluster. Requests for one
 * view never touch the other.
 *
 * @example
 * ```typescript
 * const negotiator = new DeviceSetNegotiator();
 * const result = negotiator.apply({ setting: ["A", "B"], adding: ["C"] });
 * // result.devices === ["A", "B", "C"], result.delta.added === ["C"]
 * ```
 */
export class DeviceSetNegotiator {
  private endpoint = new Set<string>();
  private cluster = new Set<string>();

  apply(request: DeviceSetRequest): DeviceSetResult {
    const [endpoint, delta] = applyToView(this.endpoint, {
      adding: request.adding,
      removing: request.removing,
      setting: request.setting,
    });
    const [cluster, clusterDelta] = applyToView(this.cluster, {
      adding: request.clusterAwareAdding,
      removing: request.clusterAwareRemoving,
      setting: request.clusterAwareSetting,
    });

    this.endpoint = endpoint;
    this.cluster = cluster;

    return {
      devices: this.devices(),
      delta,
      clusterDevices: this.clusterDevices(),
      clusterDelta,
    };
  }

  /**
   * Applies a request as received on the wire.
   */
  applyMessage(message: ModifyOutputContextRequestMessage): DeviceSetResult {
    return this.apply({
      adding: message.addingDevices,
      removing: message.removingDevices,
      setting: message.settingDevices,
      clusterAwareAdding: message.clusterAwareAddingDevices,
      clusterAwareRemoving: message.clusterAwareRemovingDevices,
      clusterAwareSetting: message.clusterAwareSettingDevices,
    });
  }

  devices(): string[] {
    return Array.from(this.endpoint);
  }

  clusterDevices(): string[] {
    return Array.from(this.cluster);
  }

  /**
   * Whether a result changed anything in either view.
   */
  static changed(result: DeviceSetResult): boolean {
    return !isEmptyDelta(result.delta) || !isEmptyDelta(result.clusterDelta);
  }
}
