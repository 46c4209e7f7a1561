// src/update_interest.ts

import type { ClientUpdatesConfigMessage } from "./messages";

export type UpdateCategory =
  | "artwork"
  | "nowPlaying"
  | "volume"
  | "keyboard"
  | "outputDevice";

export type UpdateInterestSet = Record<UpdateCategory, boolean>;

export const UPDATE_CATEGORIES: readonly UpdateCategory[] = [
  "artwork",
  "nowPlaying",
  "volume",
  "keyboard",
  "outputDevice",
];

const MESSAGE_FIELDS: Record<UpdateCategory, keyof ClientUpdatesConfigMessage> = {
  artwork: "artworkUpdates",
  nowPlaying: "nowPlayingUpdates",
  volume: "volumeUpdates",
  keyboard: "keyboardUpdates",
  outputDevice: "outputDeviceUpdates",
};

export function isUpdateCategory(value: string): value is UpdateCategory {
  return UPDATE_CATEGORIES.some((category) => category === value);
}

/**
 * Push-update categories one peer has asked for. Before the peer sends any
 * configuration it is interested in nothing.
 *
 * Only fields present in a configuration change; a field that is present
 * and false turns the category off, an absent field leaves it alone.
 */
export class UpdateInterestTracker {
  private interests: UpdateInterestSet = {
    artwork: false,
    nowPlaying: false,
    volume: false,
    keyboard: false,
    outputDevice: false,
  };

  apply(config: Partial<UpdateInterestSet>): UpdateInterestSet {
    const next = { ...this.interests };
    for (const category of UPDATE_CATEGORIES) {
      const value = config[category];
      if (value !== undefined) {
        next[category] = value;
      }
    }
    this.interests = next;
    return this.snapshot();
  }

  /**
   * Applies a configuration as received on the wire.
   */
  applyMessage(message: ClientUpdatesConfigMessage): UpdateInterestSet {
    const config: Partial<UpdateInterestSet> = {};
    for (const category of UPDATE_CATEGORIES) {
      const value = message[MESSAGE_FIELDS[category]];
      if (value !== undefined) {
        config[category] = value;
      }
    }
    return this.apply(config);
  }

  isInterested(category: UpdateCategory): boolean {
    return this.interests[category];
  }

  snapshot(): UpdateInterestSet {
    return { ...this.interests };
  }
}
