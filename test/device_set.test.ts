// test/device_set.test.ts

import { describe, it, expect, beforeEach } from "vitest";
import { DeviceSetNegotiator } from "../src";

describe("DeviceSetNegotiator", () => {
  let negotiator: DeviceSetNegotiator;

  beforeEach(() => {
    negotiator = new DeviceSetNegotiator();
  });

  it("should replace before adding", () => {
    const result = negotiator.apply({ setting: ["A", "B"], adding: ["C"] });

    expect(result.devices).toEqual(["A", "B", "C"]);
    expect(result.delta).toEqual({ replaced: true, added: ["C"], removed: [] });
  });

  it("should remove after adding", () => {
    negotiator.apply({ adding: ["A", "B"] });
    const result = negotiator.apply({ adding: ["C"], removing: ["A", "C"] });

    expect(result.devices).toEqual(["B"]);
    expect(result.delta).toEqual({ replaced: false, added: [], removed: ["A"] });
  });

  it("should replace the whole set", () => {
    negotiator.apply({ adding: ["A", "B"] });
    const result = negotiator.apply({ setting: ["C"] });

    expect(result.devices).toEqual(["C"]);
    expect(result.delta).toEqual({ replaced: true, added: [], removed: [] });
  });

  it("should empty the set when replaced with nothing", () => {
    negotiator.apply({ adding: ["A"] });
    expect(negotiator.apply({ setting: [] }).devices).toEqual([]);
  });

  it("should accept sets of devices", () => {
    negotiator.apply({ setting: new Set(["A", "B"]) });
    const result = negotiator.apply({ removing: new Set(["A"]), adding: new Set(["C"]) });

    expect(result.devices).toEqual(["B", "C"]);
    expect(result.delta).toEqual({ replaced: false, added: ["C"], removed: ["A"] });
  });

  it("should deduplicate and keep insertion order", () => {
    const result = negotiator.apply({ adding: ["B", "A", "B"] });
    expect(result.devices).toEqual(["B", "A"]);

    negotiator.apply({ adding: ["A", "C"] });
    expect(negotiator.devices()).toEqual(["B", "A", "C"]);
  });

  it("should keep the endpoint and cluster views apart", () => {
    negotiator.apply({ adding: ["A"], clusterAwareAdding: ["X", "Y"] });
    const result = negotiator.apply({ clusterAwareRemoving: ["X"] });

    expect(result.devices).toEqual(["A"]);
    expect(result.clusterDevices).toEqual(["Y"]);
    expect(result.delta).toEqual({ replaced: false, added: [], removed: [] });
    expect(result.clusterDelta).toEqual({ replaced: false, added: [], removed: ["X"] });
  });

  it("should apply wire requests", () => {
    const result = negotiator.applyMessage({
      settingDevices: ["A", "B"],
      removingDevices: ["B"],
      clusterAwareSettingDevices: ["Z"],
    });

    expect(result.devices).toEqual(["A"]);
    expect(negotiator.clusterDevices()).toEqual(["Z"]);
  });

  it("should report whether anything changed", () => {
    negotiator.apply({ adding: ["A"] });

    expect(DeviceSetNegotiator.changed(negotiator.apply({ adding: ["A"] }))).toBe(false);
    expect(DeviceSetNegotiator.changed(negotiator.apply({ removing: ["Q"] }))).toBe(false);
    expect(DeviceSetNegotiator.changed(negotiator.apply({ clusterAwareAdding: ["A"] }))).toBe(
      true,
    );
  });
});
