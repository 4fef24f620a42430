import { describe, it, expect, beforeEach } from "vitest";
import { Command } from "../../src/commands/Command";
import { StoreCommandLayer } from "../../src/commands/CommandLayer";
import { Gesture } from "../../src/commands/Gesture";
import {
  createCommandStore,
  DEFAULT_KEYBINDS,
  type CommandStore,
} from "../../src/commands/commandStore";

describe("commandStore", () => {
  let store: CommandStore;

  beforeEach(() => {
    store = createCommandStore();
  });

  describe("key bindings", () => {
    it("should start from the default keys", () => {
      expect(store.getState().getKey("MENU")).toBe("Escape");
      expect(store.getState().getKey("MAP")).toBe(DEFAULT_KEYBINDS.MAP);
    });

    it("should ship a default key for every command", () => {
      expect(Object.keys(DEFAULT_KEYBINDS)).toEqual([...Command.ACTIONS]);
      expect(DEFAULT_KEYBINDS.ZOOM_OUT).toBe("-");
    });

    it("should map a key to its bound command", () => {
      expect(store.getState().commandForKey("Escape")).toEqual(Command.MENU);
      expect(store.getState().commandForKey("ArrowUp")).toEqual(Command.FORWARD);
    });

    it("should match single-character keys regardless of case", () => {
      expect(store.getState().commandForKey("M")).toEqual(Command.MAP);
    });

    it("should return NONE for an unbound key", () => {
      expect(store.getState().commandForKey("F9").isNone()).toBe(true);
    });

    it("should rebind a command", () => {
      store.getState().setKeybind("MAP", "Tab");
      expect(store.getState().getKey("MAP")).toBe("Tab");
      expect(store.getState().commandForKey("m").isNone()).toBe(true);
      // PRIMARY is bound to Tab by default, so Tab now means both
      expect(store.getState().commandForKey("Tab")).toEqual(
        Command.PRIMARY.or(Command.MAP),
      );
    });

    it("should reset one binding or all of them", () => {
      store.getState().setKeybind("MAP", "n");
      store.getState().setKeybind("INFO", "o");
      store.getState().resetKeybind("MAP");
      expect(store.getState().getKey("MAP")).toBe("m");
      expect(store.getState().getKey("INFO")).toBe("o");

      store.getState().resetAllKeybinds();
      expect(store.getState().customBindings).toEqual({});
      expect(store.getState().getKey("INFO")).toBe("i");
    });
  });

  describe("gesture bindings", () => {
    it("should map gestures to commands", () => {
      expect(store.getState().commandForGesture(Gesture.CARET_UP)).toEqual(Command.MAP);
      expect(store.getState().commandForGesture(Gesture.ZOOM_IN)).toEqual(Command.ZOOM_IN);
    });

    it("should map the empty gesture to NONE", () => {
      expect(store.getState().commandForGesture(Gesture.NONE)).toBe(Command.NONE);
    });

    it("should rebind a gesture", () => {
      store.getState().setGestureBinding(Gesture.CIRCLE, "HAIL");
      expect(store.getState().commandForGesture(Gesture.CIRCLE)).toEqual(Command.HAIL);
      store.getState().setGestureBinding(Gesture.CIRCLE, null);
      expect(store.getState().commandForGesture(Gesture.CIRCLE).isNone()).toBe(true);
    });
  });

  describe("injection", () => {
    it("should drain injected commands in order", () => {
      store.getState().injectOnce(Command.MAP);
      store.getState().injectOnce(Command.JUMP);
      expect(store.getState().takeInjected()).toEqual([Command.MAP, Command.JUMP]);
      expect(store.getState().takeInjected()).toEqual([]);
    });

    it("should queue a command only once per drain", () => {
      store.getState().injectOnce(Command.MAP);
      store.getState().injectOnce(Command.named("MAP"));
      expect(store.getState().takeInjected()).toHaveLength(1);
    });

    it("should not queue NONE", () => {
      store.getState().injectOnce(Command.NONE);
      expect(store.getState().injected).toEqual([]);
    });
  });
});

describe("StoreCommandLayer", () => {
  it("should delegate to its store", () => {
    const layer = new StoreCommandLayer();
    expect(layer.fromKey("j")).toEqual(Command.JUMP);
    expect(layer.fromGesture(Gesture.X)).toEqual(Command.MENU);

    layer.injectOnce(Command.SCAN);
    expect(layer.store.getState().injected).toEqual([Command.SCAN]);
    expect(layer.takeInjected()).toEqual([Command.SCAN]);
  });

  it("should create a separate store per layer", () => {
    const first = new StoreCommandLayer();
    const second = new StoreCommandLayer();
    first.store.getState().setKeybind("JUMP", "k");
    expect(second.fromKey("j")).toEqual(Command.JUMP);
  });
});
