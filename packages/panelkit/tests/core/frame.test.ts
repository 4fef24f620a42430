import { describe, it, expect } from "vitest";
import { Command } from "../../src/commands/Command";
import { StoreCommandLayer } from "../../src/commands/CommandLayer";
import { Gesture } from "../../src/commands/Gesture";
import { runFrame } from "../../src/core/frame";
import { PanelStack } from "../../src/core/PanelStack";
import { RecordingPanel } from "../fixtures/RecordingPanel";

describe("runFrame", () => {
  it("should handle events, then step and draw", () => {
    const ui = new PanelStack();
    const panel = new RecordingPanel("panel", { handles: ["scroll"] });
    ui.push(panel);
    ui.stepAll();

    const handled = runFrame(ui, [
      { type: "wheel", dx: 0, dy: 1 },
      { type: "wheel", dx: 0, dy: -1 },
    ]);

    expect(handled).toBe(2);
    expect(panel.steps).toBe(2);
    expect(panel.methods()).toEqual([
      "setUI",
      "scroll",
      "scroll",
      "clearZones",
      "draw",
    ]);
  });

  it("should redeliver commands injected by unhandled gestures", () => {
    const ui = new PanelStack();
    const panel = new RecordingPanel("panel");
    ui.push(panel);
    ui.stepAll();

    const handled = runFrame(ui, [{ type: "gesture", gesture: Gesture.X }]);

    expect(handled).toBe(0);
    expect(panel.callsTo("keyDown")).toEqual([
      [null, 0, Command.MENU, true],
      [null, 0, Command.MENU, true],
    ]);
    expect(ui.commands.takeInjected()).toEqual([]);
  });

  it("should deliver events to panels pushed earlier in the frame", () => {
    const ui = new PanelStack();
    const menu = new RecordingPanel("menu", { handles: ["keyDown"] });
    const root = new RecordingPanel("root", { handles: ["click"] });
    root.hooks.click = () => ui.push(menu);
    ui.push(root);
    ui.stepAll();

    const handled = runFrame(ui, [
      { type: "pointerdown", x: 0, y: 0, button: "primary", clicks: 1 },
      { type: "keydown", key: "Escape", modifiers: 0, repeat: false },
    ]);

    expect(handled).toBe(2);
    expect(menu.callsTo("keyDown")).toEqual([["Escape", 0, Command.MENU, true]]);
    expect(ui.panels()).toEqual([root, menu]);
  });

  it("should drain injected commands from an explicit command layer", () => {
    const ui = new PanelStack();
    const panel = new RecordingPanel("panel", { handles: ["keyDown"] });
    ui.push(panel);
    ui.stepAll();

    const replay = new StoreCommandLayer();
    replay.injectOnce(Command.MAP);
    ui.commands.injectOnce(Command.JUMP);

    const handled = runFrame(ui, [], replay);

    expect(handled).toBe(1);
    expect(panel.callsTo("keyDown")).toEqual([[null, 0, Command.MAP, true]]);
    expect(replay.takeInjected()).toEqual([]);
    expect(ui.commands.takeInjected()).toEqual([Command.JUMP]);
  });
});
