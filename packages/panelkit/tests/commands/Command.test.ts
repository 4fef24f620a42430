import { describe, it, expect } from "vitest";
import { Command } from "../../src/commands/Command";
import { Gesture, isGestureKind } from "../../src/commands/Gesture";

describe("Command", () => {
  it("should give each action its own bit", () => {
    expect(Command.MENU.bits).toBe(1);
    expect(Command.FORWARD.bits).toBe(2);
    expect(Command.ZOOM_OUT.bits).toBe(1 << 15);
    expect(Command.NONE.bits).toBe(0);
  });

  it("should combine commands", () => {
    const combined = Command.FORWARD.or(Command.LEFT);
    expect(combined.has(Command.FORWARD)).toBe(true);
    expect(combined.has(Command.LEFT)).toBe(true);
    expect(combined.has(Command.RIGHT)).toBe(false);
    expect(combined.has(Command.FORWARD.or(Command.LEFT))).toBe(true);
  });

  it("should never report containing NONE", () => {
    expect(Command.MENU.has(Command.NONE)).toBe(false);
    expect(Command.NONE.isNone()).toBe(true);
    expect(Command.MENU.isNone()).toBe(false);
  });

  it("should compare by value", () => {
    expect(Command.named("MAP").equals(Command.MAP)).toBe(true);
    expect(Command.fromBits(0)).toBe(Command.NONE);
    expect(Command.MAP.equals(Command.INFO)).toBe(false);
  });

  it("should describe its actions in declaration order", () => {
    expect(Command.MAP.or(Command.MENU).description()).toBe("MENU+MAP");
    expect(Command.NONE.description()).toBe("NONE");
    expect(String(Command.JUMP)).toBe("Command(JUMP)");
  });

  it("should recognize action names", () => {
    expect(Command.isCommandName("HAIL")).toBe(true);
    expect(Command.isCommandName("hail")).toBe(false);
  });
});

describe("Gesture", () => {
  it("should recognize gesture kinds", () => {
    expect(isGestureKind(Gesture.CIRCLE)).toBe(true);
    expect(isGestureKind("square")).toBe(false);
  });
});
