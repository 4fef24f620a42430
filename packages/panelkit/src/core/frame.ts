import type { CommandLayer } from "../commands/CommandLayer";
import type { PanelEvent } from "../types";
import type { PanelStack } from "./PanelStack";

/**
 * Run one host-loop frame: deliver the frame's input, redeliver commands
 * the command layer queued for injection, then step and draw every panel.
 *
 * Commands injected while this frame's events are handled are delivered
 * before stepping; anything injected during that redelivery waits for the
 * next frame. Injected commands are drained from `commands`, which defaults
 * to the stack's own command layer. Returns how many events (injected ones
 * included) were handled.
 */
export function runFrame(
  ui: PanelStack,
  events: Iterable<PanelEvent>,
  commands: CommandLayer = ui.commands,
): number {
  let handled = 0;

  for (const event of events) {
    if (ui.handle(event)) handled++;
  }

  for (const command of commands.takeInjected()) {
    if (ui.handle({ type: "command", command, pressed: true })) handled++;
  }

  ui.stepAll();
  ui.drawAll();
  return handled;
}
