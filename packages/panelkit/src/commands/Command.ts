/**
 * Command - logical action derived from a key, a gesture, or an injection.
 *
 * A command is an immutable bit set: a single key maps to one action, but
 * commands may be combined (e.g. FORWARD | LEFT) when several inputs are
 * active at once.
 *
 * Usage:
 * ```ts
 * const command = Command.MENU.or(Command.MAP);
 * if (command.has(Command.MENU)) openMenu();
 * ```
 */

const ACTION_NAMES = [
  "MENU",
  "FORWARD",
  "LEFT",
  "RIGHT",
  "BACK",
  "PRIMARY",
  "SELECT",
  "LAND",
  "BOARD",
  "HAIL",
  "SCAN",
  "JUMP",
  "MAP",
  "INFO",
  "ZOOM_IN",
  "ZOOM_OUT",
] as const;

export type CommandName = (typeof ACTION_NAMES)[number];

export class Command {
  /** Every action name, in bit order */
  static readonly ACTIONS: readonly CommandName[] = ACTION_NAMES;

  static readonly NONE = new Command(0);
  static readonly MENU = Command.named("MENU");
  static readonly FORWARD = Command.named("FORWARD");
  static readonly LEFT = Command.named("LEFT");
  static readonly RIGHT = Command.named("RIGHT");
  static readonly BACK = Command.named("BACK");
  static readonly PRIMARY = Command.named("PRIMARY");
  static readonly SELECT = Command.named("SELECT");
  static readonly LAND = Command.named("LAND");
  static readonly BOARD = Command.named("BOARD");
  static readonly HAIL = Command.named("HAIL");
  static readonly SCAN = Command.named("SCAN");
  static readonly JUMP = Command.named("JUMP");
  static readonly MAP = Command.named("MAP");
  static readonly INFO = Command.named("INFO");
  static readonly ZOOM_IN = Command.named("ZOOM_IN");
  static readonly ZOOM_OUT = Command.named("ZOOM_OUT");

  private constructor(readonly bits: number) {}

  /** Command with the single bit of the named action */
  static named(name: CommandName): Command {
    return new Command(1 << ACTION_NAMES.indexOf(name));
  }

  static fromBits(bits: number): Command {
    return bits === 0 ? Command.NONE : new Command(bits);
  }

  static isCommandName(value: string): value is CommandName {
    return ACTION_NAMES.some((name) => name === value);
  }

  /** True when every bit of `other` is set here */
  has(other: Command): boolean {
    return other.bits !== 0 && (this.bits & other.bits) === other.bits;
  }

  or(other: Command): Command {
    return Command.fromBits(this.bits | other.bits);
  }

  isNone(): boolean {
    return this.bits === 0;
  }

  equals(other: Command): boolean {
    return this.bits === other.bits;
  }

  /** Names of the actions in this command, in declaration order */
  names(): CommandName[] {
    return ACTION_NAMES.filter((_, index) => (this.bits & (1 << index)) !== 0);
  }

  description(): string {
    const names = this.names();
    return names.length === 0 ? "NONE" : names.join("+");
  }

  toString(): string {
    return `Command(${this.description()})`;
  }
}
