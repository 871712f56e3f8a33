export type CommandHandler = (args: string[]) => string;

export interface CommandDefinition {
  readonly name: string;
  /** Checked in declaration order; the first prefix match wins. */
  readonly aliases: readonly string[];
  readonly handle: CommandHandler;
}

export interface CommandTable {
  readonly entries: readonly CommandDefinition[];
  /** The entry the shell compares against (by identity) to stop reading. */
  readonly exit: CommandDefinition;
}

export interface DispatchResult {
  command: CommandDefinition | null;
  output: string;
}
