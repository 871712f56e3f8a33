import { Injectable, Logger } from '@nestjs/common';
import { ContactCommands } from './contact.commands';
import { buildCommandTable } from './command-table';
import {
  CommandDefinition,
  CommandTable,
  DispatchResult,
} from './command.types';
import { CommandExceptionsFilter } from '../../../shared/filters/command-exceptions.filter';

export interface CommandMatch {
  command: CommandDefinition;
  args: string[];
}

@Injectable()
export class CommandDispatcher {
  private readonly logger = new Logger(CommandDispatcher.name);
  private readonly table: CommandTable;

  constructor(
    commands: ContactCommands,
    private readonly exceptionsFilter: CommandExceptionsFilter,
  ) {
    this.table = buildCommandTable(commands);
  }

  get exitCommand(): CommandDefinition {
    return this.table.exit;
  }

  /**
   * Finds the first entry with an alias that prefixes the input
   * (case-insensitive). The rest of the input, as typed,
   * is split on whitespace into positional arguments.
   */
  match(input: string): CommandMatch | null {
    const text = input.trim();
    const lowered = text.toLowerCase();

    for (const command of this.table.entries) {
      for (const alias of command.aliases) {
        if (lowered.startsWith(alias.toLowerCase())) {
          const rest = text.slice(alias.length).trim();
          return { command, args: rest.length > 0 ? rest.split(/\s+/) : [] };
        }
      }
    }

    return null;
  }

  dispatch(input: string): DispatchResult {
    const matched = this.match(input);
    if (!matched) {
      this.logger.debug(`No command matches "${input}"`);
      return { command: null, output: `Unknown command: "${input.trim()}"` };
    }

    const { command, args } = matched;
    this.logger.debug(`Dispatching ${command.name} with ${args.length} args`);

    try {
      return { command, output: command.handle(args) };
    } catch (exception) {
      return {
        command,
        output: this.exceptionsFilter.catch(exception, command.name),
      };
    }
  }
}
