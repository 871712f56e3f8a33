import { ContactCommands } from './contact.commands';
import { CommandDefinition, CommandTable } from './command.types';

// Order matters where aliases overlap: "show all" before "show",
// "delete" before "del", "good bye" before "bye".
export function buildCommandTable(commands: ContactCommands): CommandTable {
  const exit: CommandDefinition = {
    name: 'exit',
    aliases: ['good bye', 'close', 'exit', '.', 'bye'],
    handle: () => commands.farewell(),
  };

  const entries: CommandDefinition[] = [
    {
      name: 'greeting',
      aliases: ['hello', 'hi'],
      handle: () => commands.greeting(),
    },
    {
      name: 'add',
      aliases: ['add', 'new', '+'],
      handle: (args) => commands.addContact(args),
    },
    {
      name: 'change',
      aliases: ['change'],
      handle: (args) => commands.changeNumber(args),
    },
    {
      name: 'phone',
      aliases: ['phone', 'number'],
      handle: (args) => commands.printPhone(args),
    },
    {
      name: 'show',
      aliases: ['show all', 'show'],
      handle: (args) => commands.showAll(args),
    },
    exit,
    {
      name: 'delete-phone',
      aliases: ['delete', 'del', '-'],
      handle: (args) => commands.deleteNumber(args),
    },
    {
      name: 'remove',
      aliases: ['remove'],
      handle: (args) => commands.deleteContact(args),
    },
    {
      name: 'days',
      aliases: ['days', 'birthday'],
      handle: (args) => commands.daysToBirthday(args),
    },
  ];

  return { entries, exit };
}
