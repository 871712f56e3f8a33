import { Injectable, Logger } from '@nestjs/common';
import { createInterface } from 'readline';
import { CommandDispatcher } from '../commands/command-dispatcher';
import { AppConfig } from '../../../shared/config/app.config';

@Injectable()
export class ConsoleShell {
  private readonly logger = new Logger(ConsoleShell.name);

  constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly config: AppConfig,
  ) {}

  /** Resolves after the exit command or when the input ends. */
  async run(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
  ): Promise<void> {
    const rl = createInterface({ input, output });
    rl.setPrompt(this.config.prompt);
    rl.prompt();

    for await (const line of rl) {
      const result = this.dispatcher.dispatch(line);
      output.write(`${result.output}\n`);

      if (result.command === this.dispatcher.exitCommand) {
        this.logger.log('Exit command received');
        return;
      }
      rl.prompt();
    }

    this.logger.log('Input closed');
  }
}
