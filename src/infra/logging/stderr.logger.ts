import { ConsoleLogger, type LogLevel } from '@nestjs/common';

/** Console logger that keeps stdout free for command output. */
export class StderrLogger extends ConsoleLogger {
  protected printMessages(messages: unknown[], context = '', logLevel: LogLevel = 'log'): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}
