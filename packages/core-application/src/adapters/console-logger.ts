import type { Logger } from "../ports/logger";

export class ConsoleLogger implements Logger {
  constructor(private readonly verbose = false) {}

  debug(message: string): void {
    if (this.verbose) console.debug(message);
  }

  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(message: string): void {
    console.error(message);
  }
}
