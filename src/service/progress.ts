/**
 * Operator-facing progress output. Cosmetic only; nothing depends on what is printed.
 */

export interface ProgressReporter {
  /** Called after each confirmation poll that did not confirm yet */
  waiting(attempt: number, status: string): void;
  /** Ends a waiting phase */
  completed(message: string): void;
  notice(message: string): void;
}

const SPINNER = ["|", "/", "-", "\\"];
const LINE_WIDTH = 50;

export interface ProgressOutput {
  write(chunk: string): unknown;
}

/** One-line spinner while waiting, plain lines otherwise */
export class ConsoleProgressReporter implements ProgressReporter {
  private frame = 0;

  constructor(private readonly out: ProgressOutput = process.stdout) {}

  waiting(_attempt: number, _status: string): void {
    this.out.write(`\rWaiting for shipment confirmation... ${SPINNER[this.frame]}`);
    this.frame = (this.frame + 1) % SPINNER.length;
  }

  completed(message: string): void {
    this.out.write(`\r${" ".repeat(LINE_WIDTH)}\r${message}\n`);
    this.frame = 0;
  }

  notice(message: string): void {
    this.out.write(`${message}\n`);
  }
}

export const silentProgress: ProgressReporter = {
  waiting: () => undefined,
  completed: () => undefined,
  notice: () => undefined,
};
