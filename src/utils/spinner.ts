/**
 * Minimal terminal spinner. On a non-TTY stream it prints the message once
 * instead of animating.
 */

export class Spinner {
  private intervalId: NodeJS.Timeout | null = null;
  private message: string;
  private readonly frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  private currentFrame = 0;
  private isRunning = false;

  constructor(
    message: string = 'Working...',
    private readonly stream: NodeJS.WriteStream = process.stdout
  ) {
    this.message = message;
  }

  start(): void {
    if (this.isRunning) {
      return;
    }
    this.isRunning = true;

    if (!this.stream.isTTY) {
      this.stream.write(`${this.message}\n`);
      return;
    }

    this.currentFrame = 0;
    this.stream.write('\x1B[?25l');
    this.intervalId = setInterval(() => {
      const frame = this.frames[this.currentFrame % this.frames.length];
      this.stream.write(`\r${frame} ${this.message}`);
      this.currentFrame++;
    }, 80);
  }

  update(message: string): void {
    this.message = message;
  }

  stop(): void {
    if (!this.isRunning) {
      return;
    }
    this.isRunning = false;

    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      this.stream.write('\r' + ' '.repeat(this.stream.columns || 80) + '\r');
      this.stream.write('\x1B[?25h');
    }
  }
}
