// Third-party dependencies
import cliProgress from 'cli-progress';

export interface ProgressBar {
  start(total: number, startValue: number, payload?: object): void;
  increment(step?: number, payload?: object): void;
  stop(): void;
}

function createProgressBar(): ProgressBar {
  return new cliProgress.SingleBar({
    format: ' {bar} | {percentage}% | {value}/{total} | {file}',
    clearOnComplete: false,
    hideCursor: true,
  }, cliProgress.Presets.shades_grey);
}

/**
 * Completed-object bar for the worker pool.
 *
 * The bar redraws on its own timer, so anything that needs the terminal (the
 * credential prompt) runs through `pauseFor`, which stops the bar and restarts it at
 * the same position afterwards.
 */
export class TransferProgress {
  private bar: ProgressBar | null = null;
  private total = 0;
  private completed = 0;

  constructor(private readonly createBar: () => ProgressBar = createProgressBar) {}

  get active(): boolean {
    return this.bar !== null;
  }

  start(total: number): void {
    this.total = total;
    this.completed = 0;
    this.bar = this.createBar();
    this.bar.start(total, 0, { file: '' });
  }

  increment(file: string): void {
    this.completed++;
    this.bar?.increment(1, { file });
  }

  stop(): void {
    this.bar?.stop();
    this.bar = null;
  }

  async pauseFor<T>(task: () => Promise<T>): Promise<T> {
    const bar = this.bar;
    if (!bar) {
      return task();
    }

    bar.stop();
    try {
      return await task();
    } finally {
      // The run may have finished while the prompt was open
      if (this.bar === bar) {
        bar.start(this.total, this.completed, { file: '' });
      }
    }
  }
}
