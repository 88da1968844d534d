/**
 * PeriodicTask - a cancellable background loop
 *
 * Runs `task` every `intervalMs`. The next run is scheduled only after the
 * current one settles, so runs never overlap. `stop()` resolves once the
 * in-flight run (if any) has finished.
 */

import type { Logger } from "../types";

export class PeriodicTask {
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<void>;
  private active = false;
  private runs = 0;

  constructor(
    private readonly name: string,
    private readonly intervalMs: number,
    private readonly task: () => void | Promise<void>,
    private readonly logger: Logger
  ) {}

  /**
   * Starts the loop. The first run happens one interval from now.
   */
  public start(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    this.schedule();
    this.logger.debug(`${this.name}: started`, { intervalMs: this.intervalMs });
  }

  /**
   * Runs the task immediately, outside the schedule
   */
  public async runNow(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
      return;
    }
    await this.execute();
  }

  /**
   * Stops scheduling and waits for an in-flight run to settle
   */
  public async stop(): Promise<void> {
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.logger.debug(`${this.name}: stopped`, { runs: this.runs });
  }

  public get isRunning(): boolean {
    return this.active;
  }

  public get runCount(): number {
    return this.runs;
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.execute().then(() => {
        if (this.active) {
          this.schedule();
        }
      });
    }, this.intervalMs);
  }

  private execute(): Promise<void> {
    const run = this.invoke().finally(() => {
      if (this.inFlight === run) {
        this.inFlight = undefined;
      }
    });
    this.inFlight = run;
    return run;
  }

  private async invoke(): Promise<void> {
    this.runs++;
    try {
      await this.task();
    } catch (error) {
      this.logger.error(`${this.name}: run failed`, error);
    }
  }
}
