import { errorMessage, isContractViolation } from "../utils/errors";
import { Logger } from "../utils/logger";

/**
 * Runs a task over and over with a fixed pause between runs. Runs never
 * overlap: the pause starts once the previous run has settled. `stop()` is
 * honoured between runs only; a stop requested before `run()` is called ends
 * that run before its first cycle.
 */
export class CycleRunner {
  private running = false;
  private stopRequested = false;
  private wake: (() => void) | null = null;

  constructor(private readonly logger: Logger) {}

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Resolves with the number of cycles started once the loop has stopped.
   * Rejects only on a contract violation raised by the task.
   */
  async run(task: (cycle: number) => Promise<void>, intervalMs: number): Promise<number> {
    if (this.running) {
      throw new Error("Cycle runner is already running");
    }

    this.running = true;
    let cycle = 0;

    try {
      while (!this.stopRequested) {
        cycle++;
        try {
          await task(cycle);
        } catch (error) {
          if (isContractViolation(error)) {
            this.logger.error("Contract violation, halting", { cycle, error: errorMessage(error) });
            throw error;
          }
          this.logger.error("Error in cycle", { cycle, error: errorMessage(error) });
        }

        if (this.stopRequested) {
          break;
        }
        await this.pause(intervalMs);
      }
    } finally {
      this.running = false;
      this.stopRequested = false;
      this.wake = null;
    }

    this.logger.info("Cycle runner stopped", { cycles: cycle });
    return cycle;
  }

  stop(): void {
    this.stopRequested = true;
    if (this.wake) {
      this.wake();
    }
  }

  private pause(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
