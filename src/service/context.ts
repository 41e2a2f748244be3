/**
 * Process-scoped state threaded from startup to shutdown: the exit status and
 * the latch that ends the service loop. The first exit request wins.
 */
export class ProcessContext {
  public readonly exitRequested: Promise<number>;
  private resolveExit: ((status: number) => void) | undefined;
  private status: number | undefined;

  constructor() {
    this.exitRequested = new Promise<number>((resolve) => {
      this.resolveExit = resolve;
    });
  }

  public get exitStatus(): number | undefined {
    return this.status;
  }

  public get exiting(): boolean {
    return this.status !== undefined;
  }

  public requestExit(status: number): void {
    if (this.status !== undefined) {
      return;
    }
    this.status = status;
    this.resolveExit?.(status);
  }
}
