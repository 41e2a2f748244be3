import { type ChildProcess, spawn } from "node:child_process";

export interface SpawnPipedProcessOptions {
  command: string;
  args?: readonly string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Receives child process errors raised after a successful spawn. */
  onError: (error: Error) => void;
}

export interface ProcessExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface PipeDescriptors {
  stdin: number;
  stdout: number;
  stderr: number;
}

export class ProcessPipeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProcessPipeError";
  }
}

/**
 * A spawned child whose three stdio pipes are meant for someone else. The
 * proxy side of each pipe is left untouched (reading is stopped at spawn) so
 * the descriptors can be handed over intact.
 */
export class PipedProcess {
  public readonly exited: Promise<ProcessExit>;
  private exitResult: ProcessExit | undefined;
  private pipesReleased = false;

  constructor(
    private readonly child: ChildProcess,
    public readonly pid: number,
    public readonly descriptors: PipeDescriptors,
    exited: Promise<ProcessExit>,
  ) {
    this.exited = exited.then((result) => {
      this.exitResult = result;
      return result;
    });
  }

  public isAlive(): boolean {
    return this.exitResult === undefined;
  }

  /** Sends SIGKILL unless the child already exited. */
  public forceExit(): void {
    if (!this.isAlive()) {
      return;
    }
    this.child.kill("SIGKILL");
  }

  /** Closes the proxy's ends of the stdio pipes. Safe to call repeatedly. */
  public releasePipes(): void {
    if (this.pipesReleased) {
      return;
    }
    this.pipesReleased = true;
    destroyPipes(this.child);
  }
}

export async function spawnPipedProcess(
  options: SpawnPipedProcessOptions,
): Promise<PipedProcess> {
  const { command, args = [], cwd, env, onError } = options;

  const child = spawn(command, [...args], {
    cwd,
    env,
    stdio: ["pipe", "pipe", "pipe"],
  });

  // Node starts reading readable pipes as soon as they are wrapped; stop
  // before the event loop runs so no host output lands in our buffers.
  stopReading(child.stdout);
  stopReading(child.stderr);

  const exited = new Promise<ProcessExit>((resolve) => {
    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({ exitCode: code, signal });
    });
  });

  try {
    await waitForSpawn(child);
  } catch (error) {
    destroyPipes(child);
    throw error;
  }

  child.on("error", onError);

  const descriptors = readDescriptors(child);
  if (!descriptors || child.pid === undefined) {
    child.kill("SIGKILL");
    destroyPipes(child);
    throw new ProcessPipeError(
      `Failed to obtain stdio pipe descriptors for ${command}`,
    );
  }

  return new PipedProcess(child, child.pid, descriptors, exited);
}

function waitForSpawn(child: ChildProcess): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const handleSpawn = (): void => {
      child.removeListener("error", handleError);
      resolve();
    };
    const handleError = (error: Error): void => {
      child.removeListener("spawn", handleSpawn);
      reject(error);
    };
    child.once("spawn", handleSpawn);
    child.once("error", handleError);
  });
}

function readDescriptors(child: ChildProcess): PipeDescriptors | undefined {
  const stdin = pipeDescriptor(child.stdin);
  const stdout = pipeDescriptor(child.stdout);
  const stderr = pipeDescriptor(child.stderr);
  if (stdin === undefined || stdout === undefined || stderr === undefined) {
    return undefined;
  }
  return { stdin, stdout, stderr };
}

function destroyPipes(child: ChildProcess): void {
  child.stdin?.destroy();
  child.stdout?.destroy();
  child.stderr?.destroy();
}

function internalHandle(stream: unknown): object | undefined {
  if (typeof stream !== "object" || stream === null || !("_handle" in stream)) {
    return undefined;
  }
  const handle = stream._handle;
  return typeof handle === "object" && handle !== null ? handle : undefined;
}

export function pipeDescriptor(stream: unknown): number | undefined {
  const handle = internalHandle(stream);
  if (
    handle &&
    "fd" in handle &&
    typeof handle.fd === "number" &&
    handle.fd >= 0
  ) {
    return handle.fd;
  }
  return undefined;
}

function stopReading(stream: unknown): void {
  const handle = internalHandle(stream);
  if (handle && "readStop" in handle && typeof handle.readStop === "function") {
    handle.readStop();
  }
}
