export interface IFileSystem {
  exists(path: string): boolean;
  mkdir(path: string, options?: { recursive?: boolean }): void;
  read(path: string): string;
  write(path: string, content: string): void;
}

export interface ExecOptions {
  /**
   * Optional timeout in milliseconds.
   */
  timeoutMs?: number;
  /**
   * Environment variables.
   */
  env?: Record<string, string | undefined>;
  /**
   * Working directory.
   */
  cwd?: string;
  /**
   * Whether to reject on non-zero exit code.
   */
  reject?: boolean;
}

export interface IProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  command: string;
}

export interface IProcessRunner {
  run(file: string, args: string[], options?: ExecOptions): Promise<IProcessResult>;
}

export interface IEnv {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
}

export interface IOS {
  fs: IFileSystem;
  proc: IProcessRunner;
  env: IEnv;
}
