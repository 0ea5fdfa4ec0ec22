import type {
  ExecOptions,
  IEnv,
  IFileSystem,
  IOS,
  IProcessResult,
  IProcessRunner,
} from './interface.ts';

export class MockFileSystem implements IFileSystem {
  private files: Map<string, string> = new Map();
  private dirs: Set<string> = new Set();

  exists(path: string): boolean {
    return this.files.has(path) || this.dirs.has(path);
  }
  mkdir(path: string, _options?: { recursive?: boolean }): void {
    this.dirs.add(path);
  }
  read(path: string): string {
    const content = this.files.get(path);
    if (content === undefined) throw new Error(`File not found: ${path}`);
    return content;
  }
  write(path: string, content: string): void {
    this.files.set(path, content);
  }
}

export class MockEnv implements IEnv {
  private vars: Map<string, string> = new Map();
  get(key: string): string | undefined {
    return this.vars.get(key);
  }
  set(key: string, value: string): void {
    this.vars.set(key, value);
  }
}

export class MockProcessRunner implements IProcessRunner {
  private handlers: Map<string, (args: string[]) => IProcessResult> = new Map();
  public readonly calls: { file: string; args: string[] }[] = [];

  setHandler(file: string, handler: (args: string[]) => IProcessResult) {
    this.handlers.set(file, handler);
  }

  async run(file: string, args: string[], _options?: ExecOptions): Promise<IProcessResult> {
    this.calls.push({ file, args });
    const handler = this.handlers.get(file);
    if (handler) return handler(args);
    return { stdout: '', stderr: '', exitCode: 0, command: `${file} ${args.join(' ')}` };
  }
}

export const createMockOS = (): IOS & {
  proc: MockProcessRunner;
  fs: MockFileSystem;
  env: MockEnv;
} => {
  const fs = new MockFileSystem();
  const proc = new MockProcessRunner();
  const env = new MockEnv();
  return {
    fs,
    proc,
    env,
  };
};
