import fs from 'node:fs';
import { run } from './exec.ts';
import type {
  ExecOptions,
  IEnv,
  IFileSystem,
  IOS,
  IProcessResult,
  IProcessRunner,
} from './interface.ts';

class RealFileSystem implements IFileSystem {
  exists(path: string): boolean {
    return fs.existsSync(path);
  }
  mkdir(path: string, options?: { recursive?: boolean }): void {
    fs.mkdirSync(path, options);
  }
  read(path: string): string {
    return fs.readFileSync(path, 'utf-8');
  }
  write(path: string, content: string): void {
    fs.writeFileSync(path, content);
  }
}

class RealEnv implements IEnv {
  get(key: string): string | undefined {
    return process.env[key];
  }
  set(key: string, value: string): void {
    process.env[key] = value;
  }
}

class RealProcessRunner implements IProcessRunner {
  async run(file: string, args: string[], options?: ExecOptions): Promise<IProcessResult> {
    return run(file, args, options);
  }
}

export const RealOS: IOS = {
  fs: new RealFileSystem(),
  proc: new RealProcessRunner(),
  env: new RealEnv(),
};
