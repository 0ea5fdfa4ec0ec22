import type { IOS } from './interface.ts';
import { RealOS } from './real.ts';

let currentOS: IOS = RealOS;

/** The OS facade the driver, config loader and persistence layer go through. */
export function getOS(): IOS {
  return currentOS;
}

export function setOS(os: IOS): void {
  currentOS = os;
}

/** Restores the real OS after a test swapped in a mock. */
export function resetOS(): void {
  currentOS = RealOS;
}

export { createMockOS } from './mock.ts';
export * from './interface.ts';
