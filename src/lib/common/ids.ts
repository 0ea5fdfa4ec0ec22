import { v4 as uuidv4 } from 'uuid';

/** `<prefix>-<12 hex chars>`, e.g. `sandbox-3f9a0c41d2be`. */
export function newId(prefix: string): string {
  return `${prefix}-${uuidv4().replace(/-/g, '').slice(0, 12)}`;
}
