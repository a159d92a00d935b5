import { randomUUID } from 'node:crypto';

/** UUID used directly as a backend point id. */
export function generateId(): string {
  return randomUUID();
}
