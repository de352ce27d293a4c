import { randomUUID } from 'crypto';

/**
 * Random (v4) UUID in canonical text form.
 */
export function newId(): string {
  return randomUUID();
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
