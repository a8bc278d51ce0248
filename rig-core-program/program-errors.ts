/**
 * Thrown when a caller breaks the layout contract (misaligned address, collision with an existing
 * section, overfilled section, ...) or when the layout bookkeeping itself is inconsistent.
 * It is never part of normal control flow.
 */
export default class ProgramInvariantError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'ProgramInvariantError';
  }
}

export function checkProgramInvariant(condition: boolean, reason: () => string): asserts condition {
  if (!condition) {
    throw new ProgramInvariantError(reason());
  }
}

export const hex = (address: number): string => `0x${address.toString(16)}`;
