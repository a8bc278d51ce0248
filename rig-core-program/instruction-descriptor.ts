import type { Optional } from 'rig-core-utils';

export type InstructionOperand = { readonly name: string };

/** Present on descriptors of load/store instructions. */
export type LoadStoreClassification = { readonly memoryKind: string };

/**
 * The definition of an instruction, owned by whoever built the instruction catalog. The layout
 * code only reads it.
 */
export interface InstructionDescriptor {
  readonly mnemonic: string;
  readonly operands: readonly InstructionOperand[];
  /** When set, the first character of the rendered operands is printed against the mnemonic. */
  readonly gluedOperands: boolean;
  readonly loadStore: Optional<LoadStoreClassification>;
  renderOperands(values: ReadonlyMap<string, number>): string;
}
