import type {
  InstructionDescriptor,
  InstructionOperand,
  LoadStoreClassification,
} from 'rig-core-program';
import { checkNotNull, Optional } from 'rig-core-utils';

export type CatalogOperand =
  | { readonly name: string; readonly type: 'register'; readonly prefix: string }
  | { readonly name: string; readonly type: 'immediate' }
  | { readonly name: string; readonly type: 'flag'; readonly text: string };

export type CatalogEntry = {
  readonly mnemonic: string;
  readonly operands: readonly CatalogOperand[];
  /** Operand syntax, with `<name>` standing for the rendered operand called `name`. */
  readonly syntax: string;
  readonly gluedOperands: boolean;
  readonly loadStore: Optional<LoadStoreClassification>;
};

export const SYNTAX_PLACEHOLDER_PATTERN = /<([A-Za-z_][A-Za-z0-9_]*)>/g;

export const renderCatalogOperand = (operand: CatalogOperand, value: number): string => {
  switch (operand.type) {
    case 'register':
      return `${operand.prefix}${value}`;
    case 'immediate':
      return String(value);
    case 'flag':
      return value !== 0 ? operand.text : '';
  }
};

export default class TemplateInstructionDescriptor implements InstructionDescriptor {
  private readonly operandsByName: ReadonlyMap<string, CatalogOperand>;

  constructor(private readonly entry: CatalogEntry) {
    this.operandsByName = new Map(
      entry.operands.map((operand) => [operand.name, operand] as const)
    );
  }

  get mnemonic(): string {
    return this.entry.mnemonic;
  }

  get operands(): readonly InstructionOperand[] {
    return this.entry.operands;
  }

  get gluedOperands(): boolean {
    return this.entry.gluedOperands;
  }

  get loadStore(): Optional<LoadStoreClassification> {
    return this.entry.loadStore;
  }

  renderOperands(values: ReadonlyMap<string, number>): string {
    return this.entry.syntax.replace(SYNTAX_PLACEHOLDER_PATTERN, (_, name: string) => {
      const operand = checkNotNull(
        this.operandsByName.get(name),
        `${this.entry.mnemonic} has no operand called ${name}.`
      );
      const value = checkNotNull(
        values.get(name),
        `No value given for operand ${name} of ${this.entry.mnemonic}.`
      );
      return renderCatalogOperand(operand, value);
    });
  }
}
