import TemplateInstructionDescriptor, {
  CatalogEntry,
  CatalogOperand,
  SYNTAX_PLACEHOLDER_PATTERN,
} from './template-instruction-descriptor';

import type { InstructionDescriptor, LoadStoreClassification } from 'rig-core-program';
import { NONE, Optional, SOME } from 'rig-core-utils';

export type InstructionCatalog = ReadonlyMap<string, InstructionDescriptor>;

const OPERAND_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const parseCatalogOperand = (json: unknown): CatalogOperand | null => {
  if (typeof json !== 'object' || json === null) {
    return null;
  }
  const name = 'name' in json ? json.name : undefined;
  const type = 'type' in json ? json.type : undefined;
  if (typeof name !== 'string' || !OPERAND_NAME_PATTERN.test(name)) {
    return null;
  }
  switch (type) {
    case 'register': {
      const prefix = 'prefix' in json ? json.prefix : '';
      return typeof prefix === 'string' ? { name, type: 'register', prefix } : null;
    }
    case 'immediate':
      return { name, type: 'immediate' };
    case 'flag': {
      const text = 'text' in json ? json.text : undefined;
      return typeof text === 'string' ? { name, type: 'flag', text } : null;
    }
    default:
      return null;
  }
};

const parseLoadStore = (json: unknown): Optional<LoadStoreClassification> | null => {
  if (json == null) {
    return NONE;
  }
  if (typeof json !== 'object') {
    return null;
  }
  const memoryKind = 'memoryKind' in json ? json.memoryKind : undefined;
  return typeof memoryKind === 'string' ? SOME({ memoryKind }) : null;
};

const parseCatalogEntry = (json: unknown): CatalogEntry | null => {
  if (typeof json !== 'object' || json === null) {
    return null;
  }
  const mnemonic = 'mnemonic' in json ? json.mnemonic : undefined;
  const operands = 'operands' in json ? json.operands : [];
  const syntax = 'syntax' in json ? json.syntax : '';
  const gluedOperands = 'gluedOperands' in json ? json.gluedOperands : false;
  const loadStore = parseLoadStore('loadStore' in json ? json.loadStore : null);
  if (
    loadStore == null ||
    typeof mnemonic !== 'string' ||
    mnemonic === '' ||
    !Array.isArray(operands) ||
    typeof syntax !== 'string' ||
    typeof gluedOperands !== 'boolean'
  ) {
    return null;
  }

  const sanitizedOperands: CatalogOperand[] = [];
  const operandNames = new Set<string>();
  for (let i = 0; i < operands.length; i += 1) {
    const operand = parseCatalogOperand(operands[i]);
    if (operand == null || operandNames.has(operand.name)) {
      return null;
    }
    operandNames.add(operand.name);
    sanitizedOperands.push(operand);
  }
  for (const [, placeholder] of syntax.matchAll(SYNTAX_PLACEHOLDER_PATTERN)) {
    if (placeholder == null || !operandNames.has(placeholder)) {
      return null;
    }
  }

  return { mnemonic, operands: sanitizedOperands, syntax, gluedOperands, loadStore };
};

/**
 * Parses a JSON instruction catalog: an array of entries such as
 * `{ "mnemonic": "addi", "operands": [...], "syntax": "<grd>, <grs1>, <imm>" }`.
 *
 * @returns descriptors keyed by mnemonic, or null when any entry is malformed, refers to an
 * undeclared operand in its syntax, or repeats a mnemonic.
 */
const parseInstructionCatalog = (catalogString: string): InstructionCatalog | null => {
  try {
    const json: unknown = JSON.parse(catalogString);
    if (!Array.isArray(json)) {
      return null;
    }
    const catalog = new Map<string, InstructionDescriptor>();
    for (let i = 0; i < json.length; i += 1) {
      const entry = parseCatalogEntry(json[i]);
      if (entry == null || catalog.has(entry.mnemonic)) {
        return null;
      }
      catalog.set(entry.mnemonic, new TemplateInstructionDescriptor(entry));
    }
    return catalog;
  } catch {
    return null;
  }
};

export default parseInstructionCatalog;
