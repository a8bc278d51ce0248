import { parseInstructionCatalog } from '..';

const SAMPLE_CATALOG = JSON.stringify([
  {
    mnemonic: 'addi',
    operands: [
      { name: 'grd', type: 'register', prefix: 'x' },
      { name: 'grs1', type: 'register', prefix: 'x' },
      { name: 'imm', type: 'immediate' },
    ],
    syntax: '<grd>, <grs1>, <imm>',
  },
  {
    mnemonic: 'lw',
    operands: [
      { name: 'grd', type: 'register', prefix: 'x' },
      { name: 'offset', type: 'immediate' },
      { name: 'grs1', type: 'register', prefix: 'x' },
    ],
    syntax: '<grd>, <offset>(<grs1>)',
    loadStore: { memoryKind: 'dmem' },
  },
  { mnemonic: 'ecall' },
]);

describe('rig-core-catalog/instruction-catalog', () => {
  it('parses a well-formed catalog', () => {
    const catalog = parseInstructionCatalog(SAMPLE_CATALOG);
    expect(catalog == null ? [] : Array.from(catalog.keys())).toEqual(['addi', 'lw', 'ecall']);
  });

  it('fills in defaults for omitted fields', () => {
    const ecall = parseInstructionCatalog(SAMPLE_CATALOG)?.get('ecall');
    expect(ecall?.operands).toEqual([]);
    expect(ecall?.gluedOperands).toBe(false);
    expect(ecall?.loadStore).toEqual({ __type__: 'NONE' });
    expect(ecall?.renderOperands(new Map())).toBe('');
  });

  it('keeps the load/store classification', () => {
    const lw = parseInstructionCatalog(SAMPLE_CATALOG)?.get('lw');
    expect(lw?.loadStore).toEqual({ __type__: 'SOME', value: { memoryKind: 'dmem' } });
    expect(
      lw?.renderOperands(
        new Map([
          ['grd', 5],
          ['offset', 16],
          ['grs1', 2],
        ])
      )
    ).toBe('x5, 16(x2)');
  });

  it('rejects text that is not a JSON array', () => {
    expect(parseInstructionCatalog('')).toBeNull();
    expect(parseInstructionCatalog('{')).toBeNull();
    expect(parseInstructionCatalog('{"mnemonic":"addi"}')).toBeNull();
  });

  it('rejects malformed entries', () => {
    expect(parseInstructionCatalog('[1]')).toBeNull();
    expect(parseInstructionCatalog('[{}]')).toBeNull();
    expect(parseInstructionCatalog('[{"mnemonic":""}]')).toBeNull();
    expect(parseInstructionCatalog('[{"mnemonic":"nop","gluedOperands":"yes"}]')).toBeNull();
    expect(parseInstructionCatalog('[{"mnemonic":"nop","loadStore":{}}]')).toBeNull();
    expect(
      parseInstructionCatalog('[{"mnemonic":"nop","operands":[{"name":"a","type":"vector"}]}]')
    ).toBeNull();
    expect(
      parseInstructionCatalog('[{"mnemonic":"nop","operands":[{"name":"a","type":"flag"}]}]')
    ).toBeNull();
    expect(
      parseInstructionCatalog('[{"mnemonic":"nop","operands":[{"name":"1a","type":"immediate"}]}]')
    ).toBeNull();
  });

  it('rejects duplicate operand names', () => {
    expect(
      parseInstructionCatalog(
        '[{"mnemonic":"nop","operands":[{"name":"a","type":"immediate"},{"name":"a","type":"immediate"}]}]'
      )
    ).toBeNull();
  });

  it('rejects syntax that refers to an undeclared operand', () => {
    expect(
      parseInstructionCatalog(
        '[{"mnemonic":"j","operands":[{"name":"offset","type":"immediate"}],"syntax":"<target>"}]'
      )
    ).toBeNull();
  });

  it('rejects duplicate mnemonics', () => {
    expect(parseInstructionCatalog('[{"mnemonic":"nop"},{"mnemonic":"nop"}]')).toBeNull();
  });
});
