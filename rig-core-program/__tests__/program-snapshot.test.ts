import { parseProgramSnapshot, PlacedInstruction, Program, snapshotToAssembly } from '..';
import { addi, BN_ADD, LW, nop, TEST_CATALOG } from './test-descriptors';

import { SOME } from 'rig-core-utils';

const createSampleProgram = (): Program => {
  const program = new Program(64, 0);
  program.addInstructions(0, [
    addi(1, 2, 3),
    new PlacedInstruction(LW, [4, 8, 1], SOME({ memoryKind: 'dmem', address: 8 })),
  ]);
  program.addInstructions(48, [new PlacedInstruction(BN_ADD, [1, 1, 2]), nop()]);
  return program;
};

describe('rig-core-program/program-snapshot', () => {
  it('captures every section in portable form', () => {
    expect(createSampleProgram().toSnapshot()).toEqual({
      imemSize: 64,
      sections: [
        {
          address: 0,
          instructions: [
            ['addi', [1, 2, 3]],
            ['lw', [4, 8, 1]],
          ],
        },
        {
          address: 48,
          instructions: [
            ['bn.add', [1, 1, 2]],
            ['nop', []],
          ],
        },
      ],
    });
  });

  it('parses its own JSON form', () => {
    const snapshot = createSampleProgram().toSnapshot();
    expect(parseProgramSnapshot(JSON.stringify(snapshot))).toEqual(snapshot);
  });

  it('renders the same assembly as the live program', () => {
    const snapshot = parseProgramSnapshot(JSON.stringify(createSampleProgram().toSnapshot()));
    if (snapshot == null) throw new Error('Expected a snapshot.');
    expect(snapshotToAssembly(snapshot, TEST_CATALOG)).toEqual({
      __type__: 'OK',
      assembly: createSampleProgram().toAssembly(),
    });
  });

  it('sorts sections by address', () => {
    expect(
      parseProgramSnapshot(
        '{"imemSize":64,"sections":[{"address":8,"instructions":[]},{"address":0,"instructions":[["nop",[]]]}]}'
      )
    ).toEqual({
      imemSize: 64,
      sections: [
        { address: 0, instructions: [['nop', []]] },
        { address: 8, instructions: [] },
      ],
    });
  });

  it('rejects malformed snapshots', () => {
    expect(parseProgramSnapshot('not json')).toBeNull();
    expect(parseProgramSnapshot('[]')).toBeNull();
    expect(parseProgramSnapshot('{"imemSize":0,"sections":[]}')).toBeNull();
    expect(parseProgramSnapshot('{"imemSize":62,"sections":[]}')).toBeNull();
    expect(parseProgramSnapshot('{"imemSize":64}')).toBeNull();
    expect(
      parseProgramSnapshot('{"imemSize":64,"sections":[{"address":2,"instructions":[]}]}')
    ).toBeNull();
    expect(
      parseProgramSnapshot('{"imemSize":64,"sections":[{"address":0,"instructions":[["nop"]]}]}')
    ).toBeNull();
    expect(
      parseProgramSnapshot(
        '{"imemSize":64,"sections":[{"address":0,"instructions":[["addi",[1,-2,3]]]}]}'
      )
    ).toBeNull();
  });

  it('rejects overlapping sections and sections past the end of memory', () => {
    expect(
      parseProgramSnapshot(
        '{"imemSize":64,"sections":[{"address":0,"instructions":[["nop",[]],["nop",[]]]},{"address":4,"instructions":[]}]}'
      )
    ).toBeNull();
    expect(
      parseProgramSnapshot(
        '{"imemSize":8,"sections":[{"address":4,"instructions":[["nop",[]],["nop",[]]]}]}'
      )
    ).toBeNull();
    expect(
      parseProgramSnapshot(
        '{"imemSize":64,"sections":[{"address":8,"instructions":[]},{"address":8,"instructions":[]}]}'
      )
    ).toBeNull();
    expect(
      parseProgramSnapshot('{"imemSize":64,"sections":[{"address":64,"instructions":[]}]}')
    ).toBeNull();
  });

  it('reports instructions the catalog cannot render', () => {
    expect(
      snapshotToAssembly(
        { imemSize: 64, sections: [{ address: 0, instructions: [['bn.mulqacc', []]] }] },
        TEST_CATALOG
      )
    ).toEqual({ __type__: 'UNKNOWN_MNEMONIC', mnemonic: 'bn.mulqacc' });
    expect(
      snapshotToAssembly(
        { imemSize: 64, sections: [{ address: 0, instructions: [['addi', [1]]] }] },
        TEST_CATALOG
      )
    ).toEqual({ __type__: 'OPERAND_COUNT_MISMATCH', mnemonic: 'addi', expected: 3, actual: 1 });
  });
});
