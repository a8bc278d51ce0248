export type {
  InstructionDescriptor,
  InstructionOperand,
  LoadStoreClassification,
} from './instruction-descriptor';
export {
  default as PlacedInstruction,
  MemoryAccess,
  PortableInstruction,
} from './placed-instruction';
export { default as Program } from './program';
export { default as ProgramInvariantError } from './program-errors';
export {
  BranchTargetBounds,
  BranchTargetLayout,
  OccupiedRange,
  TargetGap,
  collectTargetGaps,
  gapWeight,
  pickBranchTargets,
  pickTargetInGap,
  reserveTarget,
} from './program-gaps';
export {
  AssemblySink,
  RenderableInstruction,
  RenderableSection,
  MNEMONIC_COLUMN_WIDTH,
  instructionToAssembly,
  sectionsToAssembly,
  writeSectionsAssembly,
} from './program-printer';
export { OpenSection, Section } from './program-section';
export {
  ProgramSnapshot,
  SectionSnapshot,
  SnapshotRenderingResult,
  parseProgramSnapshot,
  snapshotToAssembly,
} from './program-snapshot';
