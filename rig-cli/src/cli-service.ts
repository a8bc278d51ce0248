import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';

import { InstructionCatalog, parseInstructionCatalog } from 'rig-core-catalog';
import { parseProgramSnapshot, snapshotToAssembly } from 'rig-core-program';

import { parseRigProjectConfiguration } from './configuration';

export type FileReader = (path: string) => string | null;

export const readFileOrNull: FileReader = (path) => {
  try {
    return readFileSync(path).toString();
  } catch {
    return null;
  }
};

type ServiceError = { readonly __type__: 'ERROR'; readonly message: string };

export type ServiceResult<T> = { readonly __type__: 'OK'; readonly value: T } | ServiceError;

const ok = <T>(value: T): ServiceResult<T> => ({ __type__: 'OK', value });
const failure = (message: string): ServiceError => ({ __type__: 'ERROR', message });

/** Instruction memory size and catalog that snapshots of this project are rendered with. */
export type RigProject = { readonly imemSize: number; readonly catalog: InstructionCatalog };

/** Reads a rigconfig.json and the catalog it names, relative to the configuration's directory. */
export function loadRigProject(
  configurationPath: string,
  fileReader: FileReader = readFileOrNull
): ServiceResult<RigProject> {
  const configurationContent = fileReader(configurationPath);
  if (configurationContent == null) return failure(`Cannot read ${configurationPath}.`);
  const configuration = parseRigProjectConfiguration(configurationContent);
  if (configuration == null) {
    return failure(
      `${configurationPath} needs a "catalog" path and an "imemSize" that is a positive ` +
        'multiple of 4.'
    );
  }

  const catalogPath = resolve(dirname(configurationPath), configuration.catalog);
  const catalogContent = fileReader(catalogPath);
  if (catalogContent == null) return failure(`Cannot read catalog ${catalogPath}.`);
  const catalog = parseInstructionCatalog(catalogContent);
  if (catalog == null) return failure(`Catalog ${catalogPath} is malformed.`);
  return ok({ imemSize: configuration.imemSize, catalog });
}

/** Renders a snapshot file as the generator would have dumped it. */
export function dumpSnapshotFile(
  { imemSize, catalog }: RigProject,
  snapshotPath: string,
  fileReader: FileReader = readFileOrNull
): ServiceResult<string> {
  const snapshotContent = fileReader(snapshotPath);
  if (snapshotContent == null) return failure(`Cannot read snapshot ${snapshotPath}.`);
  const snapshot = parseProgramSnapshot(snapshotContent);
  if (snapshot == null) return failure(`Snapshot ${snapshotPath} is malformed.`);
  if (snapshot.imemSize !== imemSize) {
    return failure(
      `Snapshot ${snapshotPath} is for ${snapshot.imemSize} bytes of instruction memory, ` +
        `but the project is configured for ${imemSize}.`
    );
  }

  const result = snapshotToAssembly(snapshot, catalog);
  switch (result.__type__) {
    case 'OK':
      return ok(result.assembly);
    case 'UNKNOWN_MNEMONIC':
      return failure(`The catalog has no instruction called ${result.mnemonic}.`);
    case 'OPERAND_COUNT_MISMATCH':
      return failure(
        `${result.mnemonic} takes ${result.expected} operand(s), ` +
          `but the snapshot gives ${result.actual}.`
      );
  }
}
