import { isAligned } from 'rig-core-utils';

export const CONFIGURATION_FILENAME = 'rigconfig.json';

export const DEFAULT_IMEM_SIZE = 4096;

export type RigProjectConfiguration = {
  /** Path to the JSON instruction catalog, relative to the configuration file. */
  readonly catalog: string;
  /** Size of instruction memory in bytes. */
  readonly imemSize: number;
};

export function parseRigProjectConfiguration(
  configurationString: string
): RigProjectConfiguration | null {
  try {
    const json: unknown = JSON.parse(configurationString);
    if (typeof json !== 'object' || json === null) return null;
    const catalog = 'catalog' in json ? json.catalog : undefined;
    const imemSize = 'imemSize' in json ? json.imemSize : DEFAULT_IMEM_SIZE;
    if (typeof catalog !== 'string' || catalog === '') return null;
    if (typeof imemSize !== 'number' || !Number.isSafeInteger(imemSize)) return null;
    if (imemSize <= 0 || !isAligned(imemSize, 4)) return null;
    return { catalog, imemSize };
  } catch {
    return null;
  }
}
