/* eslint-disable no-console */

import { resolve } from 'path';

import cliMainRunner, { CLIRunners } from './cli';
import { dumpSnapshotFile, loadRigProject } from './cli-service';
import { CONFIGURATION_FILENAME } from './configuration';

const VERSION = '0.1.0';

const DUMP_USAGE = 'rig-layout dump <snapshot.json>: Print the assembly of a program snapshot.';

const runners: CLIRunners = {
  dump(snapshotPath, needHelp) {
    if (needHelp) {
      console.log(DUMP_USAGE);
      return;
    }
    if (snapshotPath == null) {
      console.error(`Missing snapshot path.\n${DUMP_USAGE}`);
      process.exit(1);
    }
    const project = loadRigProject(resolve(CONFIGURATION_FILENAME));
    if (project.__type__ === 'ERROR') {
      console.error(project.message);
      process.exit(1);
    }
    const assembly = dumpSnapshotFile(project.value, snapshotPath);
    if (assembly.__type__ === 'ERROR') {
      console.error(assembly.message);
      process.exit(1);
    }
    process.stdout.write(assembly.value);
  },
  version() {
    console.log(`rig-layout ${VERSION}`);
  },
  help() {
    console.log(`Usage:
rig-layout [command]

Commands:
dump <snapshot.json>: Print the assembly of a program snapshot, using the catalog named in ./rigconfig.json.
version: Show the version.
help: Show this message.`);
  },
};

export default function rigLayoutCLIMainFunction(): void {
  cliMainRunner(runners, process.argv.slice(2));
}
