import parseCLIArguments from './cli-parser';

export interface CLIRunners {
  dump(snapshotPath: string | null, needHelp: boolean): void;
  version(): void;
  help(): void;
}

const cliMainRunner = (runners: CLIRunners, commandLineArguments: readonly string[]): void => {
  const action = parseCLIArguments(commandLineArguments);
  switch (action.type) {
    case 'dump':
      runners.dump(action.snapshotPath, action.needHelp);
      return;
    case 'version':
      runners.version();
      return;
    case 'help':
      runners.help();
  }
};

export { parseCLIArguments };
export default cliMainRunner;
