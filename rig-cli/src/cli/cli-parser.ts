type ParsedCLIAction =
  | { readonly type: 'dump'; readonly snapshotPath: string | null; readonly needHelp: boolean }
  | { readonly type: 'version' }
  | { readonly type: 'help' };

function needHelp(commandLineArguments: readonly string[]): boolean {
  return commandLineArguments.includes('--help') || commandLineArguments.includes('-h');
}

export default function parseCLIArguments(
  commandLineArguments: readonly string[]
): ParsedCLIAction {
  switch (commandLineArguments[0]) {
    case 'dump':
      return {
        type: 'dump',
        snapshotPath:
          commandLineArguments.slice(1).find((argument) => !argument.startsWith('-')) ?? null,
        needHelp: needHelp(commandLineArguments),
      };
    case 'version':
      return { type: 'version' };
    default:
      return { type: 'help' };
  }
}
