// yargs hands commands a loosely typed argv; these read one option and check its type.

export type Argv = Record<string, unknown>;

export function stringArg(argv: Argv, name: string): string | undefined {
  const value = argv[name];
  return typeof value === 'string' ? value : undefined;
}

export function numberArg(argv: Argv, name: string): number | undefined {
  const value = argv[name];
  return typeof value === 'number' && !Number.isNaN(value) ? value : undefined;
}

export function booleanArg(argv: Argv, name: string): boolean {
  return argv[name] === true;
}

export function projectDir(argv: Argv): string {
  return stringArg(argv, 'project') ?? process.cwd();
}
