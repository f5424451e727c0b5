/**
 * Rewrites the single-dash long flag `-config` (and `-config=<path>`) into
 * the `--config` form commander understands. Commander would otherwise read
 * `-config` as `-c onfig`.
 */
export function normalizeArgv(argv: readonly string[]): string[] {
  return argv.map((arg) => {
    if (arg === '-config') {
      return '--config';
    }
    if (arg.startsWith('-config=')) {
      return `--config=${arg.slice('-config='.length)}`;
    }
    return arg;
  });
}
