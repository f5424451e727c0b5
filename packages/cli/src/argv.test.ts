import { normalizeArgv } from './argv';

describe('normalizeArgv', () => {
  it('should rewrite the single-dash config flag', () => {
    expect(normalizeArgv(['node', 'repomirror', '-config', '/etc/repomirror.yaml'])).toEqual([
      'node',
      'repomirror',
      '--config',
      '/etc/repomirror.yaml',
    ]);
  });

  it('should rewrite the inline value form', () => {
    expect(normalizeArgv(['node', 'repomirror', '-config=mirror.yaml'])).toEqual([
      'node',
      'repomirror',
      '--config=mirror.yaml',
    ]);
  });

  it('should leave other arguments alone', () => {
    const argv = ['node', 'repomirror', '-c', 'a.yaml', '--config', 'b.yaml', '--verbose', '-configure'];

    expect(normalizeArgv(argv)).toEqual(argv);
  });
});
