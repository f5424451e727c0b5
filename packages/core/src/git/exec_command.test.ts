import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createExecCommand } from './exec_command';

const node = process.execPath;

describe('createExecCommand', () => {
  it('should capture stdout, stderr and the exit code', async () => {
    const execCommand = createExecCommand();

    const result = await execCommand(node, [
      '-e',
      'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)',
    ]);

    expect(result).toEqual({ exitCode: 3, stdout: 'out', stderr: 'err' });
  });

  it('should run in the requested directory', async () => {
    const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'repomirror-exec-')));
    try {
      const execCommand = createExecCommand();

      const result = await execCommand(node, ['-e', 'process.stdout.write(process.cwd())'], { cwd: dir });

      expect(result.stdout).toBe(dir);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should add the given variables to the inherited environment', async () => {
    const execCommand = createExecCommand();

    const result = await execCommand(
      node,
      ['-e', 'process.stdout.write(`${process.env.GIT_TERMINAL_PROMPT}:${typeof process.env.PATH}`)'],
      { env: { GIT_TERMINAL_PROMPT: '0' } },
    );

    expect(result.stdout).toBe('0:string');
  });

  it('should resolve with exit code 1 when the command cannot be started', async () => {
    const execCommand = createExecCommand();

    const result = await execCommand('repomirror-command-that-does-not-exist', []);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain('ENOENT');
  });
});
