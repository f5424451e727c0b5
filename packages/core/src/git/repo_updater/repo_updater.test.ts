/**
 * RepoUpdater Unit Tests
 *
 * git is replaced by a mocked execCommand; the mirror paths are real
 * temporary directories so the clone-or-pull decision runs against disk.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { GIT_ENV, RepoUpdater, buildAuthArgs } from './repo_updater';
import { CloneError, PullError } from '../errors';
import type { ExecCommandFn, ExecOptions, ExecResult } from '../types';
import type { RepositoryDescriptor } from '../../repository_lister/repository_lister.types';

const repository: RepositoryDescriptor = {
  name: 'api',
  fullName: 'octo-tester/api',
  cloneUrl: 'https://github.example.com/octo-tester/api.git',
  defaultBranch: 'main',
  private: false,
  archived: false,
};

function ok(stdout = '', stderr = ''): ExecResult {
  return { exitCode: 0, stdout, stderr };
}

function failed(stderr: string, exitCode = 128): ExecResult {
  return { exitCode, stdout: '', stderr };
}

describe('RepoUpdater', () => {
  let reposDir: string;
  let execCommand: jest.Mock<ReturnType<ExecCommandFn>, [string, string[], ExecOptions?]>;

  beforeEach(() => {
    reposDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'repomirror-updater-')));
    execCommand = jest.fn();
  });

  afterEach(() => {
    fs.rmSync(reposDir, { recursive: true, force: true });
  });

  function createMirrorDir(name = 'api'): string {
    const repoPath = path.join(reposDir, name);
    fs.mkdirSync(repoPath);
    return repoPath;
  }

  it('should run git with the untranslated C locale', () => {
    expect(GIT_ENV).toEqual({ GIT_TERMINAL_PROMPT: '0', LC_ALL: 'C' });
  });

  describe('buildAuthArgs', () => {
    it('should send the token as basic-auth password with the fixed username', () => {
      const expected = Buffer.from('x-access-token:test-token').toString('base64');

      expect(buildAuthArgs('test-token')).toEqual(['-c', `http.extraHeader=Authorization: Basic ${expected}`]);
    });

    it('should send no credentials without a token', () => {
      expect(buildAuthArgs('')).toEqual([]);
      expect(buildAuthArgs(undefined)).toEqual([]);
    });
  });

  it('should require execCommand', () => {
    expect(() => new RepoUpdater({} as never)).toThrow('execCommand is required for RepoUpdater');
  });

  describe('clone', () => {
    it('WHEN the mirror path is absent THE SYSTEM SHALL clone into it', async () => {
      const repoPath = path.join(reposDir, 'api');
      execCommand.mockResolvedValue(ok());
      const updater = new RepoUpdater({ execCommand, token: 'test-token' });

      const outcome = await updater.update(repoPath, repository);

      expect(outcome).toBe('cloned');
      expect(execCommand).toHaveBeenCalledTimes(1);
      expect(execCommand).toHaveBeenCalledWith(
        'git',
        [...buildAuthArgs('test-token'), 'clone', '--', repository.cloneUrl, repoPath],
        { cwd: reposDir, env: { GIT_TERMINAL_PROMPT: '0', LC_ALL: 'C' } },
      );
    });

    it('should clone without auth arguments when no token is configured', async () => {
      const repoPath = path.join(reposDir, 'api');
      execCommand.mockResolvedValue(ok());
      const updater = new RepoUpdater({ execCommand });

      await updater.update(repoPath, repository);

      expect(execCommand.mock.calls[0]?.[1]).toEqual(['clone', '--', repository.cloneUrl, repoPath]);
    });

    it('should create a missing parent directory and clone from inside it', async () => {
      const repoPath = path.join(reposDir, 'octo-org', 'api');
      execCommand.mockResolvedValue(ok());
      const updater = new RepoUpdater({ execCommand });

      await expect(updater.update(repoPath, repository)).resolves.toBe('cloned');

      expect(fs.statSync(path.join(reposDir, 'octo-org')).isDirectory()).toBe(true);
      expect(execCommand.mock.calls[0]?.[2]).toEqual({ cwd: path.join(reposDir, 'octo-org'), env: GIT_ENV });
    });

    it('should throw CloneError when the parent directory cannot be created', async () => {
      const blocker = path.join(reposDir, 'not-a-dir');
      fs.writeFileSync(blocker, '');
      const updater = new RepoUpdater({ execCommand });

      await expect(updater.update(path.join(blocker, 'api'), repository)).rejects.toThrow(CloneError);
      expect(execCommand).not.toHaveBeenCalled();
    });

    it('should throw CloneError carrying the fatal line of stderr', async () => {
      const stderr = "Cloning into 'api'...\nfatal: repository 'https://github.example.com/octo-tester/api.git/' not found\n";
      execCommand.mockResolvedValue(failed(stderr));
      const updater = new RepoUpdater({ execCommand });

      const promise = updater.update(path.join(reposDir, 'api'), repository);

      await expect(promise).rejects.toThrow(CloneError);
      await expect(promise).rejects.toMatchObject({
        repository: 'api',
        stderr,
        message: "failed to clone repository api: fatal: repository 'https://github.example.com/octo-tester/api.git/' not found",
      });
    });

    it('should keep the token out of the recorded command', async () => {
      execCommand.mockResolvedValue(failed('fatal: Authentication failed'));
      const updater = new RepoUpdater({ execCommand, token: 'test-token' });

      const error = await updater.update(path.join(reposDir, 'api'), repository).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CloneError);
      expect(error).toMatchObject({
        command: `git clone -- ${repository.cloneUrl} ${path.join(reposDir, 'api')}`,
      });
    });
  });

  describe('pull', () => {
    function mockRevParse(repoPath: string): void {
      execCommand.mockResolvedValueOnce(ok(`${repoPath}\n`));
    }

    it('WHEN the mirror exists THE SYSTEM SHALL verify it and pull with --ff-only', async () => {
      const repoPath = createMirrorDir();
      mockRevParse(repoPath);
      execCommand.mockResolvedValueOnce(ok('Updating 1a2b3c4..5d6e7f8\nFast-forward\n README.md | 2 +-\n'));
      const updater = new RepoUpdater({ execCommand, token: 'test-token' });

      const outcome = await updater.update(repoPath, repository);

      expect(outcome).toBe('updated');
      expect(execCommand).toHaveBeenNthCalledWith(1, 'git', ['rev-parse', '--show-toplevel'], {
        cwd: repoPath,
        env: { GIT_TERMINAL_PROMPT: '0', LC_ALL: 'C' },
      });
      expect(execCommand).toHaveBeenNthCalledWith(2, 'git', [...buildAuthArgs('test-token'), 'pull', '--ff-only'], {
        cwd: repoPath,
        env: { GIT_TERMINAL_PROMPT: '0', LC_ALL: 'C' },
      });
    });

    it('should report up-to-date when there is nothing to pull', async () => {
      const repoPath = createMirrorDir();
      mockRevParse(repoPath);
      execCommand.mockResolvedValueOnce(ok('Already up to date.\n'));
      const updater = new RepoUpdater({ execCommand });

      await expect(updater.update(repoPath, repository)).resolves.toBe('up-to-date');
    });

    it('should recognise the hyphenated message of older git versions', async () => {
      const repoPath = createMirrorDir();
      mockRevParse(repoPath);
      execCommand.mockResolvedValueOnce(ok('Already up-to-date.\n'));
      const updater = new RepoUpdater({ execCommand });

      await expect(updater.update(repoPath, repository)).resolves.toBe('up-to-date');
    });

    it('WHEN the mirror has diverged THE SYSTEM SHALL report diverged instead of failing', async () => {
      const repoPath = createMirrorDir();
      mockRevParse(repoPath);
      execCommand.mockResolvedValueOnce(failed(
        "hint: Diverging branches can't be fast-forwarded, you need to either:\nfatal: Not possible to fast-forward, aborting.\n",
      ));
      const updater = new RepoUpdater({ execCommand });

      await expect(updater.update(repoPath, repository)).resolves.toBe('diverged');
      expect(execCommand).toHaveBeenCalledTimes(2);
    });

    it('should throw PullError for other pull failures', async () => {
      const repoPath = createMirrorDir();
      mockRevParse(repoPath);
      execCommand.mockResolvedValueOnce(failed('fatal: unable to access: Could not resolve host: github.example.com\n'));
      const updater = new RepoUpdater({ execCommand });

      const promise = updater.update(repoPath, repository);

      await expect(promise).rejects.toThrow(PullError);
      await expect(promise).rejects.toThrow(
        'failed to pull repository api: fatal: unable to access: Could not resolve host: github.example.com',
      );
    });

    it('should throw PullError when the directory is not a repository', async () => {
      const repoPath = createMirrorDir();
      execCommand.mockResolvedValueOnce(failed('fatal: not a git repository (or any of the parent directories): .git'));
      const updater = new RepoUpdater({ execCommand });

      await expect(updater.update(repoPath, repository)).rejects.toThrow(
        'failed to pull repository api: failed to open repository',
      );
      expect(execCommand).toHaveBeenCalledTimes(1);
    });

    it('should throw PullError when the directory sits inside another repository', async () => {
      const repoPath = createMirrorDir();
      execCommand.mockResolvedValueOnce(ok(`${reposDir}\n`));
      const updater = new RepoUpdater({ execCommand });

      await expect(updater.update(repoPath, repository)).rejects.toThrow(
        `failed to pull repository api: failed to open repository: ${repoPath} is not a repository root`,
      );
      expect(execCommand).toHaveBeenCalledTimes(1);
    });
  });
});
