// Git operations against a throwaway repository

import { execFileSync } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { checkGitRepo, executeGitCommand, getCommits, getRefs } from '../git';
import { GitBackend, GitRefsBackend } from '../../backends/git';
import { BackendArgumentError } from '../errors';
import { configureLogging } from '../logger';
import { MemoryWriter, fixedClock } from '../../testing/fakes';

const FIRST_DATE = '2026-01-02T03:04:05+02:00';
const SECOND_DATE = '2026-03-04T05:06:07+02:00';

function git(cwd: string, args: string[], date?: string): string {
  return execFileSync('git', ['-c', 'commit.gpgsign=false', ...args], {
    cwd,
    encoding: 'utf8',
    env: {
      ...process.env,
      GIT_AUTHOR_NAME: 'Test Author',
      GIT_AUTHOR_EMAIL: 'author@example.com',
      GIT_COMMITTER_NAME: 'Test Author',
      GIT_COMMITTER_EMAIL: 'author@example.com',
      ...(date ? { GIT_AUTHOR_DATE: date, GIT_COMMITTER_DATE: date } : {})
    }
  }).trim();
}

function createContext() {
  const stdout = new MemoryWriter();
  const context = {
    logging: configureLogging({ debug: false, color: false, sink: new MemoryWriter(), clock: fixedClock }),
    signal: new AbortController().signal,
    stdout
  };
  return { context, stdout };
}

describe('git against a real repository', () => {
  const previousCeiling = process.env.GIT_CEILING_DIRECTORIES;
  let repo: string;
  let outside: string;
  let firstHash: string;
  let secondHash: string;

  beforeAll(() => {
    // Keep git from finding a repository above the temp directories
    process.env.GIT_CEILING_DIRECTORIES = os.tmpdir();

    repo = fs.mkdtempSync(path.join(os.tmpdir(), 'sourcefetch-repo-'));
    outside = fs.mkdtempSync(path.join(os.tmpdir(), 'sourcefetch-plain-'));

    git(repo, ['init', '-q']);
    git(repo, ['symbolic-ref', 'HEAD', 'refs/heads/main']);
    git(repo, ['commit', '-q', '--allow-empty', '-m', 'First commit'], FIRST_DATE);
    firstHash = git(repo, ['rev-parse', 'HEAD']);
    git(repo, ['commit', '-q', '--allow-empty', '-m', 'Second commit'], SECOND_DATE);
    secondHash = git(repo, ['rev-parse', 'HEAD']);
    git(repo, ['tag', 'v1', firstHash]);
  });

  afterAll(() => {
    if (previousCeiling === undefined) {
      delete process.env.GIT_CEILING_DIRECTORIES;
    } else {
      process.env.GIT_CEILING_DIRECTORIES = previousCeiling;
    }
    fs.rmSync(repo, { recursive: true, force: true });
    fs.rmSync(outside, { recursive: true, force: true });
  });

  describe('checkGitRepo', () => {
    it('recognizes a work tree', async () => {
      expect(await checkGitRepo(repo)).toBe(true);
    });

    it('rejects a plain directory', async () => {
      expect(await checkGitRepo(outside)).toBe(false);
    });
  });

  describe('executeGitCommand', () => {
    it('returns the command output', async () => {
      const result = await executeGitCommand(['rev-parse', '--abbrev-ref', 'HEAD'], repo);
      expect(result).toEqual({ success: true, message: 'main\n' });
    });

    it('reports failure outside a repository', async () => {
      const result = await executeGitCommand(['log'], outside);
      expect(result.success).toBe(false);
    });
  });

  describe('getCommits', () => {
    it('returns every commit, newest first', async () => {
      expect(await getCommits(repo)).toEqual([
        { hash: secondHash, author: 'Test Author', email: 'author@example.com', date: SECOND_DATE, message: 'Second commit' },
        { hash: firstHash, author: 'Test Author', email: 'author@example.com', date: FIRST_DATE, message: 'First commit' }
      ]);
    });

    it('honours the count limit', async () => {
      const commits = await getCommits(repo, { max: 1 });
      expect(commits.map(commit => commit.hash)).toEqual([secondHash]);
    });

    it('honours the since date', async () => {
      const commits = await getCommits(repo, { since: '2026-02-01' });
      expect(commits.map(commit => commit.message)).toEqual(['Second commit']);
    });

    it('reads from a named revision', async () => {
      const commits = await getCommits(repo, { branch: 'v1' });
      expect(commits.map(commit => commit.hash)).toEqual([firstHash]);
    });
  });

  describe('getRefs', () => {
    it('lists branches', async () => {
      expect(await getRefs(repo, 'heads')).toEqual([{ name: 'main', hash: secondHash, date: SECOND_DATE }]);
    });

    it('lists tags', async () => {
      expect(await getRefs(repo, 'tags')).toEqual([{ name: 'v1', hash: firstHash, date: FIRST_DATE }]);
    });
  });

  describe('backends', () => {
    it('prints filtered commits for --path', async () => {
      const { context, stdout } = createContext();

      await new GitBackend(['--path', repo, '--from-date', '2026-02-01'], context).run();

      expect(stdout.lines.map(line => JSON.parse(line).message)).toEqual(['Second commit']);
    });

    it('prints refs for a positional path', async () => {
      const { context, stdout } = createContext();

      await new GitRefsBackend([repo, '--tags'], context).run();

      expect(stdout.lines.map(line => JSON.parse(line).name)).toEqual(['v1']);
    });

    it('fails in a directory that is not a repository', async () => {
      const { context } = createContext();

      await expect(new GitBackend([outside], context).run()).rejects.toThrow(`Not a git repository: ${outside}`);
    });

    it('never lets --branch reach git as an option', () => {
      const { context } = createContext();
      const target = path.join(outside, 'written-by-git');

      expect(() => new GitBackend([repo, '--branch', `--output=${target}`], context)).toThrow(BackendArgumentError);
      expect(fs.existsSync(target)).toBe(false);
    });
  });
});
