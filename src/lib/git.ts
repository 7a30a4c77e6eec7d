// Git operations used by the built-in git backends

import { execFile } from 'child_process';
import { promisify } from 'util';
import { CommitRecord, GitCommandResult, RefRecord } from '../types';

const execFileAsync = promisify(execFile);

const FIELD_SEPARATOR = '\x1f';
const RECORD_SEPARATOR = '\x1e';
const MAX_BUFFER = 64 * 1024 * 1024;

export interface CommitQuery {
  branch?: string;
  since?: string;
  max?: number;
}

export type RefKind = 'heads' | 'tags';

// Check if a directory is inside a git work tree
export async function checkGitRepo(cwd: string): Promise<boolean> {
  try {
    await execFileAsync('git', ['rev-parse', '--is-inside-work-tree'], { cwd });
    return true;
  } catch {
    return false;
  }
}

// Execute a git command with error handling
export async function executeGitCommand(args: string[], cwd: string): Promise<GitCommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync('git', args, { cwd, maxBuffer: MAX_BUFFER });
    return {
      success: true,
      message: stdout || stderr || ''
    };
  } catch (error) {
    return {
      success: false,
      message: error instanceof Error ? error.message : 'Command failed'
    };
  }
}

export function buildLogArgs(query: CommitQuery): string[] {
  const format = ['%H', '%an', '%ae', '%aI', '%s'].join('%x1f') + '%x1e';
  const args = ['log', `--format=${format}`];
  if (query.since) {
    args.push(`--since=${query.since}`);
  }
  if (query.max !== undefined) {
    args.push(`--max-count=${query.max}`);
  }
  if (query.branch) {
    if (query.branch.startsWith('-')) {
      throw new Error(`Invalid revision: ${query.branch}`);
    }
    args.push(query.branch);
  }
  // Nothing after this is read as a path
  args.push('--');
  return args;
}

export function parseCommitLog(output: string): CommitRecord[] {
  return output
    .split(RECORD_SEPARATOR)
    .map(record => record.replace(/^\n/, ''))
    .filter(record => record.length > 0)
    .map(record => {
      const [hash = '', author = '', email = '', date = '', message = ''] = record.split(FIELD_SEPARATOR);
      return { hash, author, email, date, message };
    });
}

export async function getCommits(cwd: string, query: CommitQuery = {}): Promise<CommitRecord[]> {
  const result = await executeGitCommand(buildLogArgs(query), cwd);
  if (!result.success) {
    throw new Error(`git log failed: ${result.message.trim()}`);
  }
  return parseCommitLog(result.message);
}

export function parseRefs(output: string): RefRecord[] {
  return output
    .split('\n')
    .filter(line => line.trim())
    .map(line => {
      const [name = '', hash = '', date = ''] = line.split(FIELD_SEPARATOR);
      return { name, hash, date };
    });
}

export async function getRefs(cwd: string, kind: RefKind = 'heads'): Promise<RefRecord[]> {
  const format = '%(refname:short)%1f%(objectname)%1f%(creatordate:iso-strict)';
  const result = await executeGitCommand(['for-each-ref', `--format=${format}`, `refs/${kind}/`], cwd);
  if (!result.success) {
    throw new Error(`git for-each-ref failed: ${result.message.trim()}`);
  }
  return parseRefs(result.message);
}
