// Git backends - commits and refs of a local repository

import * as path from 'path';
import { BackendContext, BackendProvider, BaseBackendCommand, OptionValues, readFlag, readString } from '../lib/backend';
import { BackendArgumentError } from '../lib/errors';
import { checkGitRepo, getCommits, getRefs } from '../lib/git';

interface GitOptions {
  path: string;
  fromDate?: string;
  branch?: string;
  max?: number;
}

interface GitRefsOptions {
  path: string;
  tags: boolean;
}

// --path wins over the positional form
function resolveRepoPath(values: OptionValues, positionals: string[]): string {
  return path.resolve(readString(values, 'path') ?? positionals[0] ?? process.cwd());
}

const PATH_OPTION = { flags: '--path <dir>', description: 'Repository directory (default: current directory)' };

async function ensureRepository(repoPath: string): Promise<void> {
  if (!(await checkGitRepo(repoPath))) {
    throw new Error(`Not a git repository: ${repoPath}`);
  }
}

export class GitBackend extends BaseBackendCommand<GitOptions> {
  constructor(args: readonly string[], context: BackendContext) {
    super({
      name: 'git',
      description: 'Fetch commits from a local git repository',
      arguments: '[path]',
      options: [
        PATH_OPTION,
        { flags: '--from-date <date>', description: 'Only commits after this date (ISO 8601)' },
        { flags: '--branch <name>', description: 'Branch or revision to read (default: HEAD)' },
        { flags: '--max <count>', description: 'Stop after this many commits' }
      ]
    }, args, context);
  }

  protected parseOptions(values: OptionValues, positionals: string[]): GitOptions {
    const fromDate = readString(values, 'fromDate');
    if (fromDate !== undefined && Number.isNaN(Date.parse(fromDate))) {
      throw new BackendArgumentError('git', `--from-date is not a valid date: ${fromDate}`);
    }

    const rawMax = readString(values, 'max');
    let max: number | undefined;
    if (rawMax !== undefined) {
      max = Number(rawMax);
      if (!Number.isInteger(max) || max <= 0) {
        throw new BackendArgumentError('git', `--max must be a positive integer, got ${rawMax}`);
      }
    }

    const branch = readString(values, 'branch');
    if (branch !== undefined && branch.startsWith('-')) {
      throw new BackendArgumentError('git', `--branch must name a revision, got ${branch}`);
    }

    return {
      path: resolveRepoPath(values, positionals),
      fromDate,
      branch,
      max
    };
  }

  protected async execute(): Promise<void> {
    await ensureRepository(this.options.path);
    this.logger.info(`Fetching commits from '${this.options.path}'`);

    const commits = await getCommits(this.options.path, {
      branch: this.options.branch,
      since: this.options.fromDate,
      max: this.options.max
    });

    let fetched = 0;
    for (const commit of commits) {
      if (this.context.signal.aborted) break;
      this.emit(commit);
      fetched++;
    }

    this.logger.info(`Fetch process completed: ${fetched} commits fetched`);
  }
}

export class GitRefsBackend extends BaseBackendCommand<GitRefsOptions> {
  constructor(args: readonly string[], context: BackendContext) {
    super({
      name: 'gitrefs',
      description: 'Fetch branches or tags from a local git repository',
      arguments: '[path]',
      options: [
        PATH_OPTION,
        { flags: '--tags', description: 'List tags instead of branches' }
      ]
    }, args, context);
  }

  protected parseOptions(values: OptionValues, positionals: string[]): GitRefsOptions {
    return {
      path: resolveRepoPath(values, positionals),
      tags: readFlag(values, 'tags')
    };
  }

  protected async execute(): Promise<void> {
    await ensureRepository(this.options.path);
    const kind = this.options.tags ? 'tags' : 'heads';
    this.logger.debug(`Reading refs/${kind} from '${this.options.path}'`);

    const refs = await getRefs(this.options.path, kind);
    refs.forEach(ref => this.emit(ref));

    this.logger.info(`Fetch process completed: ${refs.length} refs fetched`);
  }
}

export const gitProvider: BackendProvider = {
  name: 'git',
  backends: () => [
    { name: 'git', description: 'Commits of a local git repository', executable: GitBackend },
    { name: 'gitrefs', description: 'Branches and tags of a local git repository', executable: GitRefsBackend }
  ]
};
