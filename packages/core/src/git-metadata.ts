/**
 * Source control metadata for artifact versioning
 *
 * A stored artifact is keyed by the commit it was produced from, so storing requires
 * a clean working tree and a readable HEAD.
 */

import { execa } from 'execa';
import { ConfigurationError, DirtyRepositoryError } from '@modelledger/utils';

/** Commit hashes are recorded in their 12-character short form */
export const COMMIT_HASH_LENGTH = 12;

/**
 * Source control port (for dependency injection)
 */
export interface SourceControlPort {
  currentCommit(): Promise<string>;
  isClean(): Promise<boolean>;
  uncommittedFiles(): Promise<string[]>;
}

/**
 * Parse `git status --porcelain` output into file paths.
 * Renames (`R  old -> new`) report the new path.
 */
export function parsePorcelainStatus(output: string): string[] {
  return output
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line) => {
      const path = line.slice(3);
      const arrow = path.indexOf(' -> ');
      return arrow === -1 ? path : path.slice(arrow + 4);
    });
}

/**
 * Production adapter backed by the git binary
 */
export class GitSourceControl implements SourceControlPort {
  constructor(private readonly cwd: string = process.cwd()) {}

  async currentCommit(): Promise<string> {
    const stdout = await this.git(['rev-parse', 'HEAD']);
    return stdout.trim().slice(0, COMMIT_HASH_LENGTH);
  }

  async isClean(): Promise<boolean> {
    const files = await this.uncommittedFiles();
    return files.length === 0;
  }

  /** Tracked files with staged or unstaged changes; untracked files are ignored */
  async uncommittedFiles(): Promise<string[]> {
    const stdout = await this.git(['status', '--porcelain', '--untracked-files=no']);
    return parsePorcelainStatus(stdout);
  }

  private async git(args: string[]): Promise<string> {
    try {
      const result = await execa('git', args, { cwd: this.cwd });
      return result.stdout;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (message.includes('not a git repository')) {
        throw new ConfigurationError(
          `Not a Git repository: ${this.cwd}.\nAction: initialize a Git repository or run from within one.`,
          'cwd'
        );
      }
      throw new ConfigurationError(`Git command failed (git ${args.join(' ')}): ${message}`, 'git');
    }
  }
}

/**
 * Static adapter (for testing)
 */
export class StaticSourceControl implements SourceControlPort {
  constructor(
    private readonly commit: string,
    private readonly dirtyFiles: string[] = []
  ) {}

  async currentCommit(): Promise<string> {
    return this.commit;
  }

  async isClean(): Promise<boolean> {
    return this.dirtyFiles.length === 0;
  }

  async uncommittedFiles(): Promise<string[]> {
    return [...this.dirtyFiles];
  }
}

/**
 * Throws DirtyRepositoryError if the working tree has uncommitted changes
 */
export async function requireClean(sourceControl: SourceControlPort): Promise<void> {
  if (await sourceControl.isClean()) {
    return;
  }
  throw new DirtyRepositoryError(await sourceControl.uncommittedFiles());
}
