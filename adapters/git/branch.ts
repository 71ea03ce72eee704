//NOTE(self): Local git branch handling for plan overviews
//NOTE(self): Create the branch, or switch to it when it already exists

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export type BranchOutcome = 'created' | 'switched';

export type GitResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

//NOTE(self): Validate git-safe string (no shell metacharacters, no `..`, no leading dash)
export function isValidBranchName(value: string): boolean {
  return /^[a-zA-Z0-9_.\-\/]+$/.test(value) && !value.includes('..') && !value.startsWith('-');
}

async function git(args: string[], cwd?: string): Promise<{ stdout: string }> {
  //NOTE(self): execFile, not exec — arguments never pass through a shell
  return execFileAsync('git', args, { cwd });
}

export async function branchExists(name: string, cwd?: string): Promise<boolean> {
  try {
    await git(['rev-parse', '--verify', '--quiet', `refs/heads/${name}`], cwd);
    return true;
  } catch {
    //NOTE(self): rev-parse exits non-zero when the ref is missing
    return false;
  }
}

export async function createOrSwitchBranch(name: string, cwd?: string): Promise<GitResult<BranchOutcome>> {
  if (!isValidBranchName(name)) {
    return { success: false, error: `Invalid branch name: ${name}` };
  }

  try {
    if (await branchExists(name, cwd)) {
      await git(['checkout', name], cwd);
      return { success: true, data: 'switched' };
    }

    await git(['checkout', '-b', name], cwd);
    return { success: true, data: 'created' };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    return { success: false, error: err.message };
  }
}
