import { simpleGit } from "simple-git";

/**
 * Clone a repository into a new directory
 */
export async function cloneRepo(url: string, localPath: string): Promise<void> {
  const git = simpleGit();
  await git.clone(url, localPath);
}

/**
 * Read `git remote -vv` for the repository containing the working directory
 */
export async function listRemotes(cwd: string = process.cwd()): Promise<string> {
  const git = simpleGit(cwd);
  return git.raw(["remote", "-vv"]);
}
