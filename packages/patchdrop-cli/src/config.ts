import path from "node:path";

export type CliConfig = {
  /** SQLite file holding objects and refs. */
  repoPath: string;
  /** Hex ed25519 secret key used to sign. */
  secretKeyFile: string;
  defaultBranch: string;
};

const BRANCH_NAME = /^[A-Za-z0-9._/-]+$/;

export function configFromEnv(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): CliConfig {
  const home = path.join(cwd, ".patchdrop");
  const repoPath = path.resolve(cwd, env.PATCHDROP_REPO ?? path.join(home, "repo.sqlite3"));
  const secretKeyFile = path.resolve(cwd, env.PATCHDROP_SECRET_KEY_FILE ?? path.join(home, "secret.key"));
  const defaultBranch = env.PATCHDROP_DEFAULT_BRANCH ?? "main";

  if (!BRANCH_NAME.test(defaultBranch) || defaultBranch.startsWith("/") || defaultBranch.endsWith("/")) {
    throw new Error(`invalid PATCHDROP_DEFAULT_BRANCH: ${defaultBranch}`);
  }
  return { repoPath, secretKeyFile, defaultBranch };
}
