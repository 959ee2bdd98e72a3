/** Supplies the process's home directory, if one can be determined. */
export interface HomeDirProvider {
  homeDir(): string | undefined;
}

/**
 * Home directory provider backed by environment variables.
 * First non-empty match wins: `HOME`, `USERPROFILE`, then `HOMEDRIVE` + `HOMEPATH`.
 */
export function createEnvHomeDirProvider(
  env: Record<string, string | undefined> = process.env,
): HomeDirProvider {
  return {
    homeDir(): string | undefined {
      const home = env['HOME'];
      if (home) return home;

      const profile = env['USERPROFILE'];
      if (profile) return profile;

      const drive = env['HOMEDRIVE'];
      const homePath = env['HOMEPATH'];
      if (drive && homePath) return drive + homePath;

      return undefined;
    },
  };
}

/** Provider that always returns the given directory. */
export function staticHomeDirProvider(dir: string | undefined): HomeDirProvider {
  return { homeDir: () => dir };
}
