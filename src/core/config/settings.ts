/**
 * Resolves the branch and remote names for one run.
 *
 * Precedence: command-line flag > environment > config file > default.
 */
import { isValidRefName, type Config } from './schema.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export interface PromoteSettings {
  remote: string;
  devBranch: string;
  mainBranch: string;
}

export interface SettingsSources {
  config: Config;
  env: NodeJS.ProcessEnv;
  /** Positional remote argument */
  remote?: string;
  /** --dev flag */
  dev?: string;
  /** --main flag */
  main?: string;
}

function pick(...candidates: Array<string | undefined>): string | undefined {
  return candidates.find((value) => value !== undefined && value !== '');
}

export function resolveSettings(sources: SettingsSources): PromoteSettings {
  const { config, env } = sources;
  const settings: PromoteSettings = {
    remote: pick(sources.remote) ?? config.remote,
    devBranch: pick(sources.dev, env.DEV_BRANCH) ?? config.branches.dev,
    mainBranch: pick(sources.main, env.MAIN_BRANCH) ?? config.branches.main,
  };

  for (const [label, value] of [
    ['remote', settings.remote],
    ['dev branch', settings.devBranch],
    ['main branch', settings.mainBranch],
  ] as const) {
    if (!isValidRefName(value)) {
      throw new ConfigError(
        ErrorCodes.INVALID_REF_NAME,
        `Invalid ${label} name: '${value}'`,
        { [label]: value }
      );
    }
  }

  if (settings.devBranch === settings.mainBranch) {
    throw new ConfigError(
      ErrorCodes.INVALID_REF_NAME,
      `Dev and main branch are both '${settings.devBranch}'`,
      { devBranch: settings.devBranch, mainBranch: settings.mainBranch }
    );
  }

  return settings;
}
