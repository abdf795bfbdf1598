import { stat, access } from 'node:fs/promises';
import { constants } from 'node:fs';
import path from 'node:path';
import type { ExecutionContext } from '../types/process.js';
import { MutmutError, MutmutErrorCode } from '../shared/errors.js';

export interface ResolverOptions {
  /** Ambient mutmut command used when no venv is supplied. */
  executable: string;
  workingDirectory: string;
  /** Extra environment merged under the venv overrides. */
  env?: Record<string, string>;
  platform?: NodeJS.Platform;
}

/** `bin/mutmut` on POSIX hosts, `Scripts\mutmut.exe` on Windows. */
export function venvLayout(venvPath: string, platform: NodeJS.Platform): { binDir: string; executablePath: string } {
  const pathApi = platform === 'win32' ? path.win32 : path.posix;
  const binDir = pathApi.join(venvPath, platform === 'win32' ? 'Scripts' : 'bin');
  const executablePath = pathApi.join(binDir, platform === 'win32' ? 'mutmut.exe' : 'mutmut');
  return { binDir, executablePath };
}

/**
 * Builds the ExecutionContext for one operation call.
 * Only reads the filesystem; the same input always yields the same context.
 */
export class EnvironmentResolver {
  private readonly platform: NodeJS.Platform;

  constructor(private readonly options: ResolverOptions) {
    this.platform = options.platform ?? process.platform;
  }

  async resolve(venvPath?: string): Promise<ExecutionContext> {
    const baseEnv = { ...(this.options.env ?? {}) };

    if (!venvPath) {
      return {
        executablePath: this.options.executable,
        workingDirectory: this.options.workingDirectory,
        environmentOverrides: baseEnv,
      };
    }

    const venvDir = path.resolve(this.options.workingDirectory, venvPath);
    if (!(await isDirectory(venvDir))) {
      throw new MutmutError(MutmutErrorCode.ENVIRONMENT_ERROR, `invalid venv: ${venvPath} is not a directory`, { venvPath });
    }

    const { binDir, executablePath } = venvLayout(venvDir, this.platform);
    if (!(await isExecutableFile(executablePath, this.platform))) {
      throw new MutmutError(
        MutmutErrorCode.ENVIRONMENT_ERROR,
        `invalid venv: mutmut not found at ${executablePath}. Install mutmut into the venv.`,
        { venvPath, executablePath },
      );
    }

    const pathKey = this.platform === 'win32' ? 'Path' : 'PATH';
    const delimiter = this.platform === 'win32' ? ';' : ':';
    const inheritedPath = baseEnv[pathKey] ?? process.env[pathKey] ?? process.env.PATH ?? '';

    return {
      executablePath,
      workingDirectory: this.options.workingDirectory,
      environmentOverrides: {
        ...baseEnv,
        VIRTUAL_ENV: venvDir,
        [pathKey]: inheritedPath ? `${binDir}${delimiter}${inheritedPath}` : binDir,
      },
    };
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    return false;
  }
}

async function isExecutableFile(target: string, platform: NodeJS.Platform): Promise<boolean> {
  try {
    if (!(await stat(target)).isFile()) return false;
    // Windows has no execute bit; existence is the only check there.
    await access(target, platform === 'win32' ? constants.F_OK : constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
