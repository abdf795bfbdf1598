import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { EnvironmentResolver, venvLayout } from '../../../src/environment/resolver.js';
import { MutmutError, MutmutErrorCode } from '../../../src/shared/errors.js';

async function makeVenv(root: string, mode = 0o755): Promise<string> {
  const venv = path.join(root, '.venv');
  await fs.mkdir(path.join(venv, 'bin'), { recursive: true });
  await fs.writeFile(path.join(venv, 'bin', 'mutmut'), '#!/bin/sh\necho mutmut\n', { mode });
  return venv;
}

async function expectEnvironmentError(promise: Promise<unknown>): Promise<MutmutError> {
  const err = await promise.then(() => undefined, (e: unknown) => e);
  expect(err).toBeInstanceOf(MutmutError);
  if (!(err instanceof MutmutError)) throw new Error('expected MutmutError');
  expect(err.code).toBe(MutmutErrorCode.ENVIRONMENT_ERROR);
  return err;
}

describe('venvLayout', () => {
  it('uses bin/mutmut on POSIX hosts', () => {
    expect(venvLayout('/work/.venv', 'linux')).toEqual({
      binDir: '/work/.venv/bin',
      executablePath: '/work/.venv/bin/mutmut',
    });
  });

  it('uses Scripts\\mutmut.exe on Windows', () => {
    expect(venvLayout('C:\\work\\.venv', 'win32')).toEqual({
      binDir: 'C:\\work\\.venv\\Scripts',
      executablePath: 'C:\\work\\.venv\\Scripts\\mutmut.exe',
    });
  });
});

describe('EnvironmentResolver', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mutmut-mcp-venv-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('uses the ambient executable when no venv is given', async () => {
    const resolver = new EnvironmentResolver({ executable: 'mutmut', workingDirectory: tmpDir, env: { PYTHONHASHSEED: '0' } });
    await expect(resolver.resolve()).resolves.toEqual({
      executablePath: 'mutmut',
      workingDirectory: tmpDir,
      environmentOverrides: { PYTHONHASHSEED: '0' },
    });
  });

  it('resolves mutmut inside a valid venv and puts its bin directory first on PATH', async () => {
    const venv = await makeVenv(tmpDir);
    const resolver = new EnvironmentResolver({
      executable: 'mutmut',
      workingDirectory: tmpDir,
      env: { PATH: '/usr/bin' },
      platform: 'linux',
    });

    const context = await resolver.resolve(venv);
    expect(context).toEqual({
      executablePath: path.join(venv, 'bin', 'mutmut'),
      workingDirectory: tmpDir,
      environmentOverrides: {
        PATH: `${path.join(venv, 'bin')}:/usr/bin`,
        VIRTUAL_ENV: venv,
      },
    });
  });

  it('resolves a relative venv path against the working directory', async () => {
    const venv = await makeVenv(tmpDir);
    const resolver = new EnvironmentResolver({ executable: 'mutmut', workingDirectory: tmpDir, platform: 'linux' });
    const context = await resolver.resolve('.venv');
    expect(context.executablePath).toBe(path.join(venv, 'bin', 'mutmut'));
  });

  it('fails with ENVIRONMENT_ERROR for a path that does not exist', async () => {
    const resolver = new EnvironmentResolver({ executable: 'mutmut', workingDirectory: tmpDir, platform: 'linux' });
    const err = await expectEnvironmentError(resolver.resolve(path.join(tmpDir, 'nope')));
    expect(err.message).toContain('invalid venv');
  });

  it('fails with ENVIRONMENT_ERROR for a directory without mutmut', async () => {
    await fs.mkdir(path.join(tmpDir, 'empty-venv', 'bin'), { recursive: true });
    const resolver = new EnvironmentResolver({ executable: 'mutmut', workingDirectory: tmpDir, platform: 'linux' });
    const err = await expectEnvironmentError(resolver.resolve(path.join(tmpDir, 'empty-venv')));
    expect(err.message).toContain(path.join(tmpDir, 'empty-venv', 'bin', 'mutmut'));
  });

  it('fails with ENVIRONMENT_ERROR when the venv path is a file', async () => {
    const file = path.join(tmpDir, 'not-a-dir');
    await fs.writeFile(file, '');
    const resolver = new EnvironmentResolver({ executable: 'mutmut', workingDirectory: tmpDir, platform: 'linux' });
    await expectEnvironmentError(resolver.resolve(file));
  });

  it('fails with ENVIRONMENT_ERROR when mutmut is not executable', async () => {
    const venv = await makeVenv(tmpDir, 0o644);
    const resolver = new EnvironmentResolver({ executable: 'mutmut', workingDirectory: tmpDir, platform: 'linux' });
    await expectEnvironmentError(resolver.resolve(venv));
  });

  it('returns equal contexts for repeated calls with the same input', async () => {
    const venv = await makeVenv(tmpDir);
    const resolver = new EnvironmentResolver({ executable: 'mutmut', workingDirectory: tmpDir, platform: 'linux' });
    const first = await resolver.resolve(venv);
    const second = await resolver.resolve(venv);
    expect(second).toEqual(first);
  });
});
