import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { chmod, mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { BuildConfiguration } from '@/types/build.js';
import { InstallDirectoryConflictError } from '@/types/build.js';
import { HelperOptionsError, resolveHelperOptions, runHelperAction } from '@/commands/helper.js';
import { createFakeChild } from '../helpers/child.js';

const mockSpawn = vi.fn();

vi.mock('node:child_process', () => ({
  spawn: (...args: unknown[]) => mockSpawn(...args),
}));

function spawnedArgs(call: number): string[] {
  return mockSpawn.mock.calls[call][1];
}

describe('resolveHelperOptions', () => {
  const cli = {
    packagePath: '/src/pkg',
    buildPath: '/tmp/out',
    toolchain: '/opt/toolchain',
  };

  it('defaults to a quiet release configuration', () => {
    expect(resolveHelperOptions('build', cli)).toEqual({
      action: 'build',
      configuration: {
        mode: 'release',
        verbose: false,
        packagePath: '/src/pkg',
        buildPath: '/tmp/out',
        toolchainPath: '/opt/toolchain',
      },
    });
  });

  it('lets command-line flags override config-file values', () => {
    const resolved = resolveHelperOptions(
      'install',
      { ...cli, configuration: 'debug' },
      {
        package_path: '/cfg/pkg',
        toolchain: '/cfg/toolchain',
        install_path: '/cfg/libexec/swift',
        configuration: 'release',
        verbose: true,
      }
    );

    expect(resolved.configuration).toEqual({
      mode: 'debug',
      verbose: true,
      packagePath: '/src/pkg',
      buildPath: '/tmp/out',
      toolchainPath: '/opt/toolchain',
      installPath: '/cfg/libexec/swift',
    });
  });

  it('lets an explicit --no-verbose turn off verbose from the config file', () => {
    expect(resolveHelperOptions('build', { ...cli, verbose: false }, { verbose: true }).configuration.verbose).toBe(
      false
    );
    expect(resolveHelperOptions('build', cli, { verbose: true }).configuration.verbose).toBe(true);
  });

  it('fills missing flags from the config file', () => {
    const resolved = resolveHelperOptions('test', {}, {
      package_path: '/cfg/pkg',
      build_path: '/cfg/build',
      toolchain: '/cfg/toolchain',
    });

    expect(resolved.configuration.packagePath).toBe('/cfg/pkg');
    expect(resolved.configuration.buildPath).toBe('/cfg/build');
    expect(resolved.configuration.toolchainPath).toBe('/cfg/toolchain');
  });

  it('accepts and ignores --prefix', () => {
    expect(resolveHelperOptions('build', { ...cli, prefix: '/usr' })).toEqual(resolveHelperOptions('build', cli));
  });

  it('rejects unknown actions', () => {
    expect(() => resolveHelperOptions('clean', cli)).toThrow(
      "invalid action 'clean' (choose from 'build', 'test', 'install')"
    );
  });

  it('rejects unknown configurations', () => {
    expect(() => resolveHelperOptions('build', { ...cli, configuration: 'profile' })).toThrow(HelperOptionsError);
  });

  it('requires the package path, build path and toolchain', () => {
    expect(() => resolveHelperOptions('build', { ...cli, packagePath: undefined })).toThrow(
      'the following argument is required: --package-path'
    );
    expect(() => resolveHelperOptions('build', { ...cli, buildPath: undefined })).toThrow(
      'the following argument is required: --build-path'
    );
    expect(() => resolveHelperOptions('build', { ...cli, toolchain: undefined })).toThrow(
      'the following argument is required: --toolchain'
    );
  });

  it('requires an install path for install only', () => {
    expect(() => resolveHelperOptions('install', cli)).toThrow(
      'the following argument is required: --install-path'
    );
    expect(() => resolveHelperOptions('test', cli)).not.toThrow();
  });
});

describe('runHelperAction', () => {
  let testDir: string;
  let binDir: string;
  let config: BuildConfiguration;

  beforeEach(async () => {
    testDir = join(tmpdir(), `backtrace-helper-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    binDir = join(testDir, 'out', 'release');
    await mkdir(binDir, { recursive: true });
    await writeFile(join(binDir, 'swift-backtrace'), 'built');
    await chmod(join(binDir, 'swift-backtrace'), 0o755);

    config = {
      mode: 'release',
      verbose: false,
      packagePath: '/src/pkg',
      buildPath: join(testDir, 'out'),
      toolchainPath: '/opt/toolchain',
      installPath: join(testDir, 'toolchain', 'libexec', 'swift'),
    };

    mockSpawn.mockReset();
    mockSpawn.mockImplementation((_cmd: string, args: string[]) =>
      args.includes('--show-bin-path') ? createFakeChild({ stdout: `${binDir}\n` }) : createFakeChild({ code: 0 })
    );
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('builds the swift-backtrace product', async () => {
    await expect(runHelperAction('build', config)).resolves.toBe(0);

    expect(mockSpawn).toHaveBeenCalledTimes(1);
    expect(spawnedArgs(0).slice(0, 1)).toEqual(['build']);
    expect(spawnedArgs(0).slice(-2)).toEqual(['--product', 'swift-backtrace']);
  });

  it('runs the test product and propagates its status', async () => {
    mockSpawn.mockImplementation(() => createFakeChild({ code: 1 }));

    await expect(runHelperAction('test', config)).resolves.toBe(1);
    expect(spawnedArgs(0).slice(-2)).toEqual(['--test-product', 'swift-backtrace']);
  });

  it('builds, then copies the binary into the install directory', async () => {
    await expect(runHelperAction('install', config)).resolves.toBe(0);

    expect(mockSpawn).toHaveBeenCalledTimes(2);
    expect(spawnedArgs(0)).not.toContain('--show-bin-path');
    expect(spawnedArgs(1)).toContain('--show-bin-path');
    const installed = join(testDir, 'toolchain', 'libexec', 'swift', 'swift-backtrace');
    expect(await readFile(installed, 'utf-8')).toBe('built');
  });

  it('installs nothing when the build fails', async () => {
    mockSpawn.mockImplementation(() => createFakeChild({ code: 2 }));

    await expect(runHelperAction('install', config)).resolves.toBe(2);

    expect(mockSpawn).toHaveBeenCalledTimes(1);
    await expect(stat(join(testDir, 'toolchain'))).rejects.toThrow();
  });

  it('refuses to install into an existing directory', async () => {
    await mkdir(join(testDir, 'toolchain', 'libexec', 'swift'), { recursive: true });

    await expect(runHelperAction('install', config)).rejects.toThrow(InstallDirectoryConflictError);
    expect(mockSpawn).toHaveBeenCalledTimes(1);
  });

  it('requires an install path', async () => {
    const { installPath: _unused, ...withoutInstall } = config;

    await expect(runHelperAction('install', withoutInstall)).rejects.toThrow(HelperOptionsError);
    expect(mockSpawn).not.toHaveBeenCalled();
  });
});
