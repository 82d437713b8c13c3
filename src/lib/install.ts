/**
 * Filesystem side of the `install` action.
 *
 * The binary is copied to `<dest>.tmp` and renamed into place, so an
 * interrupted install never leaves a truncated executable under its final
 * name.
 */

import { copyFile, mkdir, rename, stat, chmod, unlink } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { InstallCopyError, InstallDirectoryConflictError, InstallDirectoryError } from '../types/build.js';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Creates the install directory, including missing parents.
 *
 * The directory itself must not exist yet.
 *
 * @throws {InstallDirectoryConflictError} If `installPath` already exists
 * @throws {InstallDirectoryError} If the directory cannot be created
 */
export async function createInstallDirectory(installPath: string): Promise<void> {
  try {
    await mkdir(dirname(installPath), { recursive: true });
    await mkdir(installPath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST' && (await pathExists(installPath))) {
      throw new InstallDirectoryConflictError(installPath);
    }
    throw new InstallDirectoryError(
      `Failed to create install directory ${installPath}: ${error instanceof Error ? error.message : String(error)}`,
      installPath,
      error instanceof Error ? error : undefined
    );
  }
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Copies a built binary into the install directory, keeping its mode bits.
 *
 * @returns The installed file's path
 * @throws {InstallCopyError} If the binary cannot be read or written
 */
export async function copyBuiltBinary(
  binaryPath: string,
  installPath: string,
  name: string
): Promise<string> {
  const destination = join(installPath, name);
  const tmpPath = `${destination}.tmp`;

  try {
    const { mode } = await stat(binaryPath);
    await copyFile(binaryPath, tmpPath);
    await chmod(tmpPath, mode);
    await rename(tmpPath, destination);
    return destination;
  } catch (error) {
    try {
      await unlink(tmpPath);
    } catch {
      // tmp file may not exist
    }

    throw new InstallCopyError(
      `Failed to install ${binaryPath} to ${destination}: ${error instanceof Error ? error.message : String(error)}`,
      binaryPath,
      error instanceof Error ? error : undefined
    );
  }
}
